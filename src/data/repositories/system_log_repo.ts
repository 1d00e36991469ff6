/**
 * System event log stored alongside calculations
 */

import { getDatabase } from '../db';

export type SystemEventLevel = 'INFO' | 'WARNING' | 'ERROR';

export interface SystemEvent {
  id: number;
  timestamp: string;
  level: SystemEventLevel;
  component: string;
  message: string;
  details: Record<string, unknown> | null;
}

interface SystemEventRow {
  id: number;
  timestamp: string;
  level: SystemEventLevel;
  component: string;
  message: string;
  details: string | null;
}

function parseDetails(raw: string | null): Record<string, unknown> | null {
  if (raw === null) return null;
  const parsed: unknown = JSON.parse(raw);
  return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)
    ? { ...parsed }
    : { value: parsed };
}

export function logSystemEvent(
  level: SystemEventLevel,
  component: string,
  message: string,
  details?: Record<string, unknown>,
  at: Date = new Date()
): void {
  const db = getDatabase();
  db.prepare(`
    INSERT INTO system_logs (timestamp, level, component, message, details)
    VALUES (?, ?, ?, ?, ?)
  `).run(at.toISOString(), level, component, message, details ? JSON.stringify(details) : null);
}

export function getRecentSystemEvents(limit: number = 50): SystemEvent[] {
  const db = getDatabase();
  return db
    .prepare<[number], SystemEventRow>(`
      SELECT id, timestamp, level, component, message, details
      FROM system_logs
      ORDER BY timestamp DESC, id DESC
      LIMIT ?
    `)
    .all(limit)
    .map((row) => ({ ...row, details: parseDetails(row.details) }));
}
