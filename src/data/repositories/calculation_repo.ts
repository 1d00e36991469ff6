/**
 * Calculation repository: stores analysis runs as immutable snapshots and
 * answers the history and status queries.
 */

import { statSync } from 'fs';
import { getDatabase, MEMORY_DATABASE } from '../db';
import { createChildLogger } from '@/utils/logger';
import { daysAgoIso, hoursAgoIso } from '@/core/time';
import type { AnalysisRun } from '@/analysis/types';
import { isCompositeFailure, type SideAnalysis } from '@/composer/types';
import type { IndicatorResult, Side } from '@/indicators/types';
import type { RefreshReport } from '@/market/types';

const logger = createChildLogger('calculation_repo');

export interface StoredRunIds {
  bottomId: number;
  topId: number;
}

export interface CalculationRecord {
  id: number;
  runId: string;
  timestamp: string;
  calculationType: Side;
  status: string;
  compositeScore: number | null;
  signalStrength: string | null;
  dataQualityScore: number | null;
  durationSeconds: number | null;
}

export interface IndicatorHistoryPoint {
  timestamp: string;
  calculationType: Side;
  rawValue: number | null;
  normalizedScore: number | null;
  weight: number;
  success: boolean;
  errorMessage: string | null;
}

export interface DataSourceStatusRecord {
  sourceName: string;
  timeframe: string;
  lastUpdate: string;
  status: 'ok' | 'failed';
}

export interface CleanupResult {
  calculations: number;
  indicatorResults: number;
  systemLogs: number;
  dataSources: number;
}

export interface DatabaseStats {
  calculations: number;
  indicatorResults: number;
  systemLogs: number;
  dataSources: number;
  recentCalculations24h: number;
  fileSizeBytes: number | null;
}

interface IndicatorHistoryRow {
  timestamp: string;
  calculationType: Side;
  rawValue: number | null;
  normalizedScore: number | null;
  weight: number;
  success: number;
  errorMessage: string | null;
}

interface CountRow {
  count: number;
}

const CALCULATION_COLUMNS = `
  id,
  run_id AS runId,
  timestamp,
  calculation_type AS calculationType,
  status,
  composite_score AS compositeScore,
  signal_strength AS signalStrength,
  data_quality_score AS dataQualityScore,
  duration_seconds AS durationSeconds
`;

function insertCalculation(run: AnalysisRun, analysis: SideAnalysis): number {
  const db = getDatabase();
  const stmt = db.prepare(`
    INSERT INTO calculations (
      run_id, timestamp, calculation_type, status, composite_score,
      signal_strength, data_quality_score, duration_seconds, raw_data
    )
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);

  const failed = isCompositeFailure(analysis);
  const info = stmt.run(
    run.runId,
    run.calculation.startTime,
    analysis.side,
    analysis.status,
    failed ? null : analysis.compositeScore,
    failed ? null : analysis.interpretation?.strength ?? null,
    failed ? null : analysis.dataQuality.successRate,
    run.calculation.durationSeconds,
    JSON.stringify(analysis)
  );
  return Number(info.lastInsertRowid);
}

function insertIndicatorResults(calculationId: number, results: readonly IndicatorResult[]): void {
  const db = getDatabase();
  const stmt = db.prepare(`
    INSERT INTO indicator_results (
      calculation_id, indicator_name, indicator_type, raw_value, normalized_score,
      weight, bounds_lower, bounds_upper, timestamp, success, error_message
    )
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);

  for (const result of results) {
    stmt.run(
      calculationId,
      result.name,
      result.side,
      result.rawValue,
      result.normalizedScore,
      result.weight,
      result.bounds?.lower ?? null,
      result.bounds?.upper ?? null,
      result.timestamp,
      result.normalizedScore !== null ? 1 : 0,
      result.error ?? null
    );
  }
}

/**
 * Persist both sides of a run plus every indicator result in one transaction.
 */
export function storeAnalysisRun(run: AnalysisRun): StoredRunIds {
  const db = getDatabase();

  const store = db.transaction((snapshot: AnalysisRun): StoredRunIds => {
    const ids: Record<Side, number> = { bottom: 0, top: 0 };
    for (const analysis of [snapshot.bottom, snapshot.top]) {
      const id = insertCalculation(snapshot, analysis);
      ids[analysis.side] = id;
      if (!isCompositeFailure(analysis)) {
        insertIndicatorResults(id, analysis.indicators);
      }
    }
    return { bottomId: ids.bottom, topId: ids.top };
  });

  const ids = store(run);
  logger.info({ runId: run.runId, ...ids }, 'Analysis run stored');
  return ids;
}

export function getRecentCalculations(
  hours: number = 24,
  side?: Side,
  now: Date = new Date()
): CalculationRecord[] {
  const db = getDatabase();
  const since = hoursAgoIso(hours, now);

  if (side) {
    return db
      .prepare<[string, Side], CalculationRecord>(`
        SELECT ${CALCULATION_COLUMNS}
        FROM calculations
        WHERE timestamp >= ? AND calculation_type = ?
        ORDER BY timestamp DESC, id DESC
      `)
      .all(since, side);
  }

  return db
    .prepare<[string], CalculationRecord>(`
      SELECT ${CALCULATION_COLUMNS}
      FROM calculations
      WHERE timestamp >= ?
      ORDER BY timestamp DESC, id DESC
    `)
    .all(since);
}

export function getIndicatorHistory(
  indicatorName: string,
  days: number = 30,
  now: Date = new Date()
): IndicatorHistoryPoint[] {
  const db = getDatabase();
  const rows = db
    .prepare<[string, string], IndicatorHistoryRow>(`
      SELECT
        c.timestamp AS timestamp,
        r.indicator_type AS calculationType,
        r.raw_value AS rawValue,
        r.normalized_score AS normalizedScore,
        r.weight AS weight,
        r.success AS success,
        r.error_message AS errorMessage
      FROM indicator_results r
      JOIN calculations c ON c.id = r.calculation_id
      WHERE r.indicator_name = ? AND c.timestamp >= ?
      ORDER BY c.timestamp ASC, r.id ASC
    `)
    .all(indicatorName, daysAgoIso(days, now));

  return rows.map((row) => ({ ...row, success: row.success === 1 }));
}

export function recordDataSourceStatus(
  sourceName: string,
  report: RefreshReport,
  at: Date = new Date()
): void {
  const db = getDatabase();
  const stmt = db.prepare(`
    INSERT INTO data_sources_status (source_name, timeframe, last_update, status, error_message)
    VALUES (?, ?, ?, ?, ?)
  `);
  const lastUpdate = at.toISOString();

  const record = db.transaction(() => {
    for (const timeframe of report.refreshed) {
      stmt.run(sourceName, timeframe, lastUpdate, 'ok', null);
    }
    for (const timeframe of report.failed) {
      stmt.run(sourceName, timeframe, lastUpdate, 'failed', 'refresh failed');
    }
  });
  record();
}

/** Latest status row per source and timeframe. */
export function getLatestDataSourceStatus(): DataSourceStatusRecord[] {
  const db = getDatabase();
  return db
    .prepare<[], DataSourceStatusRecord>(`
      SELECT
        s.source_name AS sourceName,
        s.timeframe AS timeframe,
        s.last_update AS lastUpdate,
        s.status AS status
      FROM data_sources_status s
      WHERE s.id = (
        SELECT MAX(inner_s.id)
        FROM data_sources_status inner_s
        WHERE inner_s.source_name = s.source_name AND inner_s.timeframe = s.timeframe
      )
      ORDER BY s.source_name, s.timeframe
    `)
    .all();
}

export function cleanupOldData(days: number = 90, now: Date = new Date()): CleanupResult {
  const db = getDatabase();
  const cutoff = daysAgoIso(days, now);

  const cleanup = db.transaction((): CleanupResult => {
    const indicatorResults = db
      .prepare(`
        DELETE FROM indicator_results
        WHERE calculation_id IN (SELECT id FROM calculations WHERE timestamp < ?)
      `)
      .run(cutoff).changes;
    const calculations = db.prepare('DELETE FROM calculations WHERE timestamp < ?').run(cutoff).changes;
    const systemLogs = db.prepare('DELETE FROM system_logs WHERE timestamp < ?').run(cutoff).changes;
    const dataSources = db
      .prepare('DELETE FROM data_sources_status WHERE last_update < ?')
      .run(cutoff).changes;
    return { calculations, indicatorResults, systemLogs, dataSources };
  });

  const result = cleanup();
  logger.info({ days, cutoff, ...result }, 'Old data cleaned up');
  return result;
}

const STAT_TABLES = {
  calculations: 'calculations',
  indicatorResults: 'indicator_results',
  systemLogs: 'system_logs',
  dataSources: 'data_sources_status',
} as const;

function countRows(table: (typeof STAT_TABLES)[keyof typeof STAT_TABLES]): number {
  const row = getDatabase().prepare<[], CountRow>(`SELECT COUNT(*) AS count FROM ${table}`).get();
  return row?.count ?? 0;
}

export function getDatabaseStats(now: Date = new Date()): DatabaseStats {
  const db = getDatabase();
  const recent = db
    .prepare<[string], CountRow>('SELECT COUNT(*) AS count FROM calculations WHERE timestamp >= ?')
    .get(hoursAgoIso(24, now));

  return {
    calculations: countRows(STAT_TABLES.calculations),
    indicatorResults: countRows(STAT_TABLES.indicatorResults),
    systemLogs: countRows(STAT_TABLES.systemLogs),
    dataSources: countRows(STAT_TABLES.dataSources),
    recentCalculations24h: recent?.count ?? 0,
    fileSizeBytes: db.memory || db.name === MEMORY_DATABASE ? null : statSync(db.name).size,
  };
}
