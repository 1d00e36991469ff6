/**
 * Time utilities for consistent date handling
 */

import { format, subDays, subHours } from 'date-fns';

/** Milliseconds since epoch; injectable so cache expiry is testable. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export function toIsoTimestamp(epochMs: number): string {
  return new Date(epochMs).toISOString();
}

export function formatFileStamp(date: Date): string {
  return format(date, 'yyyyMMdd_HHmmss');
}

export function getRunId(date: Date, hash: string): string {
  return `${format(date, "yyyy-MM-dd'T'HHmmss")}__${hash.substring(0, 8)}`;
}

export function minutesToMs(minutes: number): number {
  return minutes * 60 * 1000;
}

export function ageInMinutes(fromMs: number, nowMs: number): number {
  return (nowMs - fromMs) / 60_000;
}

/**
 * An entry is fresh while 0 <= age < maxAge. Future timestamps are never fresh.
 */
export function isWithinMaxAge(fetchedAtMs: number, maxAgeMs: number, nowMs: number): boolean {
  const age = nowMs - fetchedAtMs;
  return age >= 0 && age < maxAgeMs;
}

export function hoursAgoIso(hours: number, now: Date = new Date()): string {
  return subHours(now, hours).toISOString();
}

export function daysAgoIso(days: number, now: Date = new Date()): string {
  return subDays(now, days).toISOString();
}
