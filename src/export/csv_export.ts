/**
 * CSV exports: per-side indicator tables, a run summary and an appending
 * history file per side.
 */

import { appendFileSync, existsSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { createChildLogger } from '@/utils/logger';
import type { AnalysisRun } from '@/analysis/types';
import { isCompositeFailure, type SideAnalysis } from '@/composer/types';
import type { IndicatorResult, Side } from '@/indicators/types';
import { ensureExportDir, runStamp } from './paths';

const logger = createChildLogger('csv_export');

export const INDICATOR_COLUMNS = [
  'indicator_name',
  'indicator_type',
  'raw_value',
  'normalized_score',
  'weight',
  'bounds_lower',
  'bounds_upper',
  'timestamp',
  'success',
  'error_message',
] as const;

export const HISTORY_BASE_COLUMNS = [
  'timestamp',
  'composite_score',
  'signal_strength',
  'success_rate',
] as const;

export interface CsvExportPaths {
  bottom: string;
  top: string;
  summary: string;
  history: Record<Side, string>;
}

export function escapeCsv(value: unknown): string {
  if (value === null || value === undefined) return '';
  const str = String(value);
  if (str.includes(',') || str.includes('\n') || str.includes('\r') || str.includes('"')) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

export function toCsvLine(values: readonly unknown[]): string {
  return values.map(escapeCsv).join(',');
}

export function toCsv(headers: readonly string[], rows: readonly (readonly unknown[])[]): string {
  return [toCsvLine(headers), ...rows.map(toCsvLine)].join('\n') + '\n';
}

export function indicatorRows(results: readonly IndicatorResult[]): unknown[][] {
  return results.map((result) => [
    result.name,
    result.side,
    result.rawValue,
    result.normalizedScore,
    result.weight,
    result.bounds?.lower ?? null,
    result.bounds?.upper ?? null,
    result.timestamp,
    result.normalizedScore !== null,
    result.error ?? null,
  ]);
}

function sideIndicators(analysis: SideAnalysis): IndicatorResult[] {
  return isCompositeFailure(analysis) ? [] : analysis.indicators;
}

export function summaryRows(run: AnalysisRun): unknown[][] {
  const rows: unknown[][] = [
    ['Run ID', run.runId],
    ['Symbol', run.symbol],
    ['Start Time', run.calculation.startTime],
    ['Duration (s)', run.calculation.durationSeconds],
    ['Data Refreshed', run.calculation.dataRefreshed],
  ];

  for (const analysis of [run.bottom, run.top]) {
    const label = analysis.side === 'bottom' ? 'Bottom' : 'Top';
    if (isCompositeFailure(analysis)) {
      rows.push([`${label} Status`, analysis.status], [`${label} Error`, analysis.error]);
      continue;
    }
    rows.push(
      [`${label} Status`, analysis.status],
      [`${label} Composite Score`, analysis.compositeScore],
      [`${label} Signal Strength`, analysis.interpretation?.strength ?? null],
      [`${label} Success Rate`, analysis.dataQuality.successRate]
    );
  }

  rows.push(['Current Price', run.marketContext.currentPrice]);
  return rows;
}

/**
 * One history row for `analysis`, laid out to match `header`. Columns the
 * header does not know about are dropped; missing ones stay empty.
 */
export function historyRow(
  run: AnalysisRun,
  analysis: SideAnalysis,
  header: readonly string[]
): unknown[] {
  const values = new Map<string, unknown>([['timestamp', run.calculation.startTime]]);
  if (!isCompositeFailure(analysis)) {
    values.set('composite_score', analysis.compositeScore);
    values.set('signal_strength', analysis.interpretation?.strength ?? null);
    values.set('success_rate', analysis.dataQuality.successRate);
    for (const result of analysis.indicators) {
      values.set(`${result.name}_score`, result.normalizedScore);
    }
  }
  return header.map((column) => values.get(column) ?? null);
}

export function historyHeader(analysis: SideAnalysis): string[] {
  return [
    ...HISTORY_BASE_COLUMNS,
    ...sideIndicators(analysis).map((result) => `${result.name}_score`),
  ];
}

function appendHistory(dir: string, run: AnalysisRun, analysis: SideAnalysis): string {
  const filePath = join(dir, `historical_${analysis.side}.csv`);

  if (!existsSync(filePath)) {
    const header = historyHeader(analysis);
    writeFileSync(filePath, toCsv(header, [historyRow(run, analysis, header)]), 'utf-8');
    return filePath;
  }

  const [firstLine] = readFileSync(filePath, 'utf-8').split('\n');
  const header = firstLine.split(',');
  appendFileSync(filePath, toCsvLine(historyRow(run, analysis, header)) + '\n', 'utf-8');
  return filePath;
}

export function writeRunCsv(run: AnalysisRun, outputDir: string): CsvExportPaths {
  const dir = ensureExportDir(outputDir, 'csv');
  const stamp = runStamp(run);

  const bottom = join(dir, `bottom_indicators_${stamp}.csv`);
  writeFileSync(bottom, toCsv(INDICATOR_COLUMNS, indicatorRows(sideIndicators(run.bottom))), 'utf-8');

  const top = join(dir, `top_indicators_${stamp}.csv`);
  writeFileSync(top, toCsv(INDICATOR_COLUMNS, indicatorRows(sideIndicators(run.top))), 'utf-8');

  const summary = join(dir, `summary_${stamp}.csv`);
  writeFileSync(summary, toCsv(['Metric', 'Value'], summaryRows(run)), 'utf-8');

  const history = {
    bottom: appendHistory(dir, run, run.bottom),
    top: appendHistory(dir, run, run.top),
  };

  logger.info({ runId: run.runId, dir }, 'CSV exports written');
  return { bottom, top, summary, history };
}
