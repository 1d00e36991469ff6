/**
 * One scheduled or manual calculation: analyse, persist, export.
 * The database must already be initialized.
 */

import { createChildLogger } from '@/utils/logger';
import { errorMessage } from '@/utils/errors';
import { isRunFailure, type AnalysisRun } from '@/analysis/types';
import { isCompositeFailure, type SideAnalysis } from '@/composer/types';
import { recordDataSourceStatus, storeAnalysisRun } from '@/data/repositories/calculation_repo';
import { logSystemEvent } from '@/data/repositories/system_log_repo';
import { writeRunCsv } from '@/export/csv_export';
import { createExcelReport } from '@/export/excel_report';
import { writeRunJson } from '@/export/json_export';
import type { Runtime } from './runtime';

const logger = createChildLogger('pipeline');
const COMPONENT = 'pipeline';

export interface PipelineOptions {
  refreshData?: boolean;
  excel?: boolean;
}

function scoreOf(analysis: SideAnalysis): number | null {
  return isCompositeFailure(analysis) ? null : analysis.compositeScore;
}

async function exportRun(run: AnalysisRun, outputDir: string, excel: boolean): Promise<string[]> {
  const written: string[] = [];
  const attempts: Array<[string, () => Promise<string[]>]> = [
    ['json', async () => [writeRunJson(run, outputDir)]],
    [
      'csv',
      async () => {
        const paths = writeRunCsv(run, outputDir);
        return [paths.bottom, paths.top, paths.summary];
      },
    ],
  ];
  if (excel) {
    attempts.push(['excel', async () => [await createExcelReport(run, outputDir)]]);
  }

  for (const [kind, attempt] of attempts) {
    try {
      written.push(...(await attempt()));
    } catch (error) {
      const message = errorMessage(error);
      logger.warn({ kind, error: message }, 'Export failed');
      logSystemEvent('WARNING', COMPONENT, `${kind} export failed`, { runId: run.runId, error: message });
    }
  }
  return written;
}

/**
 * Returns true when the analysis completed and was stored. Export
 * failures are logged but do not fail the run.
 */
export async function executeRun(runtime: Runtime, options: PipelineOptions = {}): Promise<boolean> {
  const refreshData = options.refreshData ?? true;
  logSystemEvent('INFO', COMPONENT, 'Calculation started', { refreshData });

  const outcome = await runtime.coordinator.run({ refreshData });
  if (isRunFailure(outcome)) {
    logSystemEvent('ERROR', COMPONENT, 'Calculation failed', {
      runId: outcome.runId,
      error: outcome.error,
    });
    return false;
  }

  try {
    storeAnalysisRun(outcome);
    if (outcome.calculation.refresh) {
      recordDataSourceStatus(runtime.provider.name, outcome.calculation.refresh);
    }
  } catch (error) {
    const message = errorMessage(error);
    logger.error({ runId: outcome.runId, error: message }, 'Failed to store analysis run');
    logSystemEvent('ERROR', COMPONENT, 'Storing calculation failed', {
      runId: outcome.runId,
      error: message,
    });
    return false;
  }

  const files = await exportRun(outcome, runtime.config.storage.outputDir, options.excel ?? false);

  logSystemEvent('INFO', COMPONENT, 'Calculation completed', {
    runId: outcome.runId,
    bottomScore: scoreOf(outcome.bottom),
    topScore: scoreOf(outcome.top),
    durationSeconds: outcome.calculation.durationSeconds,
    files: files.length,
  });
  logger.info({ runId: outcome.runId, files }, 'Pipeline finished');
  return true;
}
