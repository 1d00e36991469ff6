import { writeFileSync } from 'fs';
import { join } from 'path';
import { createChildLogger } from '@/utils/logger';
import type { AnalysisRun } from '@/analysis/types';
import { ensureExportDir, runStamp } from './paths';

const logger = createChildLogger('json_export');

export function writeRunJson(run: AnalysisRun, outputDir: string): string {
  const filePath = join(ensureExportDir(outputDir, 'json'), `cycle_scores_${runStamp(run)}.json`);
  writeFileSync(filePath, JSON.stringify(run, null, 2), 'utf-8');
  logger.info({ runId: run.runId, filePath }, 'Run JSON written');
  return filePath;
}
