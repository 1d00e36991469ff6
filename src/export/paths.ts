import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { formatFileStamp } from '@/core/time';
import type { AnalysisRun } from '@/analysis/types';

export type ExportKind = 'json' | 'csv' | 'excel';

export function ensureExportDir(outputDir: string, kind: ExportKind): string {
  const dir = join(outputDir, kind);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  return dir;
}

/** File-name stamp taken from the run start, so every export of a run shares it. */
export function runStamp(run: AnalysisRun): string {
  return formatFileStamp(new Date(run.calculation.startTime));
}
