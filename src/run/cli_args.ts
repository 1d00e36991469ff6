/**
 * Argument parsing for scripts/run_analysis.ts
 */

export interface AnalysisCliArgs {
  excel: boolean;
  status: boolean;
  cleanupDays: number | null;
  refresh: boolean;
  verbose: boolean;
}

function readValue(argv: readonly string[], flag: string): string | undefined {
  const equalsArg = argv.find((arg) => arg.startsWith(`${flag}=`));
  if (equalsArg) return equalsArg.slice(flag.length + 1);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    const next = argv[index + 1];
    return next !== undefined && !next.startsWith('--') ? next : '';
  }
  return undefined;
}

export function parseAnalysisArgs(argv: readonly string[]): AnalysisCliArgs {
  const cleanupRaw = readValue(argv, '--cleanup');
  let cleanupDays: number | null = null;
  if (cleanupRaw !== undefined) {
    const parsed = cleanupRaw === '' ? 90 : Number(cleanupRaw);
    if (!Number.isInteger(parsed) || parsed < 1) {
      throw new Error(`--cleanup expects a positive number of days, got "${cleanupRaw}"`);
    }
    cleanupDays = parsed;
  }

  return {
    excel: argv.includes('--excel'),
    status: argv.includes('--status'),
    cleanupDays,
    refresh: !argv.includes('--no-refresh'),
    verbose: argv.includes('--verbose') || argv.includes('-v'),
  };
}
