import { describe, expect, it } from 'vitest';
import { parseAnalysisArgs } from '@/run/cli_args';

describe('parseAnalysisArgs', () => {
  it('defaults to a refreshing run without extras', () => {
    expect(parseAnalysisArgs([])).toEqual({
      excel: false,
      status: false,
      cleanupDays: null,
      refresh: true,
      verbose: false,
    });
  });

  it('reads boolean flags', () => {
    expect(parseAnalysisArgs(['--excel', '--no-refresh', '-v'])).toEqual({
      excel: true,
      status: false,
      cleanupDays: null,
      refresh: false,
      verbose: true,
    });
    expect(parseAnalysisArgs(['--status']).status).toBe(true);
  });

  it('defaults a bare --cleanup to 90 days', () => {
    expect(parseAnalysisArgs(['--cleanup']).cleanupDays).toBe(90);
    expect(parseAnalysisArgs(['--cleanup', '--excel']).cleanupDays).toBe(90);
  });

  it('accepts a cleanup window in either form', () => {
    expect(parseAnalysisArgs(['--cleanup', '30']).cleanupDays).toBe(30);
    expect(parseAnalysisArgs(['--cleanup=14']).cleanupDays).toBe(14);
  });

  it('rejects an invalid cleanup window', () => {
    expect(() => parseAnalysisArgs(['--cleanup', 'soon'])).toThrow(
      '--cleanup expects a positive number of days, got "soon"'
    );
    expect(() => parseAnalysisArgs(['--cleanup=0'])).toThrow('got "0"');
  });
});
