import { addWarning, isComplete, mergeWarnings, warningForFailure } from './warnings';
import { ProviderQuotaExceeded, ProviderTransientError, RunCancelled } from '../errors';
import type { RunWarning } from '../types/search';

describe('warnings', () => {
  it('skips a warning with the same code and unit', () => {
    const warnings: RunWarning[] = [];
    addWarning(warnings, { code: 'COVERAGE_INCOMPLETE', message: 'first', unit: 'tile-1' });
    addWarning(warnings, { code: 'COVERAGE_INCOMPLETE', message: 'second', unit: 'tile-1' });
    addWarning(warnings, { code: 'COVERAGE_INCOMPLETE', message: 'other tile', unit: 'tile-2' });

    expect(warnings.map((w) => w.message)).toEqual(['first', 'other tile']);
  });

  it('merges without duplicates', () => {
    const target: RunWarning[] = [{ code: 'QUOTA_EXCEEDED', message: 'a' }];
    mergeWarnings(target, [
      { code: 'QUOTA_EXCEEDED', message: 'b' },
      { code: 'LARGE_RADIUS', message: 'c' },
    ]);
    expect(target.map((w) => w.message)).toEqual(['a', 'c']);
  });

  it('maps failures to run-wide or unit warnings', () => {
    expect(warningForFailure(new ProviderQuotaExceeded(), 'tile-3').code).toBe('QUOTA_EXCEEDED');
    expect(warningForFailure(new ProviderQuotaExceeded(), 'tile-3').unit).toBeUndefined();
    expect(warningForFailure(new RunCancelled(), 'tile-3').code).toBe('RUN_CANCELLED');
    expect(warningForFailure(new ProviderTransientError('timeout'), 'tile-3')).toEqual({
      code: 'COVERAGE_INCOMPLETE',
      message: 'tile-3 skipped: timeout',
      unit: 'tile-3',
    });
  });

  it('treats informational warnings as complete', () => {
    expect(isComplete([])).toBe(true);
    expect(isComplete([{ code: 'LARGE_RADIUS', message: '' }, { code: 'NO_RESULTS_IN_RADIUS', message: '' }])).toBe(true);
    expect(isComplete([{ code: 'DETAILS_UNAVAILABLE', message: '', unit: 'P1' }])).toBe(false);
  });
});
