import { errorMessage, ProviderQuotaExceeded, RunCancelled } from '../errors';
import type { RunWarning, WarningCode } from '../types/search';

/** Codes that mean the consumer should show "results may be incomplete". */
const INCOMPLETE_CODES: ReadonlySet<WarningCode> = new Set<WarningCode>([
  'COVERAGE_INCOMPLETE',
  'QUOTA_EXCEEDED',
  'RUN_CANCELLED',
  'DETAILS_UNAVAILABLE',
]);

/** Appends unless a warning with the same code and unit is already present. */
export function addWarning(warnings: RunWarning[], warning: RunWarning): void {
  const exists = warnings.some((w) => w.code === warning.code && w.unit === warning.unit);
  if (!exists) warnings.push(warning);
}

export function mergeWarnings(target: RunWarning[], source: readonly RunWarning[]): void {
  for (const warning of source) addWarning(target, warning);
}

/**
 * Quota and cancellation are run-wide and carry no unit; anything else is
 * pinned to the tile, page or place that failed.
 */
export function warningForFailure(err: unknown, unit: string): RunWarning {
  if (err instanceof ProviderQuotaExceeded) {
    return { code: 'QUOTA_EXCEEDED', message: 'Provider quota exceeded; results collected so far are returned' };
  }
  if (err instanceof RunCancelled) {
    return { code: 'RUN_CANCELLED', message: 'Run cancelled; results collected so far are returned' };
  }
  return { code: 'COVERAGE_INCOMPLETE', message: `${unit} skipped: ${errorMessage(err)}`, unit };
}

export function isComplete(warnings: readonly RunWarning[]): boolean {
  return !warnings.some((w) => INCOMPLETE_CODES.has(w.code));
}
