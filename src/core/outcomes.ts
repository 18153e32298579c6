/**
 * Per-item outcome records shared by the build and sync phases
 *
 * Batches never stop on the first failure: each item gets an outcome and the
 * caller aggregates.
 */

export type OutcomeStatus = 'success' | 'failed' | 'skipped' | 'planned';

export interface ItemOutcome {
  path: string;
  status: OutcomeStatus;
  reason?: string;
  detail?: Record<string, unknown>;
}

export function succeeded(path: string, detail?: Record<string, unknown>): ItemOutcome {
  return detail ? { path, status: 'success', detail } : { path, status: 'success' };
}

export function failed(path: string, reason: string, detail?: Record<string, unknown>): ItemOutcome {
  return detail ? { path, status: 'failed', reason, detail } : { path, status: 'failed', reason };
}

export function skipped(path: string, reason: string): ItemOutcome {
  return { path, status: 'skipped', reason };
}

export function planned(path: string, detail?: Record<string, unknown>): ItemOutcome {
  return detail ? { path, status: 'planned', detail } : { path, status: 'planned' };
}

export function countFailures(outcomes: readonly ItemOutcome[]): number {
  return outcomes.filter(outcome => outcome.status === 'failed').length;
}
