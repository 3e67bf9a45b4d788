/**
 * Attempt state for one file-change application.
 * Owned by a single refinement run; never shared.
 */
export interface AttemptState {
  currentPatch: string;
  attemptsUsed: number;
  maxAttempts: number;
  rewriteAttempted: boolean;
  lastError?: string;
}

export function initialAttemptState(patchText: string, maxAttempts: number): AttemptState {
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new Error(`maxAttempts must be a positive integer, got ${maxAttempts}`);
  }
  return {
    currentPatch: patchText,
    attemptsUsed: 0,
    maxAttempts,
    rewriteAttempted: false
  };
}

export type RefinementEvent =
  | { type: 'APPLY_SUCCEEDED' }
  | { type: 'APPLY_FAILED'; error: string }
  | { type: 'PATCH_REFINED'; patchText: string }
  | { type: 'REWRITE_APPLIED' }
  | { type: 'REWRITE_FAILED'; error: string };

export type RefinementAction =
  | { type: 'apply' }
  | { type: 'refine'; error: string }
  | { type: 'rewrite' }
  | { type: 'succeeded'; via: 'patch' | 'rewrite' }
  | { type: 'exhausted'; reason: string };
