import type { AttemptState, RefinementAction, RefinementEvent } from './attempt-state';

export const EXHAUSTED_REASON = 'Rewrite already attempted and failed';

export type RefinementTransition = {
  state: AttemptState;
  action: RefinementAction;
};

/**
 * Pure, deterministic transition function.
 * No I/O - the executor performs the returned action and feeds back its outcome.
 *
 * Budget: maxAttempts applies, one rewrite, then one final apply.
 */
export function transition(state: AttemptState, event: RefinementEvent): RefinementTransition {
  switch (event.type) {
    case 'APPLY_SUCCEEDED':
      return { state, action: { type: 'succeeded', via: 'patch' } };

    case 'REWRITE_APPLIED':
      return { state: { ...state, rewriteAttempted: true }, action: { type: 'succeeded', via: 'rewrite' } };

    case 'PATCH_REFINED':
      return { state: { ...state, currentPatch: event.patchText }, action: { type: 'apply' } };

    case 'APPLY_FAILED': {
      const next: AttemptState = { ...state, attemptsUsed: state.attemptsUsed + 1, lastError: event.error };
      if (next.attemptsUsed < next.maxAttempts) {
        return { state: next, action: { type: 'refine', error: event.error } };
      }
      if (!next.rewriteAttempted) {
        return { state: next, action: { type: 'rewrite' } };
      }
      return { state: next, action: { type: 'exhausted', reason: EXHAUSTED_REASON } };
    }

    case 'REWRITE_FAILED': {
      // One more apply cycle: the next failure is immediately exhausted
      const next: AttemptState = {
        ...state,
        rewriteAttempted: true,
        attemptsUsed: state.maxAttempts - 1,
        lastError: event.error
      };
      return { state: next, action: { type: 'refine', error: event.error } };
    }
  }
}
