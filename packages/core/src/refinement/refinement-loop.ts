/**
 * Refinement Loop
 *
 * Applies one patch with bounded repair: each failure is fed back to the
 * model for a corrected patch, and once the budget is spent a single
 * whole-file rewrite is tried before giving up.
 */

import { Logger } from '@nestjs/common';
import type { WorkingTreeReader } from '../git/working-tree';
import type { Plan } from '../llm/plan';
import type { ApplyOutcome, PatchApplier } from '../patch/applier';
import { PatchApplyError, RefinementExhaustedError, RewriteFallbackError } from '../patch/errors';
import { firstPatchOrRaw } from '../patch/extractor';
import { attemptFileRewrite, type FileRewriter } from '../patch/rewrite';
import type { ProgressEmitter } from '../workflow/progress';
import { initialAttemptState, type AttemptState, type RefinementAction } from './attempt-state';
import { transition } from './transition';

const logger = new Logger('RefinementLoop');

export const DEFAULT_MAX_ATTEMPTS = 3;

export interface PatchRefiner extends FileRewriter {
  refinePatch(
    issuePrompt: string,
    plan: Plan,
    repoContext: string,
    failedPatch: string,
    errorMessage: string
  ): Promise<string>;
}

export interface RefinementRequest {
  llm: PatchRefiner;
  applier: PatchApplier;
  tree: WorkingTreeReader;
  issuePrompt: string;
  plan: Plan;
  repoContext: string;
  patchText: string;
  maxAttempts?: number;
  emit?: ProgressEmitter;
}

export interface RefinementOutcome {
  via: 'patch' | 'rewrite';
  /** Apply attempts made, including the rewrite's. */
  applies: number;
  result: ApplyOutcome;
  state: AttemptState;
}

export async function applyWithRefinement(request: RefinementRequest): Promise<RefinementOutcome> {
  const emit: ProgressEmitter = request.emit ?? (() => undefined);
  const cwd = request.tree.root;

  let state = initialAttemptState(request.patchText, request.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
  let action: RefinementAction = { type: 'apply' };
  let result: ApplyOutcome | null = null;
  let applies = 0;

  for (;;) {
    switch (action.type) {
      case 'apply': {
        const attempt = state.attemptsUsed + 1;
        applies++;
        emit('patch_apply_start', { attempt });
        try {
          result = await request.applier.apply(state.currentPatch, cwd);
          emit('patch_apply_success', { attempt, strategy: result.strategy });
          ({ state, action } = transition(state, { type: 'APPLY_SUCCEEDED' }));
        } catch (error) {
          if (!(error instanceof PatchApplyError)) throw error;
          logger.warn(`Patch apply attempt ${attempt} failed: ${error.message}`);
          emit('patch_apply_error', { attempt, error: error.message });
          ({ state, action } = transition(state, { type: 'APPLY_FAILED', error: error.message }));
        }
        break;
      }

      case 'refine': {
        const response = await request.llm.refinePatch(
          request.issuePrompt,
          request.plan,
          request.repoContext,
          state.currentPatch,
          action.error
        );
        ({ state, action } = transition(state, { type: 'PATCH_REFINED', patchText: firstPatchOrRaw(response) }));
        emit('patch_refined', { attempt: state.attemptsUsed, afterRewrite: state.rewriteAttempted });
        break;
      }

      case 'rewrite': {
        const attempt = state.attemptsUsed;
        emit('patch_rewrite_start', { attempt });
        try {
          const rewrite = await attemptFileRewrite({
            llm: request.llm,
            tree: request.tree,
            issuePrompt: request.issuePrompt,
            plan: request.plan,
            patchText: state.currentPatch
          });

          applies++;
          emit('patch_apply_start', { attempt, strategy: 'rewrite', path: rewrite.path });
          try {
            result = await request.applier.apply(rewrite.patchText, cwd);
          } catch (error) {
            if (error instanceof PatchApplyError) {
              emit('patch_apply_error', { attempt, strategy: 'rewrite', error: error.message });
            }
            throw error;
          }

          emit('patch_rewrite_applied', { path: rewrite.path, strategy: result.strategy });
          ({ state, action } = transition(state, { type: 'REWRITE_APPLIED' }));
        } catch (error) {
          if (!(error instanceof PatchApplyError || error instanceof RewriteFallbackError)) throw error;
          logger.warn(`Rewrite fallback failed: ${error.message}`);
          emit('patch_rewrite_failed', { error: error.message });
          ({ state, action } = transition(state, { type: 'REWRITE_FAILED', error: error.message }));
        }
        break;
      }

      case 'succeeded': {
        if (result === null) {
          throw new Error('Refinement finished without an apply result');
        }
        return { via: action.via, applies, result, state };
      }

      case 'exhausted': {
        logger.error(`${action.reason} after ${applies} apply attempts`);
        throw new RefinementExhaustedError(action.reason, applies, state.lastError);
      }
    }
  }
}
