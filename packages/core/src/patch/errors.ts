/**
 * Patch Errors
 *
 * Failure taxonomy for patch extraction, application and repair.
 */

/**
 * The LLM response contained nothing that looks like a patch.
 * Not retried here: the caller decides whether to re-prompt from scratch.
 */
export class PatchExtractionError extends Error {
  readonly name = 'PatchExtractionError';

  constructor(message = 'LLM returned no patch') {
    super(message);
  }
}

/**
 * A patch could not be applied, or applied without changing any file.
 * Recoverable: drives the refinement loop.
 */
export class PatchApplyError extends Error {
  readonly name = 'PatchApplyError';
  readonly patchText: string;
  readonly details: string;
  readonly failurePath?: string;

  constructor(message: string, patchText: string, failurePath?: string) {
    super(message);
    this.patchText = patchText;
    this.details = message;
    this.failurePath = failurePath;
  }
}

/**
 * The whole-file rewrite fallback could not produce a usable diff.
 */
export class RewriteFallbackError extends Error {
  readonly name = 'RewriteFallbackError';
}

/**
 * Retries and the rewrite fallback are both spent.
 */
export class RefinementExhaustedError extends Error {
  readonly name = 'RefinementExhaustedError';
  readonly attempts: number;
  readonly lastError?: string;

  constructor(message: string, attempts: number, lastError?: string) {
    super(lastError ? `${message}: ${lastError}` : message);
    this.attempts = attempts;
    this.lastError = lastError;
  }
}
