/**
 * Diff Generator
 *
 * Generates git-style unified diffs between two versions of a file.
 * Uses the 'diff' library for the hunks and formats them itself so the
 * output carries a `diff --git` header and no separator or timestamp lines.
 */

import { structuredPatch, type Hunk } from 'diff';

export interface DiffOptions {
  contextLines?: number; // Number of context lines (default: 3)
}

export interface GeneratedDiff {
  patch: string;
  additions: number;
  deletions: number;
  hunks: number;
}

function formatHunk(hunk: Hunk): string[] {
  // Empty ranges are written as starting one line earlier, as git does
  const oldStart = hunk.oldLines === 0 ? hunk.oldStart - 1 : hunk.oldStart;
  const newStart = hunk.newLines === 0 ? hunk.newStart - 1 : hunk.newStart;
  return [`@@ -${oldStart},${hunk.oldLines} +${newStart},${hunk.newLines} @@`, ...hunk.lines];
}

/**
 * Generate a diff that turns `oldContent` into `newContent` at `path`.
 * An empty `patch` means the contents are identical.
 */
export function generateUnifiedDiff(
  path: string,
  oldContent: string,
  newContent: string,
  options: DiffOptions = {}
): GeneratedDiff {
  const structured = structuredPatch(`a/${path}`, `b/${path}`, oldContent, newContent, undefined, undefined, {
    context: options.contextLines ?? 3
  });

  if (structured.hunks.length === 0) {
    return { patch: '', additions: 0, deletions: 0, hunks: 0 };
  }

  let additions = 0;
  let deletions = 0;
  const body: string[] = [];
  for (const hunk of structured.hunks) {
    for (const line of hunk.lines) {
      if (line.startsWith('+')) additions++;
      else if (line.startsWith('-')) deletions++;
    }
    body.push(...formatHunk(hunk));
  }

  const patch = [`diff --git a/${path} b/${path}`, `--- a/${path}`, `+++ b/${path}`, ...body].join('\n') + '\n';

  return {
    patch,
    additions,
    deletions,
    hunks: structured.hunks.length
  };
}
