/**
 * Whole-file rewrite fallback.
 *
 * When hunk patches keep being rejected, ask the model for the complete
 * corrected file and derive a diff from it. Cannot create new files.
 */

import { WorkingTreeError, type WorkingTreeReader } from '../git/working-tree';
import type { Plan } from '../llm/plan';
import { generateUnifiedDiff } from './diff-generator';
import { isNoFile, parseDiffFiles } from './diff-files';
import { RewriteFallbackError } from './errors';
import { extractCodeBlock } from './extractor';
import { normalizePatch } from './normalizer';

export interface FileRewriter {
  rewriteFile(issuePrompt: string, plan: Plan, filePath: string, currentText: string): Promise<string>;
}

export interface RewriteRequest {
  llm: FileRewriter;
  tree: WorkingTreeReader;
  issuePrompt: string;
  plan: Plan;
  patchText: string;
}

export interface RewriteResult {
  path: string;
  patchText: string;
}

export async function attemptFileRewrite(request: RewriteRequest): Promise<RewriteResult> {
  const [first] = parseDiffFiles(normalizePatch(request.patchText));
  if (first === undefined || isNoFile(first.newPath)) {
    throw new RewriteFallbackError('Unable to determine target file for rewrite fallback');
  }

  const target = first.newPath;
  const currentText = await readTarget(request.tree, target);
  const response = await request.llm.rewriteFile(request.issuePrompt, request.plan, target, currentText);

  let newText = extractCodeBlock(response);
  // Fence extraction trims the final newline the file had
  if (currentText.endsWith('\n') && !newText.endsWith('\n')) {
    newText += '\n';
  }

  const diff = generateUnifiedDiff(target, currentText, newText);
  if (!diff.patch) {
    throw new RewriteFallbackError('Rewrite produced no changes');
  }

  return { path: target, patchText: diff.patch };
}

// Target paths come from model output and may point anywhere
async function readTarget(tree: WorkingTreeReader, target: string): Promise<string> {
  let exists: boolean;
  try {
    exists = await tree.exists(target);
  } catch (error) {
    if (error instanceof WorkingTreeError) {
      throw new RewriteFallbackError(`Unable to determine target file for rewrite fallback: ${error.message}`);
    }
    throw error;
  }
  if (!exists) {
    throw new RewriteFallbackError(`Cannot rewrite missing file: ${target}`);
  }

  try {
    return await tree.readText(target);
  } catch (error) {
    throw new RewriteFallbackError(`Cannot read ${target}: ${error instanceof Error ? error.message : String(error)}`);
  }
}
