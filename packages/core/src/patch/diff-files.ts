/**
 * Diff File Headers
 *
 * Reads `diff --git a/<old> b/<new>` file headers out of a unified diff.
 */

import path from 'path';

export const NO_FILE = '/dev/null';

export interface FileDiffHeader {
  oldPath: string;
  newPath: string;
}

const DIFF_FILE_PATTERN = /^diff --git a\/(.+) b\/(.+)$/gm;

/**
 * The header regex drops the `a/` `b/` prefix, so `a/dev/null` arrives as `dev/null`.
 */
export function isNoFile(filePath: string): boolean {
  return filePath === NO_FILE || `/${filePath}` === NO_FILE;
}

/**
 * Parse every file header in order of appearance.
 */
export function parseDiffFiles(patchText: string): FileDiffHeader[] {
  const files: FileDiffHeader[] = [];
  for (const match of patchText.matchAll(DIFF_FILE_PATTERN)) {
    files.push({ oldPath: match[1], newPath: match[2] });
  }
  return files;
}

/**
 * Relative paths a patch touches, old and new sides, without the
 * "no file" sentinel and without duplicates.
 */
export function patchTargetPaths(patchText: string): string[] {
  const targets = new Set<string>();
  for (const { oldPath, newPath } of parseDiffFiles(patchText)) {
    if (oldPath && !isNoFile(oldPath)) targets.add(oldPath);
    if (newPath && !isNoFile(newPath)) targets.add(newPath);
  }
  return [...targets];
}

/**
 * Whether `relativePath` resolves to somewhere under `root`.
 */
export function isWithinRoot(root: string, relativePath: string): boolean {
  const relative = path.relative(path.resolve(root), path.resolve(root, relativePath));
  return relative !== '' && relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
}
