/**
 * Patch Normalizer
 *
 * LLMs routinely emit hunk headers whose declared line counts disagree with
 * the body that follows, which strict appliers reject. Normalization
 * recounts every hunk and rewrites headers that are off. Total: never throws.
 */

export interface HunkHeader {
  oldStart: number;
  oldCount: number;
  newStart: number;
  newCount: number;
  trailingContext: string;
}

const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@(.*)$/;
const NO_NEWLINE_MARKER = '\\ No newline at end of file';

export function parseHunkHeader(line: string): HunkHeader | null {
  const match = HUNK_HEADER.exec(line);
  if (!match) return null;

  return {
    oldStart: parseInt(match[1], 10),
    oldCount: match[2] === undefined ? 1 : parseInt(match[2], 10),
    newStart: parseInt(match[3], 10),
    newCount: match[4] === undefined ? 1 : parseInt(match[4], 10),
    trailingContext: match[5] ?? ''
  };
}

export function formatHunkHeader(header: HunkHeader): string {
  return `@@ -${header.oldStart},${header.oldCount} +${header.newStart},${header.newCount} @@${header.trailingContext}`;
}

function isFileHeaderAt(lines: string[], index: number): boolean {
  const line = lines[index];
  if (line.startsWith('diff --git ')) return true;
  return line.startsWith('--- ') && index + 1 < lines.length && lines[index + 1].startsWith('+++ ');
}

/**
 * Count the old/new lines of the hunk body starting at `start`.
 * Stops at the next hunk header or file header.
 */
export function countHunkBody(lines: string[], start: number): { oldCount: number; newCount: number } {
  let oldCount = 0;
  let newCount = 0;

  for (let j = start; j < lines.length; j++) {
    const line = lines[j];
    if (HUNK_HEADER.test(line) || isFileHeaderAt(lines, j)) break;
    if (line.startsWith(NO_NEWLINE_MARKER)) continue;

    if (line.startsWith('+')) {
      if (!line.startsWith('+++')) newCount++;
    } else if (line.startsWith('-')) {
      if (!line.startsWith('---')) oldCount++;
    } else {
      // Context; LLMs often drop the leading space on blank lines
      oldCount++;
      newCount++;
    }
  }

  return { oldCount, newCount };
}

export function normalizePatch(patchText: string): string {
  const sanitized = patchText.replace(/\r\n/g, '\n').replace(/\r/g, '\n').replace(/\n+$/, '');
  const lines = sanitized.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const header = parseHunkHeader(lines[i]);
    if (!header) continue;

    const counted = countHunkBody(lines, i + 1);
    if (counted.oldCount !== header.oldCount || counted.newCount !== header.newCount) {
      lines[i] = formatHunkHeader({ ...header, ...counted });
    }
  }

  return `${lines.join('\n')}\n`;
}
