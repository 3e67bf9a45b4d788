/**
 * Patch Extractor
 *
 * Pulls candidate unified diffs out of free-form LLM output. A fence that
 * holds diffs for several files yields one patch per file, since retry and
 * rewrite operate on a single file change at a time.
 */

const PATCH_BLOCK = /```(?:patch|diff)?\n([\s\S]*?)```/g;
const FILE_SPLIT = /(diff --git [\s\S]*?)(?=diff --git |$)/g;
const CODE_FENCE = /```[\w+#.-]*\n([\s\S]*?)```/;

/**
 * Split text into one chunk per `diff --git` header.
 */
export function splitByFile(text: string): string[] {
  const chunks: string[] = [];
  for (const match of text.matchAll(FILE_SPLIT)) {
    const chunk = match[1].trim();
    if (chunk) chunks.push(chunk);
  }
  return chunks;
}

export function extractPatches(response: string): string[] {
  const patches: string[] = [];

  for (const match of response.matchAll(PATCH_BLOCK)) {
    const block = match[1].trim();
    if (block.startsWith('diff --git')) {
      patches.push(...splitByFile(block));
    } else if (block) {
      patches.push(block);
    }
  }
  if (patches.length > 0) {
    return patches;
  }

  const stripped = response.trim();
  if (stripped.startsWith('---') || stripped.startsWith('diff --git')) {
    const chunks = splitByFile(stripped);
    return chunks.length > 0 ? chunks : [stripped];
  }

  // Bare fence the block pattern could not close, e.g. an unterminated ```
  if (stripped.startsWith('```')) {
    const unfenced = stripped.replace(/^```(?:[\w+#.-]*\n)?/, '').replace(/`+$/, '').trim();
    return unfenced ? [unfenced] : [];
  }

  return [];
}

/**
 * First extracted patch, or the stripped response when nothing matched.
 */
export function firstPatchOrRaw(response: string): string {
  const patches = extractPatches(response);
  return patches.length > 0 ? patches[0] : response.trim();
}

/**
 * Literal content of the first fenced block, or the trimmed text when
 * there is no fence.
 */
export function extractCodeBlock(text: string): string {
  const match = CODE_FENCE.exec(text);
  if (match) {
    return match[1].trim();
  }
  return text.trim();
}
