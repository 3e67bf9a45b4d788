import { extractCodeBlock, extractPatches, firstPatchOrRaw, splitByFile } from '@core/patch/extractor';

const X_PATCH = [
  'diff --git a/x.py b/x.py',
  '--- a/x.py',
  '+++ b/x.py',
  '@@ -1,1 +1,1 @@',
  '-old',
  '+new'
].join('\n');

const A_PATCH = ['diff --git a/a.ts b/a.ts', '--- a/a.ts', '+++ b/a.ts', '@@ -1 +1 @@', '-const a = 1;', '+const a = 2;'].join(
  '\n'
);

const B_PATCH = ['diff --git a/b.ts b/b.ts', '--- a/b.ts', '+++ b/b.ts', '@@ -2 +2 @@', '-return b;', '+return b + 1;'].join(
  '\n'
);

describe('extractPatches', () => {
  it('extracts a single fenced diff', () => {
    const response = '```diff\n' + X_PATCH + '\n```';
    expect(extractPatches(response)).toEqual([X_PATCH]);
  });

  it('splits one fence holding several files into one patch per file', () => {
    const response = 'Here is the fix:\n```diff\n' + A_PATCH + '\n' + B_PATCH + '\n```\nLet me know.';
    expect(extractPatches(response)).toEqual([A_PATCH, B_PATCH]);
  });

  it('collects patches from several fences in order', () => {
    const response = '```patch\n' + B_PATCH + '\n```\n\nand\n\n```\n' + A_PATCH + '\n```';
    expect(extractPatches(response)).toEqual([B_PATCH, A_PATCH]);
  });

  it('keeps a fenced diff without a git header as one patch', () => {
    const body = ['--- a/x.py', '+++ b/x.py', '@@ -1 +1 @@', '-old', '+new'].join('\n');
    expect(extractPatches('```\n' + body + '\n```')).toEqual([body]);
  });

  it('splits a raw unfenced response by file', () => {
    const response = '\n' + A_PATCH + '\n' + B_PATCH + '\n';
    expect(extractPatches(response)).toEqual([A_PATCH, B_PATCH]);
  });

  it('returns a raw diff without git headers whole', () => {
    const body = ['--- a/x.py', '+++ b/x.py', '@@ -1 +1 @@', '-old', '+new'].join('\n');
    expect(extractPatches(`  ${body}\n\n`)).toEqual([body]);
  });

  it('strips an unterminated fence', () => {
    expect(extractPatches('```diff\n' + X_PATCH + '\n')).toEqual([X_PATCH]);
  });

  it('returns nothing for prose', () => {
    expect(extractPatches('I could not find the bug.')).toEqual([]);
  });

  it('re-extracting rewrapped patches yields the same sequence', () => {
    const first = extractPatches('```diff\n' + A_PATCH + '\n' + B_PATCH + '\n```\n```diff\n' + X_PATCH + '\n```');
    const rewrapped = first.map((patch) => '```diff\n' + patch + '\n```').join('\n\n');

    expect(first).toEqual([A_PATCH, B_PATCH, X_PATCH]);
    expect(extractPatches(rewrapped)).toEqual(first);
  });
});

describe('splitByFile', () => {
  it('returns nothing without git headers', () => {
    expect(splitByFile('--- a/x\n+++ b/x\n')).toEqual([]);
  });
});

describe('firstPatchOrRaw', () => {
  it('returns the first extracted patch', () => {
    expect(firstPatchOrRaw('```diff\n' + A_PATCH + '\n' + B_PATCH + '\n```')).toBe(A_PATCH);
  });

  it('falls back to the stripped response', () => {
    expect(firstPatchOrRaw('  not a patch  \n')).toBe('not a patch');
  });
});

describe('extractCodeBlock', () => {
  it('returns the content of the first fence', () => {
    expect(extractCodeBlock('Here you go:\n```jsx\nconst a = 1;\n```\nDone.')).toBe('const a = 1;');
  });

  it('returns the trimmed text when there is no fence', () => {
    expect(extractCodeBlock('\nA\nC\n\n')).toBe('A\nC');
  });
});
