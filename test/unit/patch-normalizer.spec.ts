import { countHunkBody, formatHunkHeader, normalizePatch, parseHunkHeader } from '@core/patch/normalizer';

const lines = (...parts: string[]) => parts.join('\n') + '\n';

describe('parseHunkHeader', () => {
  it('reads explicit counts and trailing context', () => {
    expect(parseHunkHeader('@@ -10,2 +11,3 @@ function foo() {')).toEqual({
      oldStart: 10,
      oldCount: 2,
      newStart: 11,
      newCount: 3,
      trailingContext: ' function foo() {'
    });
  });

  it('defaults omitted counts to 1', () => {
    expect(parseHunkHeader('@@ -4 +5 @@')).toEqual({
      oldStart: 4,
      oldCount: 1,
      newStart: 5,
      newCount: 1,
      trailingContext: ''
    });
  });

  it('rejects lines that are not hunk headers', () => {
    expect(parseHunkHeader('@@ garbage @@')).toBeNull();
    expect(parseHunkHeader(' @@ -1 +1 @@')).toBeNull();
  });

  it('formats with explicit counts', () => {
    expect(formatHunkHeader({ oldStart: 1, oldCount: 0, newStart: 1, newCount: 2, trailingContext: '' })).toBe(
      '@@ -1,0 +1,2 @@'
    );
  });
});

describe('countHunkBody', () => {
  it('stops at the next file header', () => {
    const body = ['-a', '+b', ' c', '--- a/next.txt', '+++ b/next.txt', '@@ -1 +1 @@'];
    expect(countHunkBody(body, 0)).toEqual({ oldCount: 2, newCount: 2 });
  });

  it('does not count triple-dash lines that are not file headers', () => {
    expect(countHunkBody(['--- not a header', ' ctx'], 0)).toEqual({ oldCount: 1, newCount: 1 });
  });
});

describe('normalizePatch', () => {
  it('rewrites counts that disagree with the body', () => {
    const patch = lines('diff --git a/f.txt b/f.txt', '--- a/f.txt', '+++ b/f.txt', '@@ -1,3 +1,3 @@', ' a', ' b', '+x', ' c', ' d');

    expect(normalizePatch(patch)).toBe(
      lines('diff --git a/f.txt b/f.txt', '--- a/f.txt', '+++ b/f.txt', '@@ -1,4 +1,5 @@', ' a', ' b', '+x', ' c', ' d')
    );
  });

  it('preserves the trailing annotation after @@', () => {
    const patch = lines('@@ -10,2 +10,2 @@ function foo() {', ' one', ' two', ' three');
    expect(normalizePatch(patch)).toBe(lines('@@ -10,3 +10,3 @@ function foo() {', ' one', ' two', ' three'));
  });

  it('leaves correct headers untouched, including omitted counts', () => {
    const patch = lines('diff --git a/x.py b/x.py', '--- a/x.py', '+++ b/x.py', '@@ -1 +1 @@', '-old', '+new');
    expect(normalizePatch(patch)).toBe(patch);
  });

  it('does not count no-newline markers', () => {
    const patch = lines('@@ -1,5 +1,5 @@', '-old', '\\ No newline at end of file', '+new', '\\ No newline at end of file');
    expect(normalizePatch(patch)).toBe(
      lines('@@ -1,1 +1,1 @@', '-old', '\\ No newline at end of file', '+new', '\\ No newline at end of file')
    );
  });

  it('recounts each hunk of each file separately', () => {
    const patch = lines(
      'diff --git a/a.txt b/a.txt',
      '--- a/a.txt',
      '+++ b/a.txt',
      '@@ -1,9 +1,9 @@',
      ' keep',
      '-drop',
      '@@ -20 +19,7 @@',
      '+added',
      'diff --git a/b.txt b/b.txt',
      '--- a/b.txt',
      '+++ b/b.txt',
      '@@ -1,1 +1,1 @@',
      ' same',
      '+more'
    );

    expect(normalizePatch(patch)).toBe(
      lines(
        'diff --git a/a.txt b/a.txt',
        '--- a/a.txt',
        '+++ b/a.txt',
        '@@ -1,2 +1,1 @@',
        ' keep',
        '-drop',
        '@@ -20,0 +19,1 @@',
        '+added',
        'diff --git a/b.txt b/b.txt',
        '--- a/b.txt',
        '+++ b/b.txt',
        '@@ -1,1 +1,2 @@',
        ' same',
        '+more'
      )
    );
  });

  it('unifies line endings and ends with exactly one newline', () => {
    expect(normalizePatch('@@ -1 +1 @@\r\n-a\r\n+b\r\n\r\n\n')).toBe('@@ -1 +1 @@\n-a\n+b\n');
    expect(normalizePatch('@@ -1 +1 @@\r-a\r+b')).toBe('@@ -1 +1 @@\n-a\n+b\n');
  });

  it('reaches a fixpoint after one pass', () => {
    const messy = '```\r\n@@ -3,1 +3,9 @@ ctx\r\n a\r\n\r\n-b\r\n+c\r\n+d\r\n@@ -1 +1 @@\r\n+only\r\n\n\n';
    const once = normalizePatch(messy);
    expect(normalizePatch(once)).toBe(once);
  });

  it('returns a single newline for empty input', () => {
    expect(normalizePatch('')).toBe('\n');
  });
});
