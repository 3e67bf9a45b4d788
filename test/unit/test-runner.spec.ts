import { CommandError, describeFailure, type CommandResult } from '@core/git/command';
import { TestCommandError, formatTestResults } from '@core/git/test-runner';
import { parsePorcelainStatus } from '@core/git/working-tree';

describe('formatTestResults', () => {
  it('should report skipped runs', () => {
    expect(formatTestResults(null, [])).toBe('Tests skipped');
    expect(formatTestResults(null, ['npm test', 'npm run lint'])).toBe(
      '- `npm test` (skipped)\n- `npm run lint` (skipped)'
    );
  });

  it('should list passing commands without output', () => {
    expect(formatTestResults([{ command: 'npm test', exitCode: 0, stdout: '', stderr: '' }], [])).toBe(
      '- `npm test` PASS'
    );
  });

  it('should fence output, falling back to stderr', () => {
    const results = [{ command: 'npm test', exitCode: 1, stdout: '', stderr: 'boom\nat line 2' }];

    expect(formatTestResults(results, ['npm test'])).toBe('- `npm test` FAIL\n  ```\n  boom\n  at line 2\n  ```');
  });

  it('should clip long output by lines', () => {
    const stdout = Array.from({ length: 25 }, (_, i) => `line ${i + 1}`).join('\n');
    const expected = Array.from({ length: 20 }, (_, i) => `  line ${i + 1}`).join('\n');

    expect(formatTestResults([{ command: 't', exitCode: 0, stdout, stderr: '' }], [])).toBe(
      `- \`t\` PASS\n  \`\`\`\n${expected}\n  ...\n  \`\`\``
    );
  });

  it('should clip long output by characters', () => {
    const stdout = 'x'.repeat(700);

    expect(formatTestResults([{ command: 't', exitCode: 0, stdout, stderr: '' }], [])).toBe(
      `- \`t\` PASS\n  \`\`\`\n  ${'x'.repeat(600)}...\n  \`\`\``
    );
  });
});

describe('command failures', () => {
  const base: CommandResult = { command: 'git', args: ['status'], exitCode: 128, stdout: '', stderr: '' };

  it('should describe the most useful output', () => {
    expect(describeFailure({ ...base, stderr: 'fatal: not a git repository\n' })).toBe('fatal: not a git repository');
    expect(describeFailure({ ...base, stderr: '  ', stdout: 'out' })).toBe('out');
    expect(describeFailure(base)).toBe('exit code 128');
  });

  it('should name the command in CommandError', () => {
    const error = new CommandError({ ...base, stderr: 'fatal: bad' });

    expect(error.message).toBe('Command git status failed: fatal: bad');
    expect(error.result.exitCode).toBe(128);
  });

  it('should keep completed results on TestCommandError', () => {
    const passed = { command: 'lint', exitCode: 0, stdout: '', stderr: '' };
    const failed = { command: 'test', exitCode: 2, stdout: '', stderr: '1 failed' };

    const error = new TestCommandError(failed, [passed, failed]);

    expect(error.message).toBe("Test command 'test' failed with code 2: 1 failed");
    expect(error.completed).toEqual([passed, failed]);
  });
});

describe('parsePorcelainStatus', () => {
  it('should list modified, renamed and untracked paths', () => {
    const output = '## main...origin/main\n M src/a.py\nR  old.py -> new.py\n?? notes.txt\n\n';

    expect(parsePorcelainStatus(output)).toEqual(['src/a.py', 'new.py', 'notes.txt']);
  });
});
