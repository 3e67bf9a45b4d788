/**
 * Test Runner
 *
 * Runs the repository's test commands after a patch lands and renders
 * their results for the pull request body.
 */

import { Logger } from '@nestjs/common';
import { runCommandLine } from './command';

export interface TestCommandResult {
  command: string;
  exitCode: number;
  stdout: string;
  stderr: string;
}

export class TestCommandError extends Error {
  readonly name = 'TestCommandError';
  readonly result: TestCommandResult;
  readonly completed: TestCommandResult[];

  constructor(result: TestCommandResult, completed: TestCommandResult[]) {
    super(`Test command '${result.command}' failed with code ${result.exitCode}: ${result.stderr}`);
    this.result = result;
    this.completed = completed;
  }
}

const logger = new Logger('TestRunner');

/**
 * Run each command in order, stopping at the first failure.
 */
export async function runTestCommands(commands: string[], cwd: string): Promise<TestCommandResult[]> {
  const results: TestCommandResult[] = [];

  for (const command of commands) {
    logger.log(`Running ${command}`);
    const outcome = await runCommandLine(command, { cwd });
    const result: TestCommandResult = {
      command,
      exitCode: outcome.exitCode,
      stdout: outcome.stdout.trim(),
      stderr: outcome.stderr.trim()
    };
    results.push(result);

    if (result.exitCode !== 0) {
      throw new TestCommandError(result, results);
    }
  }

  return results;
}

const MAX_SNIPPET_LINES = 20;
const MAX_SNIPPET_CHARS = 600;

function clip(text: string): string {
  const snippet = text.trim();
  if (!snippet) return '';

  const lines = snippet.split('\n');
  let clipped = lines.slice(0, MAX_SNIPPET_LINES).join('\n');
  if (lines.length > MAX_SNIPPET_LINES) {
    clipped += '\n...';
  }
  if (clipped.length > MAX_SNIPPET_CHARS) {
    clipped = clipped.slice(0, MAX_SNIPPET_CHARS).trimEnd() + '...';
  }
  return clipped;
}

/**
 * Markdown list of test outcomes for a pull request body.
 */
export function formatTestResults(results: TestCommandResult[] | null, commands: string[]): string {
  if (results && results.length > 0) {
    return results
      .map((result) => {
        const status = result.exitCode === 0 ? 'PASS' : 'FAIL';
        const snippet = clip(result.stdout || result.stderr);
        if (!snippet) {
          return `- \`${result.command}\` ${status}`;
        }
        const fenced = snippet
          .split('\n')
          .map((line) => `  ${line}`)
          .join('\n');
        return `- \`${result.command}\` ${status}\n  \`\`\`\n${fenced}\n  \`\`\``;
      })
      .join('\n');
  }

  if (commands.length > 0) {
    return commands.map((command) => `- \`${command}\` (skipped)`).join('\n');
  }

  return 'Tests skipped';
}
