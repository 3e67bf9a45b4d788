/**
 * Command Runner
 *
 * Thin wrapper over execa for the external tools the agent drives
 * (git, patch, test commands). Never rejects on a non-zero exit unless
 * `check` is set.
 */

import execa from 'execa';

export interface CommandResult {
  command: string;
  args: string[];
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunCommandOptions {
  cwd: string;
  input?: string;
  check?: boolean;
  timeoutMs?: number;
}

export class CommandError extends Error {
  readonly name = 'CommandError';
  readonly result: CommandResult;

  constructor(result: CommandResult) {
    super(`Command ${[result.command, ...result.args].join(' ')} failed: ${describeFailure(result)}`);
    this.result = result;
  }
}

/**
 * Most useful diagnostic text a command produced.
 */
export function describeFailure(result: CommandResult): string {
  return result.stderr.trim() || result.stdout.trim() || `exit code ${result.exitCode}`;
}

function toResult(command: string, args: string[], value: execa.ExecaReturnValue): CommandResult {
  // Spawn failures (missing binary) come back without an exit code
  const spawnMessage = value instanceof Error ? value.message : '';
  return {
    command,
    args,
    exitCode: typeof value.exitCode === 'number' ? value.exitCode : -1,
    stdout: value.stdout ?? '',
    stderr: value.stderr || spawnMessage
  };
}

export async function runCommand(command: string, args: string[], options: RunCommandOptions): Promise<CommandResult> {
  const value = await execa(command, args, {
    cwd: options.cwd,
    input: options.input,
    timeout: options.timeoutMs,
    reject: false,
    stripFinalNewline: false
  });

  const result = toResult(command, args, value);
  if (options.check && result.exitCode !== 0) {
    throw new CommandError(result);
  }
  return result;
}

/**
 * Run a whole command line, split on spaces the way execa.command does.
 */
export async function runCommandLine(commandLine: string, options: RunCommandOptions): Promise<CommandResult> {
  const value = await execa.command(commandLine, {
    cwd: options.cwd,
    input: options.input,
    timeout: options.timeoutMs,
    reject: false
  });

  return toResult(commandLine, [], value);
}
