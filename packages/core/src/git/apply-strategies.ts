/**
 * Apply Strategies
 *
 * The external tools tried, in order, when applying a patch to a working
 * copy. Each strategy reports a CommandResult; a zero exit code means the
 * tool claims success (the applier still verifies files changed).
 */

import { runCommand, type CommandResult } from './command';

export interface StrategyContext {
  cwd: string;
  patchFile: string;
  patchText: string;
}

export interface ApplyStrategy {
  name: string;
  run(ctx: StrategyContext): Promise<CommandResult>;
}

/**
 * Native strict apply, repairing whitespace errors on the way in.
 */
export const gitApplyStrategy: ApplyStrategy = {
  name: 'git-apply',
  run: ({ cwd, patchFile }) => runCommand('git', ['apply', '--whitespace=fix', patchFile], { cwd })
};

/**
 * POSIX patch, forward only, stripping one leading path component.
 */
export const posixPatchStrategy: ApplyStrategy = {
  name: 'patch',
  run: ({ cwd, patchText }) => runCommand('patch', ['--forward', '-p1'], { cwd, input: patchText })
};

export function defaultApplyStrategies(): ApplyStrategy[] {
  return [gitApplyStrategy, posixPatchStrategy];
}
