/**
 * Patch Applier
 *
 * Applies a patch to a working copy through a cascade of strategies and
 * verifies that the target files actually changed.
 *
 * Callers must serialize access per working-copy directory; two applies
 * against the same directory at once give undefined results.
 */

import { Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { defaultApplyStrategies, type ApplyStrategy, type StrategyContext } from '../git/apply-strategies';
import { describeFailure, type CommandResult } from '../git/command';
import { filesChanged, snapshotFiles } from './change-detector';
import { isWithinRoot, patchTargetPaths } from './diff-files';
import { PatchApplyError } from './errors';
import { normalizePatch } from './normalizer';

const ARTIFACT_SUFFIXES = ['.orig', '.rej', '.rej.orig', '.orig.rej'];

export interface PatchApplierOptions {
  strategies?: ApplyStrategy[];
  /** Where scratch patches and failure dumps are written. Defaults to the OS temp dir. */
  scratchDir?: string;
}

export interface ApplyOutcome {
  strategy: string;
  targets: string[];
  patchText: string;
}

interface StrategyFailure {
  strategy: string;
  details: string;
}

export class PatchApplier {
  private readonly logger = new Logger(PatchApplier.name);
  private readonly strategies: ApplyStrategy[];
  private readonly scratchDir: string;

  constructor(options: PatchApplierOptions = {}) {
    this.strategies = options.strategies ?? defaultApplyStrategies();
    this.scratchDir = options.scratchDir ?? os.tmpdir();

    if (this.strategies.length === 0) {
      throw new Error('PatchApplier needs at least one apply strategy');
    }
  }

  /**
   * Apply `patchText` inside `cwd`. Throws PatchApplyError when every
   * strategy fails or when the winning strategy left the files untouched.
   */
  async apply(patchText: string, cwd: string): Promise<ApplyOutcome> {
    const normalized = normalizePatch(patchText);
    const targets = patchTargetPaths(normalized);
    const outside = targets.filter((target) => !isWithinRoot(cwd, target));
    if (outside.length > 0) {
      throw new PatchApplyError(`Patch targets paths outside the working copy: ${outside.join(', ')}`, normalized);
    }
    const before = await snapshotFiles(cwd, targets);

    const patchFile = path.join(this.scratchDir, `agent_patch_${randomUUID()}.diff`);
    await fs.writeFile(patchFile, normalized, 'utf8');

    let applied: string | null = null;
    const failures: StrategyFailure[] = [];

    try {
      for (const strategy of this.strategies) {
        const result = await this.runStrategy(strategy, { cwd, patchFile, patchText: normalized });
        if (result.exitCode === 0) {
          applied = strategy.name;
          break;
        }
        const details = describeFailure(result);
        this.logger.debug(`${strategy.name} rejected patch: ${details}`);
        failures.push({ strategy: strategy.name, details });
      }
    } finally {
      await fs.rm(patchFile, { force: true });
      await cleanupPatchArtifacts(cwd, targets);
    }

    if (applied === null) {
      const failurePath = await this.dumpFailure(normalized);
      const names = this.strategies.map((s) => s.name).join(' and ');
      const report = failures.map((f) => `${f.strategy} error: ${f.details}`).join('\n');
      throw new PatchApplyError(
        `Failed to apply patch via ${names}.\n${report}\nPatch saved to ${failurePath}`,
        normalized,
        failurePath
      );
    }

    if (!(await filesChanged(cwd, targets, before))) {
      throw new PatchApplyError('Patch applied but produced no file changes', normalized);
    }

    this.logger.log(`Patch applied via ${applied} (${targets.length} file(s))`);
    return { strategy: applied, targets, patchText: normalized };
  }

  private async runStrategy(strategy: ApplyStrategy, ctx: StrategyContext): Promise<CommandResult> {
    try {
      return await strategy.run(ctx);
    } catch (error) {
      // A tool that cannot even start is one more failed strategy
      return {
        command: strategy.name,
        args: [],
        exitCode: -1,
        stdout: '',
        stderr: error instanceof Error ? error.message : String(error)
      };
    }
  }

  private async dumpFailure(patchText: string): Promise<string> {
    const failurePath = path.join(this.scratchDir, `agent_patch_error_${randomUUID().slice(0, 8)}.diff`);
    await fs.writeFile(failurePath, patchText, 'utf8');
    return failurePath;
  }
}

/**
 * Remove the .orig/.rej leftovers apply tools drop next to target files.
 */
export async function cleanupPatchArtifacts(cwd: string, targets: string[]): Promise<void> {
  for (const target of targets) {
    if (!isWithinRoot(cwd, target)) continue;
    for (const suffix of ARTIFACT_SUFFIXES) {
      await fs.rm(path.join(cwd, `${target}${suffix}`), { force: true });
    }
  }
}
