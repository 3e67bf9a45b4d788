/**
 * In-process stand-ins for `git apply` and `patch`, built on jsdiff.
 * They honour a/ b/ prefixes and /dev/null like the real tools and never spawn.
 */

import { applyPatch, parsePatch, type ParsedDiff } from 'diff';
import fs from 'fs';
import path from 'path';
import type { ApplyStrategy, StrategyContext } from '@core/git/apply-strategies';
import type { CommandResult } from '@core/git/command';

type LineCompare = (lineNumber: number, line: string, operation: string, patchContent: string) => boolean;

export interface RecordingStrategy extends ApplyStrategy {
  calls: StrategyContext[];
  /** Whether the scratch patch file existed while the strategy ran. */
  sawPatchFile: boolean[];
}

function result(name: string, exitCode: number, stderr = ''): CommandResult {
  return { command: name, args: [], exitCode, stdout: '', stderr };
}

function stripPrefix(fileName: string | undefined): string | null {
  if (!fileName || fileName === '/dev/null') return null;
  return fileName.replace(/^[ab]\//, '');
}

function recording(
  name: string,
  run: (ctx: StrategyContext) => CommandResult | Promise<CommandResult>
): RecordingStrategy {
  const strategy: RecordingStrategy = {
    name,
    calls: [],
    sawPatchFile: [],
    run: async (ctx) => {
      strategy.calls.push(ctx);
      strategy.sawPatchFile.push(fs.existsSync(ctx.patchFile));
      return run(ctx);
    }
  };
  return strategy;
}

function parseFiles(patchText: string): ParsedDiff[] | string {
  try {
    return parsePatch(patchText).filter((file) => file.hunks.length > 0);
  } catch (error) {
    return error instanceof Error ? error.message : String(error);
  }
}

/**
 * Applies every file in the patch or none of them.
 */
export function jsdiffStrategy(name: string, compareLine?: LineCompare): RecordingStrategy {
  return recording(name, ({ cwd, patchText }) => {
    const files = parseFiles(patchText);
    if (typeof files === 'string') {
      return result(name, 1, files);
    }
    if (files.length === 0) {
      return result(name, 1, 'No valid patches in input');
    }

    const writes: { target: string; content: string | null }[] = [];
    for (const file of files) {
      const oldPath = stripPrefix(file.oldFileName);
      const newPath = stripPrefix(file.newFileName);
      const target = newPath ?? oldPath;
      if (target === null) {
        return result(name, 1, 'patch names no file');
      }

      const source = oldPath !== null && fs.existsSync(path.join(cwd, oldPath))
        ? fs.readFileSync(path.join(cwd, oldPath), 'utf8')
        : '';
      const patched = applyPatch(source, file, compareLine ? { compareLine } : {});
      if (patched === false) {
        return result(name, 1, `error: patch failed: ${target}`);
      }
      writes.push({ target, content: newPath === null ? null : patched });
    }

    for (const { target, content } of writes) {
      const absolute = path.join(cwd, target);
      if (content === null) {
        fs.rmSync(absolute, { force: true });
      } else {
        fs.mkdirSync(path.dirname(absolute), { recursive: true });
        fs.writeFileSync(absolute, content);
      }
    }
    return result(name, 0);
  });
}

/** Exact context match, like `git apply`. */
export function strictStrategy(name = 'git-apply'): RecordingStrategy {
  return jsdiffStrategy(name);
}

/** Ignores surrounding whitespace in context, like a forgiving `patch`. */
export function lenientStrategy(name = 'patch'): RecordingStrategy {
  return jsdiffStrategy(name, (_lineNumber, line, _operation, patchContent) => line.trim() === patchContent.trim());
}

export function rejectingStrategy(name: string, stderr = `${name}: patch does not apply`): RecordingStrategy {
  return recording(name, () => result(name, 1, stderr));
}

/** Reports success and touches nothing. */
export function noopStrategy(name = 'git-apply'): RecordingStrategy {
  return recording(name, () => result(name, 0));
}

/** Leaves .orig/.rej files next to each target, then defers to `inner`. */
export function litteringStrategy(inner: RecordingStrategy, targets: string[]): RecordingStrategy {
  return recording(inner.name, (ctx) => {
    for (const target of targets) {
      fs.writeFileSync(path.join(ctx.cwd, `${target}.orig`), 'stale');
      fs.writeFileSync(path.join(ctx.cwd, `${target}.rej`), 'rejected');
    }
    return inner.run(ctx);
  });
}
