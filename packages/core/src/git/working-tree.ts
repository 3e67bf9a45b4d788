/**
 * Working Tree
 *
 * File and git access for one working-copy directory. Relative paths may
 * not escape the root.
 */

import { Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import path from 'path';
import { runCommand, type CommandResult } from './command';

export interface WorkingTreeReader {
  readonly root: string;
  exists(relativePath: string): Promise<boolean>;
  readText(relativePath: string): Promise<string>;
}

/**
 * Everything the fix workflow needs from a working copy.
 */
export interface WorkingTree extends WorkingTreeReader {
  changedFiles(): Promise<string[]>;
  ensureBranch(baseBranch: string, branch: string): Promise<void>;
  commitAll(message: string): Promise<void>;
  pushBranch(branch: string): Promise<void>;
  summary(): Promise<string>;
}

export class WorkingTreeError extends Error {
  readonly name = 'WorkingTreeError';
}

export class GitWorkingTree implements WorkingTree {
  private readonly logger = new Logger(GitWorkingTree.name);
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  resolve(relativePath: string): string {
    const candidate = path.normalize(path.join(this.root, relativePath));
    const relative = path.relative(this.root, candidate);
    if (relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new WorkingTreeError(`Path escapes working tree: ${relativePath}`);
    }
    return candidate;
  }

  async exists(relativePath: string): Promise<boolean> {
    try {
      const stat = await fs.stat(this.resolve(relativePath));
      return stat.isFile();
    } catch (error) {
      if (error instanceof WorkingTreeError) throw error;
      return false;
    }
  }

  async readText(relativePath: string): Promise<string> {
    return fs.readFile(this.resolve(relativePath), 'utf8');
  }

  async writeText(relativePath: string, content: string): Promise<void> {
    const resolved = this.resolve(relativePath);
    await fs.mkdir(path.dirname(resolved), { recursive: true });
    await fs.writeFile(resolved, content, 'utf8');
  }

  // ==========================================================================
  // Git
  // ==========================================================================

  private git(args: string[], check = true): Promise<CommandResult> {
    return runCommand('git', args, { cwd: this.root, check });
  }

  /**
   * Paths whose tracked status differs from HEAD.
   */
  async changedFiles(): Promise<string[]> {
    const { stdout } = await this.git(['status', '--porcelain']);
    return parsePorcelainStatus(stdout);
  }

  /**
   * Check out a fresh work branch from an up-to-date base branch.
   */
  async ensureBranch(baseBranch: string, branch: string): Promise<void> {
    const base = baseBranch || 'main';
    await this.git(['fetch', '--all'], false);
    await this.git(['checkout', base]);
    await this.git(['pull', '--ff-only'], false);
    await this.git(['checkout', '-B', branch, base]);
    this.logger.log(`Checked out ${branch} from ${base}`);
  }

  async commitAll(message: string): Promise<void> {
    await this.git(['add', '.']);
    await this.git(['commit', '-m', message]);
  }

  async pushBranch(branch: string): Promise<void> {
    await this.git(['push', '-u', 'origin', branch]);
  }

  async summary(): Promise<string> {
    const status = await this.git(['status', '-sb']);
    const diffstat = await this.git(['diff', '--stat'], false);
    return `Status:\n${status.stdout}\nDiff:\n${diffstat.stdout}`;
  }
}

/**
 * Paths listed by `git status --porcelain`; renames report the new path.
 */
export function parsePorcelainStatus(output: string): string[] {
  const files: string[] = [];
  for (const line of output.split('\n')) {
    if (!line.trim() || line.startsWith('##')) continue;
    const entry = line.slice(3).trim();
    const arrow = entry.indexOf(' -> ');
    files.push(arrow >= 0 ? entry.slice(arrow + 4) : entry);
  }
  return files;
}
