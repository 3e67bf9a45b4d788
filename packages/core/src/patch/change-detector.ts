/**
 * Change Detector
 *
 * Byte-level before/after snapshots of the files a patch targets, used to
 * catch apply tools that report success without changing anything.
 */

import { promises as fs } from 'fs';
import path from 'path';

export interface FileSnapshot {
  exists: boolean;
  content: Buffer | null;
}

export type TreeSnapshot = Map<string, FileSnapshot>;

function isMissing(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) return false;
  return error.code === 'ENOENT' || error.code === 'ENOTDIR';
}

async function readSnapshot(root: string, relativePath: string): Promise<FileSnapshot> {
  try {
    return { exists: true, content: await fs.readFile(path.join(root, relativePath)) };
  } catch (error) {
    if (isMissing(error)) {
      return { exists: false, content: null };
    }
    return { exists: true, content: null };
  }
}

export async function snapshotFiles(root: string, paths: string[]): Promise<TreeSnapshot> {
  const snapshot: TreeSnapshot = new Map();
  for (const relativePath of paths) {
    snapshot.set(relativePath, await readSnapshot(root, relativePath));
  }
  return snapshot;
}

/**
 * True when any target differs from its snapshot. An empty target list
 * counts as changed: a patch without parseable headers is not evidence
 * that the apply did nothing.
 */
export async function filesChanged(root: string, paths: string[], before: TreeSnapshot): Promise<boolean> {
  if (paths.length === 0) {
    return true;
  }

  for (const relativePath of paths) {
    const previous = before.get(relativePath) ?? { exists: false, content: null };
    const current = await readSnapshot(root, relativePath);

    if (current.exists !== previous.exists) return true;
    if (!current.exists) continue;
    // Unreadable now or before: state unknown, assume changed
    if (current.content === null || previous.content === null) return true;
    if (!current.content.equals(previous.content)) return true;
  }

  return false;
}
