/**
 * Local filesystem helpers for uploads and model-build sources
 */

import { readdir, stat } from 'fs/promises';
import type { Dirent, Stats } from 'fs';
import path from 'path';

function isMissingPathError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

/**
 * `stat` that reports a missing path as undefined instead of throwing
 */
export async function statIfExists(filePath: string): Promise<Stats | undefined> {
  try {
    return await stat(filePath);
  } catch (error) {
    if (isMissingPathError(error)) {
      return undefined;
    }
    throw error;
  }
}

export interface LocalFile {
  absolutePath: string;
  /** Path relative to the walked root, always with `/` separators */
  relativePath: string;
}

export interface UnreadableDirectory {
  /** Relative like `LocalFile.relativePath`; `.` for the root itself */
  relativePath: string;
  error: string;
}

export interface WalkResult {
  files: LocalFile[];
  unreadable: UnreadableDirectory[];
}

export type ReadDirectory = (dir: string) => Promise<Dirent[]>;

const readDirectory: ReadDirectory = dir => readdir(dir, { withFileTypes: true });

function relativeTo(root: string, target: string): string {
  return path.relative(root, target).split(path.sep).join('/') || '.';
}

/**
 * Every file below `root`, depth first in name order, skipping directories
 * whose name is in `ignored` at any depth. Symlinks to files are listed;
 * symlinked directories are not followed. A directory that cannot be read
 * is reported and the walk continues.
 */
export async function walkFiles(
  root: string,
  ignored: ReadonlySet<string>,
  readDir: ReadDirectory = readDirectory
): Promise<WalkResult> {
  const files: LocalFile[] = [];
  const unreadable: UnreadableDirectory[] = [];

  const visit = async (dir: string): Promise<void> => {
    let entries: Dirent[];
    try {
      entries = await readDir(dir);
    } catch (error) {
      unreadable.push({
        relativePath: relativeTo(root, dir),
        error: error instanceof Error ? error.message : String(error),
      });
      return;
    }
    entries.sort((a, b) => a.name.localeCompare(b.name));

    for (const entry of entries) {
      const absolutePath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!ignored.has(entry.name)) {
          await visit(absolutePath);
        }
        continue;
      }

      const isFile = entry.isFile() || (entry.isSymbolicLink() && (await statIfExists(absolutePath))?.isFile());
      if (isFile) {
        files.push({ absolutePath, relativePath: relativeTo(root, absolutePath) });
      }
    }
  };

  await visit(root);
  return { files, unreadable };
}
