/**
 * Atomic publish
 *
 * A file is produced under a temporary name next to its target and renamed
 * onto the target once complete. rename(2) is atomic within a filesystem, so
 * readers see either the previous file or the new one, never a partial one.
 */

import { mkdir, rename, rm, stat } from 'node:fs/promises';
import { dirname } from 'node:path';

/** Side files SQLite may leave next to a database */
const SQLITE_SIDE_FILES = ['-journal', '-wal', '-shm'] as const;

/**
 * Unique temporary path next to the target (PID + timestamp)
 */
export function temporaryPathFor(targetPath: string): string {
  return `${targetPath}.${process.pid}.${Date.now()}.tmp`;
}

/**
 * Make sure the target's directory exists
 */
export async function ensureParentDirectory(targetPath: string): Promise<void> {
  await mkdir(dirname(targetPath), { recursive: true });
}

/**
 * Move a completed temporary file onto its target
 *
 * @throws Error if the rename fails; the temporary file is removed first
 */
export async function publishFile(tempPath: string, targetPath: string): Promise<void> {
  try {
    await rename(tempPath, targetPath);
  } catch (error) {
    await discardFile(tempPath);
    throw error;
  }
}

/**
 * Delete a file and any SQLite side files. Missing files are not an error.
 */
export async function discardFile(path: string): Promise<void> {
  await rm(path, { force: true });
  for (const suffix of SQLITE_SIDE_FILES) {
    await rm(`${path}${suffix}`, { force: true });
  }
}

export async function fileExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
