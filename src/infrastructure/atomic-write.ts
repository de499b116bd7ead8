/**
 * Atomic file replacement — write to a temporary file in the target's
 * directory, flush it, then rename over the target. Readers see either the
 * old content or the new content, never a truncated file.
 */
import { open, rename, unlink } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

import { nanoid } from 'nanoid';

import { StoreIOError, errnoCode } from '../core/errors.js';

export interface AtomicWriteOptions {
  /** File mode for the new file. Default: 0o644 */
  mode?: number;
}

/** Temporary sibling path; same directory so rename() never crosses filesystems. */
export function temporaryPathFor(targetPath: string): string {
  return join(dirname(targetPath), `.${basename(targetPath)}.${nanoid(10)}.tmp`);
}

/**
 * Best-effort removal of a temp file after a failed write.
 * Returns the cleanup failure instead of throwing it.
 */
async function removeQuietly(path: string): Promise<unknown> {
  try {
    await unlink(path);
    return undefined;
  } catch (error) {
    return errnoCode(error) === 'ENOENT' ? undefined : error;
  }
}

/**
 * Replace `targetPath` with `data` atomically.
 * @throws StoreIOError when any filesystem step fails; the temp file is removed
 */
export async function writeFileAtomic(
  targetPath: string,
  data: string | Uint8Array,
  options?: AtomicWriteOptions,
): Promise<void> {
  const tempPath = temporaryPathFor(targetPath);
  const mode = options?.mode ?? 0o644;

  try {
    const handle = await open(tempPath, 'wx', mode);
    try {
      await handle.writeFile(data);
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tempPath, targetPath);
  } catch (error) {
    const cleanupError = await removeQuietly(tempPath);
    throw new StoreIOError(
      'write',
      targetPath,
      error instanceof Error ? error : undefined,
      cleanupError !== undefined ? { leftoverTempPath: tempPath } : undefined,
    );
  }
}
