/**
 * Advisory lock file around store mutations.
 *
 * The lock is a sibling file created with O_EXCL; its presence is the lock.
 * Each holder writes a unique token into it and only ever deletes a lock file
 * carrying its own token. The store format never depends on it.
 */
import { link, open, readFile, rename, stat, unlink } from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { setTimeout as sleep } from 'node:timers/promises';

import { nanoid } from 'nanoid';

import { StoreIOError, StoreLockedError, errnoCode } from '../core/errors.js';
import type { Logger } from '../observability/logger.js';

export interface FileLockOptions {
  /** Give up after waiting this long for another holder. */
  timeoutMs: number;
  /** A lock file older than this is treated as left behind by a crashed process. */
  staleMs: number;
  /** Delay between acquisition attempts. */
  retryIntervalMs: number;
  logger?: Logger;
}

export interface FileLock {
  readonly path: string;
  release(): Promise<void>;
}

/** Lock file path for a given target file. */
export function lockPathFor(targetPath: string): string {
  return `${targetPath}.lock`;
}

function asError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

/** Create the lock file; resolves with the token written into it, or undefined if it exists. */
async function tryCreate(lockPath: string): Promise<string | undefined> {
  const token = `${process.pid.toString()} ${nanoid()}\n`;
  try {
    const handle = await open(lockPath, 'wx', 0o600);
    try {
      await handle.writeFile(token);
    } finally {
      await handle.close();
    }
    return token;
  } catch (error) {
    if (errnoCode(error) === 'EEXIST') {
      return undefined;
    }
    throw new StoreIOError('create lock file', lockPath, asError(error));
  }
}

async function statIfExists(path: string): Promise<Stats | undefined> {
  try {
    return await stat(path);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return undefined;
    }
    throw new StoreIOError('inspect lock file', path, asError(error));
  }
}

function sameFile(a: Stats, b: Stats): boolean {
  return a.ino === b.ino && a.dev === b.dev && a.mtimeMs === b.mtimeMs;
}

/**
 * Break a stale lock. The lock is first renamed to a unique path, so only one
 * contender can take it; the renamed file is then checked against the one
 * judged stale. A fresh lock caught by mistake is linked back into place.
 *
 * Resolves true when the caller should retry the create straight away.
 */
async function breakIfStale(lockPath: string, staleMs: number, logger: Logger | undefined): Promise<boolean> {
  const observed = await statIfExists(lockPath);
  if (observed === undefined) {
    return true;
  }
  if (Date.now() - observed.mtimeMs < staleMs) {
    return false;
  }

  const claimedPath = `${lockPath}.${nanoid(10)}.stale`;
  try {
    await rename(lockPath, claimedPath);
  } catch (error) {
    // Another contender moved it first
    if (errnoCode(error) === 'ENOENT') {
      return false;
    }
    throw new StoreIOError('break stale lock', lockPath, asError(error));
  }

  try {
    const claimed = await statIfExists(claimedPath);
    if (claimed !== undefined && !sameFile(observed, claimed)) {
      try {
        await link(claimedPath, lockPath);
      } catch (error) {
        if (errnoCode(error) !== 'EEXIST') {
          throw new StoreIOError('restore lock file', lockPath, asError(error));
        }
      }
      return false;
    }
  } finally {
    try {
      await unlink(claimedPath);
    } catch (error) {
      if (errnoCode(error) !== 'ENOENT') {
        throw new StoreIOError('remove stale lock', claimedPath, asError(error));
      }
    }
  }

  logger?.warn('Removed stale store lock', { component: 'file-lock', lockPath });
  return true;
}

async function releaseOwned(lockPath: string, token: string): Promise<void> {
  let current: string;
  try {
    current = await readFile(lockPath, 'utf-8');
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return;
    }
    throw new StoreIOError('read lock file', lockPath, asError(error));
  }
  if (current !== token) {
    // Broken as stale and taken over by another holder
    return;
  }
  try {
    await unlink(lockPath);
  } catch (error) {
    if (errnoCode(error) !== 'ENOENT') {
      throw new StoreIOError('remove lock file', lockPath, asError(error));
    }
  }
}

async function waitForLock(lockPath: string, deadline: number, options: FileLockOptions): Promise<string> {
  for (;;) {
    const token = await tryCreate(lockPath);
    if (token !== undefined) {
      return token;
    }
    if (await breakIfStale(lockPath, options.staleMs, options.logger)) {
      continue;
    }
    if (Date.now() >= deadline) {
      throw new StoreLockedError(lockPath, options.timeoutMs);
    }
    await sleep(options.retryIntervalMs);
  }
}

/**
 * Acquire the lock for `targetPath`, waiting for another holder up to `timeoutMs`.
 * @throws StoreLockedError when the wait times out
 */
export async function acquireFileLock(targetPath: string, options: FileLockOptions): Promise<FileLock> {
  const lockPath = lockPathFor(targetPath);
  const deadline = Date.now() + options.timeoutMs;

  const ownToken = await waitForLock(lockPath, deadline, options);
  let released = false;
  return {
    path: lockPath,
    async release(): Promise<void> {
      if (released) return;
      released = true;
      await releaseOwned(lockPath, ownToken);
    },
  };
}

/** Run `fn` while holding the lock for `targetPath`. */
export async function withFileLock<T>(
  targetPath: string,
  options: FileLockOptions,
  fn: () => Promise<T>,
): Promise<T> {
  const lock = await acquireFileLock(targetPath, options);
  try {
    return await fn();
  } finally {
    await lock.release();
  }
}
