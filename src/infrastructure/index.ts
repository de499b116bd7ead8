// Filesystem primitives — atomic replacement and advisory locking
export { temporaryPathFor, writeFileAtomic } from './atomic-write.js';
export type { AtomicWriteOptions } from './atomic-write.js';
export { acquireFileLock, lockPathFor, withFileLock } from './file-lock.js';
export type { FileLock, FileLockOptions } from './file-lock.js';
