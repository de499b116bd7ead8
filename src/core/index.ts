// Core module — error taxonomy and Result helpers shared by every layer
export type { Result } from './result.js';
export { ok, err, isErr, unwrap } from './result.js';

export {
  SealenvError,
  InitializationError,
  StoreNotInitializedError,
  MissingKeyError,
  InvalidKeyError,
  NotFoundError,
  AuthenticationError,
  DecryptionError,
  CorruptStoreError,
  StoreIOError,
  StoreLockedError,
  ValidationError,
  ConfigError,
  errnoCode,
} from './errors.js';
