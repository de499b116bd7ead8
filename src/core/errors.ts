/**
 * Base error class for all sealenv errors.
 * Carries a machine-readable code and structured context so callers can
 * tell a tampered store apart from a missing file without parsing messages.
 */
export class SealenvError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(params: {
    message: string;
    code: string;
    cause?: Error;
    context?: Record<string, unknown>;
    isOperational?: boolean;
  }) {
    super(params.message, { cause: params.cause });
    this.name = 'SealenvError';
    this.code = params.code;
    this.context = params.context;
    this.isOperational = params.isOperational ?? true;
  }
}

/** Thrown when `init` runs against a directory that already holds a store. */
export class InitializationError extends SealenvError {
  constructor(storePath: string) {
    super({
      message: `A secret store already exists at ${storePath}`,
      code: 'STORE_ALREADY_INITIALIZED',
      context: { storePath },
    });
    this.name = 'InitializationError';
  }
}

/** Thrown when an operation needs a store file that does not exist yet. */
export class StoreNotInitializedError extends SealenvError {
  constructor(storePath: string) {
    super({
      message: `No secret store found at ${storePath}. Run "sealenv init" first.`,
      code: 'STORE_NOT_INITIALIZED',
      context: { storePath },
    });
    this.name = 'StoreNotInitializedError';
  }
}

/** Thrown when neither the environment override nor the key file provides a master key. */
export class MissingKeyError extends SealenvError {
  constructor(keyFilePath: string, envVarName: string) {
    super({
      message: `Master key not found: set ${envVarName} or provide ${keyFilePath}`,
      code: 'MISSING_KEY',
      context: { keyFilePath, envVarName },
    });
    this.name = 'MissingKeyError';
  }
}

/** Thrown when key material is not valid base64 or does not decode to 32 bytes. */
export class InvalidKeyError extends SealenvError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'INVALID_KEY',
      context,
    });
    this.name = 'InvalidKeyError';
  }
}

/** Thrown when a secret name is not present in the store. */
export class NotFoundError extends SealenvError {
  constructor(name: string) {
    super({
      message: `Secret not found: ${name}`,
      code: 'SECRET_NOT_FOUND',
      context: { name },
    });
    this.name = 'NotFoundError';
  }
}

/**
 * Thrown when a GCM tag does not verify.
 * Signals tampering or a wrong key, never an I/O failure.
 */
export class AuthenticationError extends SealenvError {
  constructor(context?: Record<string, unknown>, cause?: Error) {
    super({
      message: 'Authentication failed: the secret was tampered with or the key is wrong',
      code: 'AUTHENTICATION_FAILED',
      cause,
      context,
    });
    this.name = 'AuthenticationError';
  }
}

/** Thrown when ciphertext, nonce or key are structurally malformed. */
export class DecryptionError extends SealenvError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'DECRYPTION_FAILED',
      context,
    });
    this.name = 'DecryptionError';
  }
}

/** Thrown when the store file exists but is not valid JSON or misses required fields. */
export class CorruptStoreError extends SealenvError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'CORRUPT_STORE',
      context,
    });
    this.name = 'CorruptStoreError';
  }
}

/** Thrown when the filesystem refuses a read or write (permissions, disk full, ...). */
export class StoreIOError extends SealenvError {
  constructor(operation: string, path: string, cause?: Error, extra?: Record<string, unknown>) {
    const errno = cause !== undefined && 'code' in cause ? cause.code : undefined;
    super({
      message: `Failed to ${operation} ${path}${cause ? `: ${cause.message}` : ''}`,
      code: 'STORE_IO_ERROR',
      cause,
      context: { operation, path, errno, ...extra },
    });
    this.name = 'StoreIOError';
  }
}

/** Thrown when another invocation holds the store lock past the wait timeout. */
export class StoreLockedError extends SealenvError {
  constructor(lockPath: string, timeoutMs: number) {
    super({
      message: `Store is locked by another process (${lockPath}); gave up after ${timeoutMs.toString()}ms`,
      code: 'STORE_LOCKED',
      context: { lockPath, timeoutMs },
    });
    this.name = 'StoreLockedError';
  }
}

/** Thrown when caller input fails validation (secret names, export formats, ...). */
export class ValidationError extends SealenvError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'VALIDATION_ERROR',
      context,
    });
    this.name = 'ValidationError';
  }
}

/** Thrown when configuration loading or validation fails. */
export class ConfigError extends SealenvError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'CONFIG_ERROR',
      context,
    });
    this.name = 'ConfigError';
  }
}

/** Extracts the errno code of a Node.js filesystem error, if any. */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
