/**
 * Master key lifecycle: generation, base64 encoding, resolution and persistence.
 *
 * Resolution order:
 * 1. Environment variable (non-empty value)
 * 2. Key file next to the store
 *
 * Key bytes are never logged; errors name the source, not the material.
 */
import { randomBytes } from 'node:crypto';
import { readFile } from 'node:fs/promises';

import { InvalidKeyError, MissingKeyError, StoreIOError, errnoCode } from '../core/errors.js';
import { writeFileAtomic } from '../infrastructure/atomic-write.js';

import { KEY_LENGTH } from './types.js';
import type { KeySource, ResolveMasterKeyOptions, ResolvedMasterKey } from './types.js';

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;
const KEY_FILE_MODE = 0o600;

/** Generate a new random 256-bit master key. */
export function generateMasterKey(): Buffer {
  return randomBytes(KEY_LENGTH);
}

/** Base64 form written to the key file and accepted by the environment override. */
export function encodeMasterKey(key: Buffer): string {
  return key.toString('base64');
}

/**
 * Decode a base64 master key.
 * Buffer.from() silently skips invalid characters, so the text is checked first.
 *
 * @throws InvalidKeyError if the text is not base64 or the key is not 32 bytes
 */
export function decodeMasterKey(encoded: string, source: KeySource): Buffer {
  const text = encoded.trim();
  if (text.length === 0 || !BASE64_PATTERN.test(text)) {
    throw new InvalidKeyError(`Master key from ${source} is not valid base64`, { source });
  }

  const key = Buffer.from(text, 'base64');
  if (key.length !== KEY_LENGTH) {
    throw new InvalidKeyError(
      `Master key from ${source} must decode to ${KEY_LENGTH.toString()} bytes, got ${key.length.toString()}`,
      { source, actualLength: key.length },
    );
  }
  return key;
}

/**
 * Resolve the master key for the current invocation.
 *
 * @throws MissingKeyError if neither the variable nor the key file exists
 * @throws InvalidKeyError if the source found holds a malformed key
 */
export async function resolveMasterKey(options: ResolveMasterKeyOptions): Promise<ResolvedMasterKey> {
  const { keyFilePath, envVarName } = options;
  const env = options.env ?? process.env;

  const override = env[envVarName];
  if (override !== undefined && override.trim().length > 0) {
    return { key: decodeMasterKey(override, 'environment'), source: 'environment' };
  }

  let contents: string;
  try {
    contents = await readFile(keyFilePath, 'utf-8');
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      throw new MissingKeyError(keyFilePath, envVarName);
    }
    throw new StoreIOError('read key file', keyFilePath, error instanceof Error ? error : undefined);
  }

  return { key: decodeMasterKey(contents, 'file'), source: 'file' };
}

/**
 * Write the key file (owner read/write only).
 * Only `init` calls this; there is no other mutation of the key file.
 */
export async function persistMasterKey(key: Buffer, keyFilePath: string): Promise<void> {
  if (key.length !== KEY_LENGTH) {
    throw new InvalidKeyError(`Master key must be ${KEY_LENGTH.toString()} bytes`, {
      actualLength: key.length,
    });
  }
  await writeFileAtomic(keyFilePath, `${encodeMasterKey(key)}\n`, { mode: KEY_FILE_MODE });
}
