/**
 * AES-256-GCM encryption/decryption for individual secret values.
 * Uses Node.js built-in `crypto` module.
 */
import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';

import { AuthenticationError, DecryptionError, InvalidKeyError } from '../core/errors.js';

import { AUTH_TAG_LENGTH, KEY_LENGTH, NONCE_LENGTH } from './types.js';
import type { SealedValue } from './types.js';

const ALGORITHM = 'aes-256-gcm';

/**
 * Encrypt a value with a fresh random nonce.
 * Returns the ciphertext with the auth tag appended, and the nonce used.
 */
export function encrypt(key: Buffer, plaintext: string | Uint8Array): SealedValue {
  if (key.length !== KEY_LENGTH) {
    throw new InvalidKeyError(`Encryption key must be ${KEY_LENGTH.toString()} bytes`, {
      actualLength: key.length,
    });
  }

  const nonce = randomBytes(NONCE_LENGTH);
  const cipher = createCipheriv(ALGORITHM, key, nonce, { authTagLength: AUTH_TAG_LENGTH });
  const input = typeof plaintext === 'string' ? Buffer.from(plaintext, 'utf8') : plaintext;
  const encrypted = Buffer.concat([cipher.update(input), cipher.final()]);

  return {
    ciphertext: Buffer.concat([encrypted, cipher.getAuthTag()]),
    nonce,
  };
}

/**
 * Verify and decrypt a sealed value.
 * Throws DecryptionError for malformed input, AuthenticationError if the tag
 * does not verify (tampered data or wrong key).
 */
export function decrypt(key: Buffer, sealed: SealedValue): Buffer {
  const { ciphertext, nonce } = sealed;

  if (key.length !== KEY_LENGTH) {
    throw new DecryptionError(`Decryption key must be ${KEY_LENGTH.toString()} bytes`, {
      actualLength: key.length,
    });
  }
  if (nonce.length !== NONCE_LENGTH) {
    throw new DecryptionError(`Nonce must be ${NONCE_LENGTH.toString()} bytes`, {
      actualLength: nonce.length,
    });
  }
  if (ciphertext.length < AUTH_TAG_LENGTH) {
    throw new DecryptionError('Ciphertext is shorter than the authentication tag', {
      actualLength: ciphertext.length,
    });
  }

  const body = ciphertext.subarray(0, ciphertext.length - AUTH_TAG_LENGTH);
  const authTag = ciphertext.subarray(ciphertext.length - AUTH_TAG_LENGTH);

  const decipher = createDecipheriv(ALGORITHM, key, nonce, { authTagLength: AUTH_TAG_LENGTH });
  decipher.setAuthTag(authTag);

  try {
    return Buffer.concat([decipher.update(body), decipher.final()]);
  } catch (error) {
    throw new AuthenticationError(
      { ciphertextLength: ciphertext.length },
      error instanceof Error ? error : undefined,
    );
  }
}
