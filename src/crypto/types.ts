/**
 * Types and constants for the cryptographic envelope.
 * Secrets are AES-256-GCM encrypted one value at a time; the key is either the
 * master key itself or a PBKDF2 derivation of it, depending on the store's tier.
 */

// ─── Sizes ──────────────────────────────────────────────────────

export const KEY_LENGTH = 32; // 256-bit master and derived keys
export const NONCE_LENGTH = 12; // 96-bit nonce recommended for GCM
export const AUTH_TAG_LENGTH = 16; // 128-bit tag
export const SALT_LENGTH = 16;

// ─── Envelope ───────────────────────────────────────────────────

/** One encrypted value. `ciphertext` carries the GCM tag as its last 16 bytes. */
export interface SealedValue {
  ciphertext: Buffer;
  nonce: Buffer;
}

// ─── Security Tiers ─────────────────────────────────────────────

export type SecurityTierName = 'standard' | 'enhanced' | 'max';

/** Closed tagged variant: a tier name always travels with its iteration count. */
export type SecurityTier =
  | { readonly name: 'standard'; readonly iterations: 0 }
  | { readonly name: 'enhanced'; readonly iterations: 100_000 }
  | { readonly name: 'max'; readonly iterations: 500_000 };

// ─── Master Key ─────────────────────────────────────────────────

/** Where a resolved master key came from. */
export type KeySource = 'environment' | 'file';

export interface ResolvedMasterKey {
  key: Buffer;
  source: KeySource;
}

export interface ResolveMasterKeyOptions {
  /** Path of the base64 key file. */
  keyFilePath: string;
  /** Name of the environment variable that overrides the key file. */
  envVarName: string;
  /** Environment to read the override from. Default: process.env */
  env?: NodeJS.ProcessEnv;
}
