/**
 * Types for the encrypted secret store.
 * The store file is committed to version control; it holds ciphertext only.
 * Plaintext exists in memory for the duration of a single operation.
 */
import type { SecurityTier, SecurityTierName } from '../crypto/types.js';
import type { FileLockOptions } from '../infrastructure/file-lock.js';
import type { Logger } from '../observability/logger.js';

export const STORE_FORMAT_VERSION = '1.0';

// ─── Domain Types ────────────────────────────────────────────────

/** One encrypted secret as held in memory after loading. */
export interface SecretRecord {
  name: string;
  ciphertext: Buffer;
  nonce: Buffer;
  updatedAt?: string;
}

/**
 * The decoded store file. `secrets` is a Map so that insertion order
 * survives updates: replacing a name keeps its position.
 */
export interface StoreFile {
  version: string;
  tier: SecurityTier;
  salt?: Buffer;
  createdAt?: string;
  secrets: Map<string, SecretRecord>;
}

/** Everything a store needs to locate its files; passed explicitly, never global. */
export interface StoreContext {
  /** Directory holding the store. */
  directory: string;
  /** Absolute path of the encrypted store file. */
  storePath: string;
  /** Absolute path of the master key file. */
  keyFilePath: string;
  /** Environment variable that overrides the key file. */
  keyEnvVar: string;
  /** Advisory lock around mutations; `false` disables it. */
  lock: Omit<FileLockOptions, 'logger'> | false;
}

export type ExportFormat = 'env' | 'json';

/** One entry of `list()`. `value` is present only when values were requested. */
export interface ListedSecret {
  name: string;
  value?: string;
  updatedAt?: string;
}

/** Metadata about a single secret, read without decrypting. */
export interface SecretMetadata {
  name: string;
  updatedAt?: string;
}

/** Store summary, read without the master key. */
export interface StoreInfo {
  version: string;
  tier: SecurityTierName;
  iterations: number;
  secretCount: number;
  createdAt?: string;
  storePath: string;
}

// ─── Service Interface ───────────────────────────────────────────

export interface SecretStore {
  readonly context: StoreContext;

  /** Whether a store file exists at the context's path. */
  isInitialized(): Promise<boolean>;

  /** Create the master key and an empty store. Throws InitializationError if one exists. */
  init(tier: SecurityTier): Promise<void>;

  /** Encrypt and store a value. Replaces in place if the name exists, otherwise appends. */
  add(name: string, value: string): Promise<void>;

  /** Decrypt a secret. Throws NotFoundError if absent. */
  get(name: string): Promise<string>;

  /** Whether a secret exists, without decrypting. */
  has(name: string): Promise<boolean>;

  /** Metadata about a secret, without decrypting. Throws NotFoundError if absent. */
  inspect(name: string): Promise<SecretMetadata>;

  /** Delete a secret. Throws NotFoundError if absent. */
  remove(name: string): Promise<void>;

  /** Names in insertion order; values are decrypted only when requested. */
  list(includeValues: boolean): Promise<ListedSecret[]>;

  /** Render every secret decrypted, in `env` or `json` format. */
  exportAll(format: ExportFormat): Promise<string>;

  /** Every secret decrypted, for injection into a child process environment. */
  resolveEnvironment(): Promise<Record<string, string>>;

  /** Tier, iteration count and secret count, without the master key. */
  info(): Promise<StoreInfo>;
}

export interface SecretStoreDeps {
  context: StoreContext;
  logger?: Logger;
  /** Environment the key override is read from. Default: process.env */
  env?: NodeJS.ProcessEnv;
  /** Clock for `created_at` / `updated_at`. Default: () => new Date() */
  now?: () => Date;
}
