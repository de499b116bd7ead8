/**
 * Store file codec — zod schema for the on-disk JSON, the load-time
 * migration step, and serialization back to JSON.
 */
import { z } from 'zod';

import { CorruptStoreError } from '../core/errors.js';
import type { Result } from '../core/result.js';
import { err, ok } from '../core/result.js';
import { getSecurityTier, SECURITY_TIER_NAMES } from '../crypto/tier-policy.js';
import { NONCE_LENGTH } from '../crypto/types.js';

import { isValidSecretName } from './secret-name.js';
import { STORE_FORMAT_VERSION } from './types.js';
import type { SecretRecord, StoreFile } from './types.js';

// ─── Schema ─────────────────────────────────────────────────────

const base64String = z
  .string()
  .regex(/^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/, 'Must be base64');

export const secretEntrySchema = z.object({
  ciphertext: base64String,
  nonce: base64String,
  updated_at: z.string().optional(),
});

/** The file as written by any 1.x release; `security_tier` may be absent in early files. */
export const storeFileSchema = z.object({
  version: z.string().regex(/^1\.\d+$/, `Unsupported store version (expected ${STORE_FORMAT_VERSION})`),
  security_tier: z.enum(SECURITY_TIER_NAMES).optional(),
  salt: base64String.optional(),
  created_at: z.string().optional(),
  secrets: z.record(z.string(), secretEntrySchema),
});

export type StoreFileJson = z.infer<typeof storeFileSchema>;

// ─── Migration ──────────────────────────────────────────────────

/**
 * Upgrade a parsed file to the current shape. Runs once per load.
 * Files written before tiers existed carry no `security_tier`: they are standard.
 */
export function migrateStoreFile(raw: StoreFileJson): StoreFileJson & {
  security_tier: NonNullable<StoreFileJson['security_tier']>;
} {
  return { ...raw, security_tier: raw.security_tier ?? 'standard' };
}

// ─── Decode / Encode ────────────────────────────────────────────

/** Keys of the `secrets` object exactly as JSON.parse produced them, before zod drops any. */
function rawSecretNames(parsed: unknown): string[] {
  if (typeof parsed !== 'object' || parsed === null || !('secrets' in parsed)) {
    return [];
  }
  const { secrets } = parsed;
  if (typeof secrets !== 'object' || secrets === null) {
    return [];
  }
  return Object.keys(secrets);
}

/**
 * Parse the store file contents.
 * Returns CorruptStoreError for invalid JSON, missing fields, a secret name
 * that is not a valid variable name, or a salt that does not match the tier
 * (present iff tier is not standard).
 */
export function parseStoreFile(contents: string, storePath: string): Result<StoreFile, CorruptStoreError> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch {
    return err(new CorruptStoreError('Store file is not valid JSON', { storePath }));
  }

  const validation = storeFileSchema.safeParse(parsed);
  if (!validation.success) {
    const issues = validation.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    return err(new CorruptStoreError('Store file failed validation', { storePath, issues }));
  }

  const invalidNames = rawSecretNames(parsed).filter((name) => !isValidSecretName(name));
  if (invalidNames.length > 0) {
    return err(
      new CorruptStoreError('Store file contains invalid secret names', { storePath, names: invalidNames }),
    );
  }

  const migrated = migrateStoreFile(validation.data);
  const tier = getSecurityTier(migrated.security_tier);

  if (tier.name === 'standard' && migrated.salt !== undefined) {
    return err(new CorruptStoreError('Standard-tier store must not carry a salt', { storePath }));
  }
  if (tier.name !== 'standard' && (migrated.salt === undefined || migrated.salt.length === 0)) {
    return err(
      new CorruptStoreError(`Store with tier "${tier.name}" is missing its salt`, { storePath }),
    );
  }

  const secrets = new Map<string, SecretRecord>();
  for (const [name, entry] of Object.entries(migrated.secrets)) {
    const nonce = Buffer.from(entry.nonce, 'base64');
    if (nonce.length !== NONCE_LENGTH) {
      return err(
        new CorruptStoreError(`Secret "${name}" has a malformed nonce`, {
          storePath,
          name,
          nonceLength: nonce.length,
        }),
      );
    }
    secrets.set(name, {
      name,
      ciphertext: Buffer.from(entry.ciphertext, 'base64'),
      nonce,
      updatedAt: entry.updated_at,
    });
  }

  return ok({
    version: migrated.version,
    tier,
    salt: migrated.salt !== undefined ? Buffer.from(migrated.salt, 'base64') : undefined,
    createdAt: migrated.created_at,
    secrets,
  });
}

/** Serialize to the on-disk JSON form (2-space indentation, trailing newline). */
export function serializeStoreFile(file: StoreFile): string {
  const secrets: StoreFileJson['secrets'] = Object.fromEntries(
    [...file.secrets.values()].map((record) => [
      record.name,
      {
        ciphertext: record.ciphertext.toString('base64'),
        nonce: record.nonce.toString('base64'),
        ...(record.updatedAt !== undefined ? { updated_at: record.updatedAt } : {}),
      },
    ]),
  );

  const json: StoreFileJson = {
    version: file.version,
    security_tier: file.tier.name,
    ...(file.salt !== undefined ? { salt: file.salt.toString('base64') } : {}),
    ...(file.createdAt !== undefined ? { created_at: file.createdAt } : {}),
    secrets,
  };

  return `${JSON.stringify(json, null, 2)}\n`;
}
