/**
 * Security tiers and key derivation.
 * The tier is fixed per store at init; enhanced and max deliberately cost
 * 100–500ms of PBKDF2 work every time a key is derived.
 */
import { pbkdf2Sync, randomBytes } from 'node:crypto';

import { ConfigError, InvalidKeyError } from '../core/errors.js';

import { KEY_LENGTH, SALT_LENGTH } from './types.js';
import type { SecurityTier, SecurityTierName } from './types.js';

const DIGEST = 'sha256';

export const SECURITY_TIERS = {
  standard: { name: 'standard', iterations: 0 },
  enhanced: { name: 'enhanced', iterations: 100_000 },
  max: { name: 'max', iterations: 500_000 },
} as const satisfies { [K in SecurityTierName]: SecurityTier & { name: K } };

export const SECURITY_TIER_NAMES = ['standard', 'enhanced', 'max'] as const satisfies readonly SecurityTierName[];

function isSecurityTierName(value: string): value is SecurityTierName {
  return SECURITY_TIER_NAMES.some((name) => name === value);
}

/** Look up a tier by name. */
export function getSecurityTier(name: SecurityTierName): SecurityTier {
  return SECURITY_TIERS[name];
}

/**
 * Parse a tier name arriving from outside (CLI argument, config value).
 * @throws ConfigError for an unknown tier
 */
export function parseSecurityTier(value: string): SecurityTier {
  const normalized = value.trim().toLowerCase();
  if (!isSecurityTierName(normalized)) {
    throw new ConfigError(`Unknown security tier "${value}"`, {
      tier: value,
      allowed: [...SECURITY_TIER_NAMES],
    });
  }
  return SECURITY_TIERS[normalized];
}

/** PBKDF2 iteration count for a tier. */
export function iterationsFor(name: SecurityTierName): number {
  return SECURITY_TIERS[name].iterations;
}

/** Random salt, generated once per store at init. */
export function generateSalt(): Buffer {
  return randomBytes(SALT_LENGTH);
}

/**
 * Derive the working key for a store.
 * Standard returns the master key itself; other tiers run
 * PBKDF2-HMAC-SHA256 over the master key with the store's salt.
 */
export function deriveKey(masterKey: Buffer, salt: Buffer | undefined, tier: SecurityTier): Buffer {
  if (masterKey.length !== KEY_LENGTH) {
    throw new InvalidKeyError(`Master key must be ${KEY_LENGTH.toString()} bytes`, {
      actualLength: masterKey.length,
    });
  }

  if (tier.name === 'standard') {
    return masterKey;
  }

  if (salt === undefined || salt.length === 0) {
    throw new InvalidKeyError(`Tier "${tier.name}" requires a salt`, { tier: tier.name });
  }

  return pbkdf2Sync(masterKey, salt, tier.iterations, KEY_LENGTH, DIGEST);
}
