/**
 * Crypto module — master key handling, tiered key derivation and the
 * AES-256-GCM envelope for individual secret values.
 * @module crypto
 */
export type {
  KeySource,
  ResolveMasterKeyOptions,
  ResolvedMasterKey,
  SealedValue,
  SecurityTier,
  SecurityTierName,
} from './types.js';
export { AUTH_TAG_LENGTH, KEY_LENGTH, NONCE_LENGTH, SALT_LENGTH } from './types.js';
export { encrypt, decrypt } from './cipher.js';
export {
  SECURITY_TIERS,
  SECURITY_TIER_NAMES,
  deriveKey,
  generateSalt,
  getSecurityTier,
  iterationsFor,
  parseSecurityTier,
} from './tier-policy.js';
export {
  decodeMasterKey,
  encodeMasterKey,
  generateMasterKey,
  persistMasterKey,
  resolveMasterKey,
} from './key-manager.js';
