/**
 * Zod schema for the optional `sealenv.config.json` file.
 * Every field has a default, so an absent file and `{}` are equivalent.
 */
import { z } from 'zod';

import { SECURITY_TIER_NAMES } from '../crypto/tier-policy.js';

const ENV_VAR_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

// ─── Lock Config ────────────────────────────────────────────────

/**
 * Schema for the advisory lock taken around store mutations.
 */
export const lockConfigSchema = z.object({
  enabled: z.boolean().default(true),
  timeoutMs: z.number().int().positive('Lock timeout must be a positive integer').default(5_000),
  staleMs: z.number().int().positive('Stale lock age must be a positive integer').default(30_000),
  retryIntervalMs: z.number().int().positive('Retry interval must be a positive integer').default(50),
});

// ─── sealenv Config ─────────────────────────────────────────────

export const sealenvConfigSchema = z.object({
  storeFile: z.string().min(1, 'Store file name cannot be empty').default('.secrets'),
  keyFile: z.string().min(1, 'Key file name cannot be empty').default('.secrets.key'),
  keyEnvVar: z
    .string()
    .regex(ENV_VAR_NAME, 'Key override must be a valid environment variable name')
    .default('SEALENV_MASTER_KEY'),
  defaultTier: z.enum(SECURITY_TIER_NAMES).default('standard'),
  /** Unset: LOG_LEVEL from the environment, then `warn`. */
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
  /** Append the key file to `.gitignore` at init. */
  gitignore: z.boolean().default(true),
  lock: lockConfigSchema.default({}),
});

// ─── Inferred Types ─────────────────────────────────────────────

/** Inferred type from lockConfigSchema */
export type LockConfig = z.infer<typeof lockConfigSchema>;

/** Inferred type from sealenvConfigSchema (defaults applied) */
export type SealenvConfig = z.infer<typeof sealenvConfigSchema>;

/** Shape accepted in the config file (every field optional) */
export type SealenvConfigInput = z.input<typeof sealenvConfigSchema>;
