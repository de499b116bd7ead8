// ─── Schemas ────────────────────────────────────────────────────
export { lockConfigSchema, sealenvConfigSchema } from './schema.js';
export type { LockConfig, SealenvConfig, SealenvConfigInput } from './schema.js';

// ─── Loader ─────────────────────────────────────────────────────
export {
  CONFIG_FILE_NAME,
  createStoreContext,
  defaultConfig,
  loadConfig,
  resolveConfig,
  resolveEnvVars,
} from './loader.js';
