/**
 * Store module — the encrypted, git-committable secret store file.
 * @module store
 */
export type {
  ExportFormat,
  ListedSecret,
  SecretMetadata,
  SecretRecord,
  SecretStore,
  SecretStoreDeps,
  StoreContext,
  StoreFile,
  StoreInfo,
} from './types.js';
export { STORE_FORMAT_VERSION } from './types.js';
export { createSecretStore } from './secret-store.js';
export { SECRET_NAME_PATTERN, assertSecretName, isValidSecretName } from './secret-name.js';
export { parseStoreFile, serializeStoreFile, migrateStoreFile, storeFileSchema } from './store-file.js';
export type { StoreFileJson } from './store-file.js';
export {
  EXPORT_FORMATS,
  assertExportFormat,
  formatEnv,
  formatJson,
  isExportFormat,
  quoteEnvValue,
  renderExport,
} from './export-format.js';
