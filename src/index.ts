/**
 * sealenv — encrypted, git-committable secret store for development and CI.
 *
 * Library entry point: the store engine, its crypto envelope, configuration
 * and the run-with-secrets capability. The command line lives in main.ts.
 */
export * from './core/index.js';
export * from './crypto/index.js';
export * from './store/index.js';
export * from './config/index.js';
export * from './runner/index.js';
export * from './observability/index.js';
export * from './infrastructure/index.js';
