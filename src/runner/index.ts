// Runner — inject decrypted secrets into a child process environment
export type { CommandExecutor, EnvironmentSource, RunResult } from './types.js';
export { buildChildEnvironment, runWithSecrets } from './run-with-secrets.js';
export type { RunWithSecretsDeps } from './run-with-secrets.js';
export { createSpawnExecutor, exitCodeForSignal } from './spawn-executor.js';
