/**
 * Run a command with every secret injected as an environment variable.
 * Secrets override variables of the same name from the parent environment.
 */
import { ValidationError } from '../core/errors.js';
import type { Logger } from '../observability/logger.js';

import type { CommandExecutor, EnvironmentSource, RunResult } from './types.js';

export interface RunWithSecretsDeps {
  source: EnvironmentSource;
  executor: CommandExecutor;
  /** Parent environment. Default: process.env */
  baseEnv?: NodeJS.ProcessEnv;
  logger?: Logger;
}

/** Merge the parent environment with decrypted secrets; secrets win. */
export function buildChildEnvironment(
  baseEnv: NodeJS.ProcessEnv,
  secrets: Record<string, string>,
): NodeJS.ProcessEnv {
  return { ...baseEnv, ...secrets };
}

/**
 * Resolve secrets, then hand the command and merged environment to the executor.
 * @throws ValidationError if `command` is empty
 */
export async function runWithSecrets(deps: RunWithSecretsDeps, command: readonly string[]): Promise<RunResult> {
  if (command.length === 0) {
    throw new ValidationError('No command given to run');
  }

  const secrets = await deps.source.resolveEnvironment();
  const env = buildChildEnvironment(deps.baseEnv ?? process.env, secrets);
  const injected = Object.keys(secrets).length;

  deps.logger?.info('Running command with secrets', {
    component: 'runner',
    command: command[0],
    injected,
  });

  const exitCode = await deps.executor.execute(command, env);
  return { exitCode, injected };
}
