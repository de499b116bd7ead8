/**
 * Command dispatch — maps a parsed command onto SecretStore operations and
 * store errors onto messages and exit codes. The core never exits the process.
 */
import { basename, relative } from 'node:path';

import { SealenvError } from '../core/errors.js';
import { getSecurityTier } from '../crypto/tier-policy.js';
import type { SealenvConfig } from '../config/schema.js';
import type { Logger } from '../observability/logger.js';
import { runWithSecrets } from '../runner/run-with-secrets.js';
import type { CommandExecutor } from '../runner/types.js';
import type { SecretStore } from '../store/types.js';

import type { CliCommand } from './args.js';
import { ensureGitignoreEntry } from './gitignore.js';
import {
  USAGE,
  formatInfo,
  formatSecretsTable,
  printError,
  printInfo,
  printSuccess,
  printWarning,
} from './output.js';
import type { CliIO } from './output.js';

export const VERSION = '0.1.0';

export interface CommandDeps {
  store: SecretStore;
  config: SealenvConfig;
  executor: CommandExecutor;
  io: CliIO;
  logger: Logger;
  /** Parent environment for `run`. Default: process.env */
  env?: NodeJS.ProcessEnv;
}

const HINTS: Record<string, string> = {
  AUTHENTICATION_FAILED: 'The store was modified, or the master key does not belong to this store.',
  CORRUPT_STORE: 'Restore the store file from version control.',
  STORE_LOCKED: 'Another sealenv process is writing; retry, or remove a leftover lock file.',
};

async function dispatch(command: CliCommand, deps: CommandDeps): Promise<number> {
  const { store, config, io } = deps;

  switch (command.type) {
    case 'help':
      io.stdout.write(USAGE);
      return 0;

    case 'version':
      io.stdout.write(`sealenv ${VERSION}\n`);
      return 0;

    case 'init': {
      const tier = command.tier ?? getSecurityTier(config.defaultTier);
      await store.init(tier);
      printSuccess(io, `Initialized secret store (tier: ${tier.name})`);

      const { directory, keyFilePath } = store.context;
      const keyEntry = relative(directory, keyFilePath) || basename(keyFilePath);
      if (config.gitignore) {
        const update = await ensureGitignoreEntry(directory, keyEntry);
        if (update !== 'present') {
          printInfo(io, `Added ${keyEntry} to .gitignore`);
        }
      }
      printWarning(io, `Keep ${keyEntry} out of version control; share it through ${config.keyEnvVar} in CI.`);
      return 0;
    }

    case 'add':
      await store.add(command.name, command.value);
      printSuccess(io, `Added secret: ${command.name}`);
      return 0;

    case 'get':
      if (command.show) {
        io.stdout.write(`${await store.get(command.name)}\n`);
        return 0;
      }
      if (await store.has(command.name)) {
        printInfo(io, `Secret ${command.name} exists`);
        return 0;
      }
      printError(io, `Secret not found: ${command.name}`);
      return 1;

    case 'ls': {
      const secrets = await store.list(command.values);
      const { tier } = await store.info();
      io.stdout.write(formatSecretsTable(io, secrets, tier));
      return 0;
    }

    case 'rm':
      await store.remove(command.name);
      printSuccess(io, `Removed secret: ${command.name}`);
      return 0;

    case 'export':
      io.stdout.write(await store.exportAll(command.format));
      return 0;

    case 'run': {
      const result = await runWithSecrets(
        { source: store, executor: deps.executor, baseEnv: deps.env, logger: deps.logger },
        command.command,
      );
      return result.exitCode;
    }

    case 'info':
      io.stdout.write(formatInfo(io, await store.info()));
      return 0;
  }
}

/**
 * Execute one command and return the process exit code.
 * Known errors become a message on stderr and exit code 1.
 */
export async function executeCommand(command: CliCommand, deps: CommandDeps): Promise<number> {
  try {
    return await dispatch(command, deps);
  } catch (error) {
    if (error instanceof SealenvError) {
      printError(deps.io, error.message);
      const hint = HINTS[error.code];
      if (hint !== undefined) {
        deps.io.stderr.write(`  ${hint}\n`);
      }
      deps.logger.debug('Command failed', { component: 'cli', code: error.code, context: error.context });
      return 1;
    }
    deps.logger.error('Unexpected failure', { component: 'cli', err: error });
    printError(deps.io, error instanceof Error ? error.message : String(error));
    return 1;
  }
}
