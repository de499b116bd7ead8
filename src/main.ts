#!/usr/bin/env node
import 'dotenv/config';

import { parseCliArgs } from './cli/args.js';
import type { CliArgs } from './cli/args.js';
import { executeCommand } from './cli/commands.js';
import type { CliIO } from './cli/output.js';
import { printError } from './cli/output.js';
import { createStoreContext, resolveConfig } from './config/loader.js';
import { SealenvError } from './core/errors.js';
import { createLogger } from './observability/logger.js';
import { createSpawnExecutor } from './runner/spawn-executor.js';
import { createSecretStore } from './store/secret-store.js';

const io: CliIO = {
  stdout: process.stdout,
  stderr: process.stderr,
  color: process.stdout.isTTY === true && process.env['NO_COLOR'] === undefined,
};

async function main(): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof SealenvError) {
      printError(io, error.message);
      return 1;
    }
    throw error;
  }

  const configResult = await resolveConfig({ directory: args.directory, configPath: args.configPath });
  if (!configResult.ok) {
    printError(io, configResult.error.message);
    return 1;
  }
  const config = configResult.value;

  const logger = createLogger({ level: config.logLevel, name: 'sealenv' });
  const store = createSecretStore({
    context: createStoreContext(args.directory, config),
    logger,
  });

  return executeCommand(args.command, {
    store,
    config,
    executor: createSpawnExecutor(),
    io,
    logger,
  });
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    printError(io, error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
