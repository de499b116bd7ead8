/**
 * CommandExecutor backed by child_process.spawn.
 * The child inherits stdio; termination signals received by this process are
 * forwarded to it, and the promise settles only once the child has exited.
 */
import { spawn } from 'node:child_process';
import { constants } from 'node:os';

import { SealenvError, ValidationError } from '../core/errors.js';

import type { CommandExecutor } from './types.js';

const FORWARDED_SIGNALS = ['SIGINT', 'SIGTERM', 'SIGHUP'] as const;

/** Shell convention: a child killed by signal N exits with 128 + N. */
export function exitCodeForSignal(signal: NodeJS.Signals): number {
  const table: Array<[string, number]> = Object.entries(constants.signals);
  const entry = table.find(([name]) => name === signal);
  return 128 + (entry?.[1] ?? 0);
}

export function createSpawnExecutor(): CommandExecutor {
  return {
    execute(command: readonly string[], env: NodeJS.ProcessEnv): Promise<number> {
      const [file, ...args] = command;
      if (file === undefined) {
        return Promise.reject(new ValidationError('No command given to run'));
      }

      return new Promise<number>((resolvePromise, rejectPromise) => {
        const child = spawn(file, args, { env, stdio: 'inherit' });

        const forward = (signal: NodeJS.Signals): void => {
          child.kill(signal);
        };
        for (const signal of FORWARDED_SIGNALS) {
          process.on(signal, forward);
        }
        const detach = (): void => {
          for (const signal of FORWARDED_SIGNALS) {
            process.off(signal, forward);
          }
        };

        child.once('error', (error) => {
          detach();
          rejectPromise(
            new SealenvError({
              message: `Failed to run command "${file}": ${error.message}`,
              code: 'COMMAND_FAILED',
              cause: error,
              context: { command: file },
            }),
          );
        });

        child.once('exit', (code, signal) => {
          detach();
          resolvePromise(signal !== null ? exitCodeForSignal(signal) : (code ?? 1));
        });
      });
    },
  };
}
