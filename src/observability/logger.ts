import pino from 'pino';
import type { LogContext, LogLevel } from './types.js';

/** Structured logger interface for sealenv. */
export interface Logger {
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  fatal(msg: string, context?: LogContext): void;
  child(bindings: Record<string, unknown>): Logger;
}

/** Fields that may carry key material or plaintext; never written out. */
const REDACTED_PATHS = [
  'key',
  'masterKey',
  'derivedKey',
  'value',
  'plaintext',
  '*.key',
  '*.masterKey',
  '*.value',
];

function wrap(instance: pino.Logger): Logger {
  return {
    debug: (msg, context) => instance.debug(context ?? {}, msg),
    info: (msg, context) => instance.info(context ?? {}, msg),
    warn: (msg, context) => instance.warn(context ?? {}, msg),
    error: (msg, context) => instance.error(context ?? {}, msg),
    fatal: (msg, context) => instance.fatal(context ?? {}, msg),
    child: (bindings) => wrap(instance.child(bindings)),
  };
}

/** Configured level first, then `LOG_LEVEL`, then `warn`. */
export function resolveLogLevel(level: LogLevel | undefined, env: NodeJS.ProcessEnv = process.env): string {
  return level ?? env['LOG_LEVEL'] ?? 'warn';
}

/**
 * Create a structured pino logger.
 * Writes to stderr: stdout belongs to command output (`get`, `export`).
 */
export function createLogger(options?: { level?: LogLevel; name?: string }): Logger {
  const pinoOptions: pino.LoggerOptions = {
    name: options?.name ?? 'sealenv',
    level: resolveLogLevel(options?.level),
    serializers: {
      err: pino.stdSerializers.err,
    },
    redact: {
      paths: REDACTED_PATHS,
      censor: '[REDACTED]',
    },
  };

  if (process.env['NODE_ENV'] === 'development') {
    return wrap(
      pino({
        ...pinoOptions,
        transport: { target: 'pino-pretty', options: { colorize: true, destination: 2 } },
      }),
    );
  }

  return wrap(pino(pinoOptions, pino.destination(2)));
}

/** Logger that discards everything; the default when no logger is injected. */
export function createSilentLogger(): Logger {
  return wrap(pino({ level: 'silent' }));
}
