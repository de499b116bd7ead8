/**
 * Configuration loader — reads the JSON config file, resolves environment
 * variable placeholders, validates with Zod, and builds the store context.
 */
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import { ConfigError, errnoCode } from '../core/errors.js';
import type { Result } from '../core/result.js';
import { err, isErr, ok } from '../core/result.js';
import type { StoreContext } from '../store/types.js';

import { sealenvConfigSchema } from './schema.js';
import type { SealenvConfig } from './schema.js';

/** Looked up in the store directory when no explicit path is given. */
export const CONFIG_FILE_NAME = 'sealenv.config.json';

// ─── Environment Variable Resolution ────────────────────────────

const ENV_VAR_PATTERN = /^\$\{([A-Z_][A-Z0-9_]*)\}$/;

/**
 * Recursively resolves environment variable placeholders in an object.
 * Replaces strings matching the pattern `${VAR_NAME}` with the value
 * of the corresponding environment variable.
 *
 * @throws ConfigError if a referenced environment variable is not defined
 */
export function resolveEnvVars(obj: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof obj === 'string') {
    const match = ENV_VAR_PATTERN.exec(obj);
    const varName = match?.[1];
    if (varName !== undefined) {
      const value = env[varName];
      if (value === undefined) {
        throw new ConfigError(`Environment variable "${varName}" is not defined`, {
          variableName: varName,
          pattern: obj,
        });
      }
      return value;
    }
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => resolveEnvVars(item, env));
  }

  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveEnvVars(value, env);
    }
    return result;
  }

  // Numbers, booleans, null — return as-is
  return obj;
}

// ─── Configuration Loader ───────────────────────────────────────

/**
 * Loads and validates a configuration file.
 *
 * 1. Reads the JSON file from disk
 * 2. Parses the JSON content
 * 3. Resolves environment variable placeholders
 * 4. Validates against the Zod schema (filling defaults)
 */
export async function loadConfig(
  filePath: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<Result<SealenvConfig, ConfigError>> {
  // 1. Read the file
  let fileContent: string;
  try {
    fileContent = await readFile(filePath, 'utf-8');
  } catch (error) {
    const code = errnoCode(error);
    if (code === 'ENOENT') {
      return err(
        new ConfigError(`Configuration file not found: ${filePath}`, {
          filePath,
          errorCode: 'ENOENT',
        }),
      );
    }
    return err(
      new ConfigError(`Failed to read configuration file: ${filePath}`, {
        filePath,
        errorCode: code,
        errorMessage: error instanceof Error ? error.message : String(error),
      }),
    );
  }

  // 2. Parse JSON
  let parsed: unknown;
  try {
    parsed = JSON.parse(fileContent);
  } catch {
    return err(
      new ConfigError('Invalid JSON in configuration file', {
        filePath,
      }),
    );
  }

  // 3. Resolve environment variables
  let resolved: unknown;
  try {
    resolved = resolveEnvVars(parsed, env);
  } catch (error) {
    if (error instanceof ConfigError) {
      return err(error);
    }
    return err(
      new ConfigError('Failed to resolve environment variables', {
        filePath,
        errorMessage: error instanceof Error ? error.message : String(error),
      }),
    );
  }

  // 4. Validate with Zod
  const validation = sealenvConfigSchema.safeParse(resolved);
  if (!validation.success) {
    const issues = validation.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    return err(
      new ConfigError('Configuration validation failed', {
        filePath,
        issues,
      }),
    );
  }

  return ok(validation.data);
}

/** The configuration used when no file is present. */
export function defaultConfig(): SealenvConfig {
  return sealenvConfigSchema.parse({});
}

/**
 * Resolve the configuration for a store directory.
 * An explicit `configPath` must exist; the implicit `sealenv.config.json`
 * falls back to defaults when absent.
 */
export async function resolveConfig(options: {
  directory: string;
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}): Promise<Result<SealenvConfig, ConfigError>> {
  if (options.configPath !== undefined) {
    return loadConfig(resolve(options.directory, options.configPath), options.env);
  }

  const result = await loadConfig(resolve(options.directory, CONFIG_FILE_NAME), options.env);
  if (isErr(result) && result.error.context?.['errorCode'] === 'ENOENT') {
    return ok(defaultConfig());
  }
  return result;
}

/** Build the explicit store location every SecretStore is constructed with. */
export function createStoreContext(directory: string, config: SealenvConfig): StoreContext {
  const root = resolve(directory);
  return {
    directory: root,
    storePath: resolve(root, config.storeFile),
    keyFilePath: resolve(root, config.keyFile),
    keyEnvVar: config.keyEnvVar,
    lock: config.lock.enabled
      ? {
          timeoutMs: config.lock.timeoutMs,
          staleMs: config.lock.staleMs,
          retryIntervalMs: config.lock.retryIntervalMs,
        }
      : false,
  };
}
