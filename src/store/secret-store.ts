/**
 * SecretStore — CRUD over the encrypted store file.
 *
 * Every call re-reads the file: the process keeps no state between
 * invocations. Mutations rewrite the whole file atomically, under the
 * advisory lock when it is enabled. The working key is derived from the
 * tier and salt recorded in the file, never from caller input.
 */
import { mkdir, readFile, stat } from 'node:fs/promises';

import {
  InitializationError,
  NotFoundError,
  StoreIOError,
  StoreNotInitializedError,
  errnoCode,
} from '../core/errors.js';
import { unwrap } from '../core/result.js';
import { decrypt, encrypt } from '../crypto/cipher.js';
import { generateMasterKey, persistMasterKey, resolveMasterKey } from '../crypto/key-manager.js';
import { deriveKey, generateSalt } from '../crypto/tier-policy.js';
import type { SecurityTier } from '../crypto/types.js';
import { writeFileAtomic } from '../infrastructure/atomic-write.js';
import { withFileLock } from '../infrastructure/file-lock.js';
import { createSilentLogger } from '../observability/logger.js';

import { assertExportFormat, renderExport } from './export-format.js';
import { assertSecretName } from './secret-name.js';
import { parseStoreFile, serializeStoreFile } from './store-file.js';
import { STORE_FORMAT_VERSION } from './types.js';
import type {
  ExportFormat,
  ListedSecret,
  SecretMetadata,
  SecretRecord,
  SecretStore,
  SecretStoreDeps,
  StoreFile,
  StoreInfo,
} from './types.js';

const COMPONENT = 'secret-store';

/**
 * Create a SecretStore bound to one store location.
 */
export function createSecretStore(deps: SecretStoreDeps): SecretStore {
  const { context } = deps;
  const logger = deps.logger ?? createSilentLogger();
  const env = deps.env ?? process.env;
  const now = deps.now ?? ((): Date => new Date());

  async function storeExists(): Promise<boolean> {
    try {
      await stat(context.storePath);
      return true;
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return false;
      }
      throw new StoreIOError('inspect', context.storePath, error instanceof Error ? error : undefined);
    }
  }

  async function readStore(): Promise<StoreFile> {
    let contents: string;
    try {
      contents = await readFile(context.storePath, 'utf-8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        throw new StoreNotInitializedError(context.storePath);
      }
      throw new StoreIOError('read', context.storePath, error instanceof Error ? error : undefined);
    }
    return unwrap(parseStoreFile(contents, context.storePath));
  }

  async function writeStore(file: StoreFile): Promise<void> {
    await writeFileAtomic(context.storePath, serializeStoreFile(file));
  }

  async function locked<T>(fn: () => Promise<T>): Promise<T> {
    if (context.lock === false) {
      return fn();
    }
    return withFileLock(context.storePath, { ...context.lock, logger }, fn);
  }

  /**
   * Resolve the master key, derive the working key for `file`, run `fn`.
   * Key buffers are zero-filled afterwards (best effort: copies held inside
   * OpenSSL or in decoded strings are out of reach).
   */
  async function withWorkingKey<T>(file: StoreFile, fn: (key: Buffer) => T): Promise<T> {
    const { key: masterKey, source } = await resolveMasterKey({
      keyFilePath: context.keyFilePath,
      envVarName: context.keyEnvVar,
      env,
    });
    logger.debug('Master key resolved', { component: COMPONENT, source, tier: file.tier.name });

    let workingKey: Buffer | undefined;
    try {
      workingKey = deriveKey(masterKey, file.salt, file.tier);
      return fn(workingKey);
    } finally {
      workingKey?.fill(0);
      masterKey.fill(0);
    }
  }

  /** Read the store, apply `fn`, write it back. Runs under the lock. */
  async function mutate(fn: (file: StoreFile) => void | Promise<void>): Promise<void> {
    await locked(async () => {
      const file = await readStore();
      await fn(file);
      await writeStore(file);
    });
  }

  function findRecord(file: StoreFile, name: string): SecretRecord {
    const record = file.secrets.get(name);
    if (record === undefined) {
      throw new NotFoundError(name);
    }
    return record;
  }

  function decryptAll(file: StoreFile, key: Buffer): Array<[string, string]> {
    return [...file.secrets.values()].map((record) => [
      record.name,
      decrypt(key, record).toString('utf8'),
    ]);
  }

  return {
    context,

    isInitialized: storeExists,

    async init(tier: SecurityTier): Promise<void> {
      try {
        await mkdir(context.directory, { recursive: true });
      } catch (error) {
        throw new StoreIOError('create directory', context.directory, error instanceof Error ? error : undefined);
      }

      await locked(async () => {
        if (await storeExists()) {
          throw new InitializationError(context.storePath);
        }

        const masterKey = generateMasterKey();
        try {
          // Key first: a store without its key would be unreadable.
          await persistMasterKey(masterKey, context.keyFilePath);
          await writeStore({
            version: STORE_FORMAT_VERSION,
            tier,
            salt: tier.name === 'standard' ? undefined : generateSalt(),
            createdAt: now().toISOString(),
            secrets: new Map(),
          });
        } finally {
          masterKey.fill(0);
        }
      });

      logger.info('Secret store initialized', {
        component: COMPONENT,
        storePath: context.storePath,
        tier: tier.name,
      });
    },

    async add(name: string, value: string): Promise<void> {
      assertSecretName(name);

      await mutate(async (file) => {
        const sealed = await withWorkingKey(file, (key) => encrypt(key, value));
        const existed = file.secrets.has(name);
        // Map.set keeps the original position of an existing name
        file.secrets.set(name, { name, ...sealed, updatedAt: now().toISOString() });
        logger.debug(existed ? 'Secret updated' : 'Secret added', { component: COMPONENT, name });
      });
    },

    async get(name: string): Promise<string> {
      const file = await readStore();
      const record = findRecord(file, name);
      return withWorkingKey(file, (key) => decrypt(key, record).toString('utf8'));
    },

    async has(name: string): Promise<boolean> {
      const file = await readStore();
      return file.secrets.has(name);
    },

    async inspect(name: string): Promise<SecretMetadata> {
      const file = await readStore();
      const record = findRecord(file, name);
      return { name: record.name, updatedAt: record.updatedAt };
    },

    async remove(name: string): Promise<void> {
      await mutate((file) => {
        findRecord(file, name);
        file.secrets.delete(name);
        logger.debug('Secret removed', { component: COMPONENT, name });
      });
    },

    async list(includeValues: boolean): Promise<ListedSecret[]> {
      const file = await readStore();
      if (!includeValues) {
        return [...file.secrets.values()].map((record) => ({
          name: record.name,
          updatedAt: record.updatedAt,
        }));
      }
      return withWorkingKey(file, (key) =>
        [...file.secrets.values()].map((record) => ({
          name: record.name,
          value: decrypt(key, record).toString('utf8'),
          updatedAt: record.updatedAt,
        })),
      );
    },

    async exportAll(format: ExportFormat): Promise<string> {
      assertExportFormat(format);
      const file = await readStore();
      const entries = await withWorkingKey(file, (key) => decryptAll(file, key));
      return renderExport(format, entries);
    },

    async resolveEnvironment(): Promise<Record<string, string>> {
      const file = await readStore();
      const entries = await withWorkingKey(file, (key) => decryptAll(file, key));
      return Object.fromEntries(entries);
    },

    async info(): Promise<StoreInfo> {
      const file = await readStore();
      return {
        version: file.version,
        tier: file.tier.name,
        iterations: file.tier.iterations,
        secretCount: file.secrets.size,
        createdAt: file.createdAt,
        storePath: context.storePath,
      };
    },
  };
}
