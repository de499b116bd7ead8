import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createStoreContext, defaultConfig } from '../config/loader.js';
import type { SealenvConfig } from '../config/schema.js';
import { SECURITY_TIERS } from '../crypto/tier-policy.js';
import { createSilentLogger } from '../observability/logger.js';
import type { CommandExecutor } from '../runner/types.js';
import { createSecretStore } from '../store/secret-store.js';
import type { SecretStore } from '../store/types.js';

import { VERSION, executeCommand } from './commands.js';
import type { CommandDeps } from './commands.js';
import { USAGE } from './output.js';

interface Harness {
  deps: CommandDeps;
  out: string[];
  err: string[];
  runs: Array<{ command: readonly string[]; env: NodeJS.ProcessEnv }>;
}

describe('executeCommand', () => {
  let directory: string;
  let config: SealenvConfig;
  let store: SecretStore;

  function harness(exitCode = 0): Harness {
    const out: string[] = [];
    const err: string[] = [];
    const runs: Harness['runs'] = [];
    const executor: CommandExecutor = {
      execute(command, env) {
        runs.push({ command, env });
        return Promise.resolve(exitCode);
      },
    };
    return {
      out,
      err,
      runs,
      deps: {
        store,
        config,
        executor,
        io: {
          color: false,
          stdout: { write: (text) => void out.push(text) },
          stderr: { write: (text) => void err.push(text) },
        },
        logger: createSilentLogger(),
        env: { PATH: '/usr/bin' },
      },
    };
  }

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'sealenv-cli-'));
    config = defaultConfig();
    store = createSecretStore({ context: createStoreContext(directory, config), env: {} });
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('prints usage for help', async () => {
    const h = harness();
    expect(await executeCommand({ type: 'help' }, h.deps)).toBe(0);
    expect(h.out).toEqual([USAGE]);
  });

  it('prints the version', async () => {
    const h = harness();
    expect(await executeCommand({ type: 'version' }, h.deps)).toBe(0);
    expect(h.out).toEqual([`sealenv ${VERSION}\n`]);
  });

  describe('init', () => {
    it('initializes with the configured tier and updates .gitignore', async () => {
      const h = harness();
      expect(await executeCommand({ type: 'init' }, h.deps)).toBe(0);

      expect(h.out).toEqual(['✓ Initialized secret store (tier: standard)\n', 'ℹ Added .secrets.key to .gitignore\n']);
      expect(h.err).toEqual([
        '! Keep .secrets.key out of version control; share it through SEALENV_MASTER_KEY in CI.\n',
      ]);
      expect(await readFile(join(directory, '.gitignore'), 'utf-8')).toContain('.secrets.key\n');
      expect((await store.info()).tier).toBe('standard');
    });

    it('prefers an explicit tier', async () => {
      const h = harness();
      await executeCommand({ type: 'init', tier: SECURITY_TIERS.enhanced }, h.deps);
      expect((await store.info()).tier).toBe('enhanced');
    });

    it('skips .gitignore when disabled', async () => {
      config = { ...config, gitignore: false };
      const h = harness();
      await executeCommand({ type: 'init' }, h.deps);
      expect(h.out).toEqual(['✓ Initialized secret store (tier: standard)\n']);
      await expect(readFile(join(directory, '.gitignore'), 'utf-8')).rejects.toMatchObject({ code: 'ENOENT' });
    });

    it('fails on an existing store', async () => {
      await store.init(SECURITY_TIERS.standard);
      const h = harness();
      expect(await executeCommand({ type: 'init' }, h.deps)).toBe(1);
      expect(h.err).toEqual([`✗ A secret store already exists at ${join(directory, '.secrets')}\n`]);
    });
  });

  describe('with an initialized store', () => {
    beforeEach(async () => {
      await store.init(SECURITY_TIERS.standard);
    });

    it('adds and gets a secret', async () => {
      const h = harness();
      expect(await executeCommand({ type: 'add', name: 'API_KEY', value: 'test-secret' }, h.deps)).toBe(0);
      expect(await executeCommand({ type: 'get', name: 'API_KEY', show: true }, h.deps)).toBe(0);
      expect(h.out).toEqual(['✓ Added secret: API_KEY\n', 'test-secret\n']);
    });

    it('reports existence without printing the value', async () => {
      await store.add('API_KEY', 'test-secret');
      const h = harness();
      expect(await executeCommand({ type: 'get', name: 'API_KEY', show: false }, h.deps)).toBe(0);
      expect(await executeCommand({ type: 'get', name: 'OTHER', show: false }, h.deps)).toBe(1);
      expect(h.out).toEqual(['ℹ Secret API_KEY exists\n']);
      expect(h.err).toEqual(['✗ Secret not found: OTHER\n']);
    });

    it('fails get for a missing secret', async () => {
      const h = harness();
      expect(await executeCommand({ type: 'get', name: 'NOPE', show: true }, h.deps)).toBe(1);
      expect(h.out).toEqual([]);
      expect(h.err).toEqual(['✗ Secret not found: NOPE\n']);
    });

    it('lists secrets with masked values', async () => {
      await store.add('A', '1');
      const h = harness();
      expect(await executeCommand({ type: 'ls', values: false }, h.deps)).toBe(0);
      expect(h.out).toEqual(['Secrets (1, tier: standard)\n  A  ***\n']);
    });

    it('lists secrets with values', async () => {
      await store.add('A', '1');
      const h = harness();
      await executeCommand({ type: 'ls', values: true }, h.deps);
      expect(h.out).toEqual(['Secrets (1, tier: standard)\n  A  1\n']);
    });

    it('removes a secret', async () => {
      await store.add('A', '1');
      const h = harness();
      expect(await executeCommand({ type: 'rm', name: 'A' }, h.deps)).toBe(0);
      expect(h.out).toEqual(['✓ Removed secret: A\n']);
      expect(await store.has('A')).toBe(false);
    });

    it('exports secrets', async () => {
      await store.add('A', '1');
      await store.add('B', 'two words');
      const h = harness();
      expect(await executeCommand({ type: 'export', format: 'env' }, h.deps)).toBe(0);
      expect(h.out).toEqual(['A=1\nB="two words"\n']);
    });

    it('runs a command with secrets injected and returns its exit code', async () => {
      await store.add('TOKEN', 'abc');
      const h = harness(7);
      expect(await executeCommand({ type: 'run', command: ['printenv', 'TOKEN'] }, h.deps)).toBe(7);
      expect(h.runs).toEqual([{ command: ['printenv', 'TOKEN'], env: { PATH: '/usr/bin', TOKEN: 'abc' } }]);
    });

    it('prints store info', async () => {
      const h = harness();
      expect(await executeCommand({ type: 'info' }, h.deps)).toBe(0);
      expect(h.out).toHaveLength(1);
      expect(h.out[0]).toContain('Security tier   standard\n');
      expect(h.out[0]).toContain('Key derivation  direct master key (no derivation)\n');
    });

    it('adds a hint for authentication failures', async () => {
      await store.add('A', '1');
      const tampered = createSecretStore({
        context: store.context,
        env: { SEALENV_MASTER_KEY: Buffer.alloc(32, 1).toString('base64') },
      });
      const h = harness();
      h.deps.store = tampered;

      expect(await executeCommand({ type: 'get', name: 'A', show: true }, h.deps)).toBe(1);
      expect(h.err).toEqual([
        '✗ Authentication failed: the secret was tampered with or the key is wrong\n',
        '  The store was modified, or the master key does not belong to this store.\n',
      ]);
    });
  });

  it('reports an uninitialized store', async () => {
    const h = harness();
    expect(await executeCommand({ type: 'ls', values: false }, h.deps)).toBe(1);
    expect(h.err).toEqual([
      `✗ No secret store found at ${join(directory, '.secrets')}. Run "sealenv init" first.\n`,
    ]);
  });

  it('reports unexpected errors', async () => {
    const h = harness();
    h.deps.executor = { execute: () => Promise.reject(new Error('boom')) };
    await store.init(SECURITY_TIERS.standard);
    expect(await executeCommand({ type: 'run', command: ['x'] }, h.deps)).toBe(1);
    expect(h.err).toEqual(['✗ boom\n']);
  });
});
