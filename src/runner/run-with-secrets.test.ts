import { describe, expect, it, vi } from 'vitest';

import { ValidationError } from '../core/errors.js';

import { buildChildEnvironment, runWithSecrets } from './run-with-secrets.js';
import type { CommandExecutor, EnvironmentSource } from './types.js';

function createFakeExecutor(exitCode = 0): CommandExecutor & {
  calls: Array<{ command: readonly string[]; env: NodeJS.ProcessEnv }>;
} {
  const calls: Array<{ command: readonly string[]; env: NodeJS.ProcessEnv }> = [];
  return {
    calls,
    execute(command, env): Promise<number> {
      calls.push({ command, env });
      return Promise.resolve(exitCode);
    },
  };
}

function sourceOf(secrets: Record<string, string>): EnvironmentSource {
  return { resolveEnvironment: vi.fn(() => Promise.resolve(secrets)) };
}

describe('buildChildEnvironment', () => {
  it('lets secrets override parent variables', () => {
    expect(buildChildEnvironment({ PATH: '/bin', TOKEN: 'parent' }, { TOKEN: 'secret' })).toEqual({
      PATH: '/bin',
      TOKEN: 'secret',
    });
  });

  it('does not modify the parent environment', () => {
    const parent = { PATH: '/bin' };
    buildChildEnvironment(parent, { TOKEN: 'secret' });
    expect(parent).toEqual({ PATH: '/bin' });
  });
});

describe('runWithSecrets', () => {
  it('passes the command and merged environment to the executor', async () => {
    const executor = createFakeExecutor(0);

    const result = await runWithSecrets(
      { source: sourceOf({ DB_URL: 'postgres://localhost/app', TOKEN: 'abc' }), executor, baseEnv: { HOME: '/home/dev' } },
      ['npm', 'start'],
    );

    expect(result).toEqual({ exitCode: 0, injected: 2 });
    expect(executor.calls).toEqual([
      {
        command: ['npm', 'start'],
        env: { HOME: '/home/dev', DB_URL: 'postgres://localhost/app', TOKEN: 'abc' },
      },
    ]);
  });

  it("returns the child's exit code", async () => {
    const result = await runWithSecrets(
      { source: sourceOf({}), executor: createFakeExecutor(42), baseEnv: {} },
      ['false'],
    );
    expect(result).toEqual({ exitCode: 42, injected: 0 });
  });

  it('rejects an empty command without resolving secrets', async () => {
    const source = sourceOf({ A: '1' });
    const executor = createFakeExecutor();

    await expect(runWithSecrets({ source, executor }, [])).rejects.toBeInstanceOf(ValidationError);
    expect(source.resolveEnvironment).not.toHaveBeenCalled();
    expect(executor.calls).toHaveLength(0);
  });

  it('does not spawn when secrets cannot be resolved', async () => {
    const executor = createFakeExecutor();
    const source: EnvironmentSource = {
      resolveEnvironment: () => Promise.reject(new Error('key missing')),
    };

    await expect(runWithSecrets({ source, executor }, ['env'])).rejects.toThrow('key missing');
    expect(executor.calls).toHaveLength(0);
  });
});
