import { describe, expect, it } from 'vitest';

import { CorruptStoreError } from '../core/errors.js';
import type { Result } from '../core/result.js';

import { migrateStoreFile, parseStoreFile, serializeStoreFile } from './store-file.js';
import type { StoreFile } from './types.js';

const STORE_PATH = '/project/.secrets';
const NONCE = Buffer.alloc(12, 1).toString('base64');
const CIPHERTEXT = Buffer.alloc(20, 2).toString('base64');
const SALT = Buffer.alloc(16, 3).toString('base64');

function expectOk(result: Result<StoreFile, CorruptStoreError>): StoreFile {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

function expectCorrupt(result: Result<StoreFile, CorruptStoreError>): CorruptStoreError {
  if (result.ok) {
    throw new Error('expected a CorruptStoreError');
  }
  return result.error;
}

describe('parseStoreFile', () => {
  it('decodes a standard store', () => {
    const file = expectOk(
      parseStoreFile(
        JSON.stringify({
          version: '1.0',
          security_tier: 'standard',
          secrets: { API_KEY: { ciphertext: CIPHERTEXT, nonce: NONCE, updated_at: '2026-01-01T00:00:00.000Z' } },
        }),
        STORE_PATH,
      ),
    );

    expect(file.version).toBe('1.0');
    expect(file.tier).toEqual({ name: 'standard', iterations: 0 });
    expect(file.salt).toBeUndefined();
    const record = file.secrets.get('API_KEY');
    expect(record?.nonce.length).toBe(12);
    expect(record?.ciphertext.equals(Buffer.alloc(20, 2))).toBe(true);
    expect(record?.updatedAt).toBe('2026-01-01T00:00:00.000Z');
  });

  it('decodes the salt of a derived-tier store', () => {
    const file = expectOk(
      parseStoreFile(
        JSON.stringify({ version: '1.0', security_tier: 'max', salt: SALT, secrets: {} }),
        STORE_PATH,
      ),
    );
    expect(file.tier).toEqual({ name: 'max', iterations: 500_000 });
    expect(file.salt?.equals(Buffer.alloc(16, 3))).toBe(true);
  });

  it('treats a file without security_tier exactly like a standard one', () => {
    const secrets = { A: { ciphertext: CIPHERTEXT, nonce: NONCE } };
    const legacy = expectOk(parseStoreFile(JSON.stringify({ version: '1.0', secrets }), STORE_PATH));
    const explicit = expectOk(
      parseStoreFile(JSON.stringify({ version: '1.0', security_tier: 'standard', secrets }), STORE_PATH),
    );
    expect(legacy).toEqual(explicit);
  });

  it('keeps insertion order of secrets', () => {
    const entry = { ciphertext: CIPHERTEXT, nonce: NONCE };
    const file = expectOk(
      parseStoreFile(JSON.stringify({ version: '1.0', secrets: { Z: entry, A: entry, M: entry } }), STORE_PATH),
    );
    expect([...file.secrets.keys()]).toEqual(['Z', 'A', 'M']);
  });

  it('ignores fields it does not know', () => {
    const file = expectOk(
      parseStoreFile(JSON.stringify({ version: '1.0', created_by: 'someone', secrets: {} }), STORE_PATH),
    );
    expect(file.secrets.size).toBe(0);
  });

  it('rejects invalid JSON', () => {
    const error = expectCorrupt(parseStoreFile('{"version": "1.0", "secr', STORE_PATH));
    expect(error).toBeInstanceOf(CorruptStoreError);
    expect(error.message).toBe('Store file is not valid JSON');
    expect(error.context).toEqual({ storePath: STORE_PATH });
  });

  it('rejects a file without secrets', () => {
    const error = expectCorrupt(parseStoreFile(JSON.stringify({ version: '1.0' }), STORE_PATH));
    expect(error.message).toBe('Store file failed validation');
    expect(error.context?.['issues']).toEqual([{ path: 'secrets', message: 'Required' }]);
  });

  it('rejects an unknown tier at load time', () => {
    const error = expectCorrupt(
      parseStoreFile(JSON.stringify({ version: '1.0', security_tier: 'ultra', secrets: {} }), STORE_PATH),
    );
    expect(error.message).toBe('Store file failed validation');
  });

  it('rejects an unsupported major version', () => {
    expectCorrupt(parseStoreFile(JSON.stringify({ version: '2.0', secrets: {} }), STORE_PATH));
  });

  it('rejects a derived tier without a salt', () => {
    const error = expectCorrupt(
      parseStoreFile(JSON.stringify({ version: '1.0', security_tier: 'enhanced', secrets: {} }), STORE_PATH),
    );
    expect(error.message).toBe('Store with tier "enhanced" is missing its salt');
  });

  it('rejects a standard store that carries a salt', () => {
    const error = expectCorrupt(
      parseStoreFile(JSON.stringify({ version: '1.0', security_tier: 'standard', salt: SALT, secrets: {} }), STORE_PATH),
    );
    expect(error.message).toBe('Standard-tier store must not carry a salt');
  });

  it('rejects secret names that are not variable names', () => {
    const entry = { ciphertext: CIPHERTEXT, nonce: NONCE };
    const error = expectCorrupt(
      parseStoreFile(JSON.stringify({ version: '1.0', secrets: { OK: entry, 'BAD-NAME': entry } }), STORE_PATH),
    );
    expect(error.message).toBe('Store file contains invalid secret names');
    expect(error.context).toEqual({ storePath: STORE_PATH, names: ['BAD-NAME'] });
  });

  it('reports a __proto__ key that validation would otherwise drop', () => {
    const entry = JSON.stringify({ ciphertext: CIPHERTEXT, nonce: NONCE });
    const contents = `{"version":"1.0","secrets":{"__proto__":${entry},"A":${entry}}}`;
    const error = expectCorrupt(parseStoreFile(contents, STORE_PATH));
    expect(error.context).toEqual({ storePath: STORE_PATH, names: ['__proto__'] });
  });

  it('rejects a nonce that is not 12 bytes', () => {
    const error = expectCorrupt(
      parseStoreFile(
        JSON.stringify({
          version: '1.0',
          secrets: { A: { ciphertext: CIPHERTEXT, nonce: Buffer.alloc(8).toString('base64') } },
        }),
        STORE_PATH,
      ),
    );
    expect(error.context).toMatchObject({ name: 'A', nonceLength: 8 });
  });

  it('rejects ciphertext that is not base64', () => {
    expectCorrupt(
      parseStoreFile(
        JSON.stringify({ version: '1.0', secrets: { A: { ciphertext: 'not*base64', nonce: NONCE } } }),
        STORE_PATH,
      ),
    );
  });
});

describe('migrateStoreFile', () => {
  it('fills a missing tier with standard', () => {
    expect(migrateStoreFile({ version: '1.0', secrets: {} }).security_tier).toBe('standard');
  });

  it('keeps an explicit tier', () => {
    expect(migrateStoreFile({ version: '1.0', security_tier: 'max', salt: SALT, secrets: {} }).security_tier).toBe(
      'max',
    );
  });
});

describe('serializeStoreFile', () => {
  it('writes the documented JSON layout', () => {
    const file: StoreFile = {
      version: '1.0',
      tier: { name: 'enhanced', iterations: 100_000 },
      salt: Buffer.alloc(16, 3),
      createdAt: '2026-01-01T00:00:00.000Z',
      secrets: new Map([
        [
          'B',
          { name: 'B', ciphertext: Buffer.alloc(20, 2), nonce: Buffer.alloc(12, 1), updatedAt: '2026-01-02T00:00:00.000Z' },
        ],
        ['A', { name: 'A', ciphertext: Buffer.alloc(20, 2), nonce: Buffer.alloc(12, 1) }],
      ]),
    };

    const text = serializeStoreFile(file);
    expect(text.endsWith('}\n')).toBe(true);
    expect(JSON.parse(text)).toEqual({
      version: '1.0',
      security_tier: 'enhanced',
      salt: SALT,
      created_at: '2026-01-01T00:00:00.000Z',
      secrets: {
        B: { ciphertext: CIPHERTEXT, nonce: NONCE, updated_at: '2026-01-02T00:00:00.000Z' },
        A: { ciphertext: CIPHERTEXT, nonce: NONCE },
      },
    });
    const reparsed: { secrets: Record<string, unknown> } = JSON.parse(text);
    expect(Object.keys(reparsed.secrets)).toEqual(['B', 'A']);
  });

  it('omits salt for a standard store', () => {
    const text = serializeStoreFile({
      version: '1.0',
      tier: { name: 'standard', iterations: 0 },
      secrets: new Map(),
    });
    expect(text).toBe('{\n  "version": "1.0",\n  "security_tier": "standard",\n  "secrets": {}\n}\n');
  });

  it('reads back what it writes', () => {
    const text = serializeStoreFile({
      version: '1.0',
      tier: { name: 'max', iterations: 500_000 },
      salt: Buffer.alloc(16, 3),
      secrets: new Map([['K', { name: 'K', ciphertext: Buffer.alloc(17, 5), nonce: Buffer.alloc(12, 6) }]]),
    });
    const file = expectOk(parseStoreFile(text, STORE_PATH));
    expect(file.tier.name).toBe('max');
    expect(file.secrets.get('K')?.ciphertext.equals(Buffer.alloc(17, 5))).toBe(true);
  });
});
