/**
 * Keeps the master key file out of version control by adding it to the
 * store directory's `.gitignore`.
 */
import { appendFile, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { StoreIOError, errnoCode } from '../core/errors.js';

const GITIGNORE_COMMENT = '# sealenv master key (never commit)';

export type GitignoreUpdate = 'created' | 'appended' | 'present';

function hasEntry(contents: string, entry: string): boolean {
  return contents
    .split(/\r?\n/)
    .map((line) => line.trim())
    .some((line) => line === entry || line === `/${entry}`);
}

/**
 * Ensure `entry` is listed in `<directory>/.gitignore`, creating the file if needed.
 */
export async function ensureGitignoreEntry(directory: string, entry: string): Promise<GitignoreUpdate> {
  const gitignorePath = join(directory, '.gitignore');

  let contents: string | undefined;
  try {
    contents = await readFile(gitignorePath, 'utf-8');
  } catch (error) {
    if (errnoCode(error) !== 'ENOENT') {
      throw new StoreIOError('read', gitignorePath, error instanceof Error ? error : undefined);
    }
  }

  try {
    if (contents === undefined) {
      await writeFile(gitignorePath, `${GITIGNORE_COMMENT}\n${entry}\n`, 'utf-8');
      return 'created';
    }
    if (hasEntry(contents, entry)) {
      return 'present';
    }
    const separator = contents.length === 0 || contents.endsWith('\n') ? '' : '\n';
    await appendFile(gitignorePath, `${separator}\n${GITIGNORE_COMMENT}\n${entry}\n`, 'utf-8');
    return 'appended';
  } catch (error) {
    throw new StoreIOError('update', gitignorePath, error instanceof Error ? error : undefined);
  }
}
