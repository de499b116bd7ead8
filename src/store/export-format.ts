/**
 * Renderers for `exportAll`. Both keep the store's insertion order.
 */
import { ValidationError } from '../core/errors.js';

import type { ExportFormat } from './types.js';

export const EXPORT_FORMATS = ['env', 'json'] as const satisfies readonly ExportFormat[];

/** Characters that force a value into double quotes in `.env` output. */
const NEEDS_QUOTING = /[\s="'#\\]/;

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

/** @throws ValidationError for an unknown format */
export function assertExportFormat(format: string): asserts format is ExportFormat {
  if (!isExportFormat(format)) {
    throw new ValidationError(`Unknown export format "${format}"`, {
      format,
      allowed: [...EXPORT_FORMATS],
    });
  }
}

/**
 * Quote a value the way dotenv loaders read it back: bare when safe,
 * otherwise double-quoted with backslash, quote and line breaks escaped.
 */
export function quoteEnvValue(value: string): string {
  if (!NEEDS_QUOTING.test(value)) {
    return value;
  }
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r');
  return `"${escaped}"`;
}

/** `NAME=VALUE` lines, one per secret, each newline-terminated. */
export function formatEnv(entries: ReadonlyArray<readonly [string, string]>): string {
  return entries.map(([name, value]) => `${name}=${quoteEnvValue(value)}\n`).join('');
}

/** Flat JSON object, 2-space indented, newline-terminated. */
export function formatJson(entries: ReadonlyArray<readonly [string, string]>): string {
  return `${JSON.stringify(Object.fromEntries(entries), null, 2)}\n`;
}

/** Render decrypted entries in the requested format. */
export function renderExport(format: string, entries: ReadonlyArray<readonly [string, string]>): string {
  assertExportFormat(format);
  return format === 'env' ? formatEnv(entries) : formatJson(entries);
}
