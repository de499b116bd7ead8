/**
 * Plain-text rendering for the command line.
 * Status lines and tables only; values printed by `get` and `export` bypass this.
 */
import type { ListedSecret, StoreInfo } from '../store/types.js';

// ─── ANSI Colors ────────────────────────────────────────────────

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const CYAN = '\x1b[36m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const RED = '\x1b[31m';

export interface TextSink {
  write(text: string): void;
}

export interface CliIO {
  stdout: TextSink;
  stderr: TextSink;
  /** Emit ANSI escapes. */
  color: boolean;
}

const MASK = '***';

export function paint(io: Pick<CliIO, 'color'>, style: string, text: string): string {
  return io.color ? `${style}${text}${RESET}` : text;
}

export function printSuccess(io: CliIO, message: string): void {
  io.stdout.write(`${paint(io, GREEN, '✓')} ${message}\n`);
}

export function printInfo(io: CliIO, message: string): void {
  io.stdout.write(`${paint(io, CYAN, 'ℹ')} ${message}\n`);
}

export function printWarning(io: CliIO, message: string): void {
  io.stderr.write(`${paint(io, YELLOW, '!')} ${message}\n`);
}

export function printError(io: CliIO, message: string): void {
  io.stderr.write(`${paint(io, RED, '✗')} ${message}\n`);
}

/** Two-column table of names and (masked) values. */
export function formatSecretsTable(
  io: Pick<CliIO, 'color'>,
  secrets: readonly ListedSecret[],
  tier: string,
): string {
  if (secrets.length === 0) {
    return 'No secrets stored.\n';
  }

  const width = Math.max(...secrets.map((secret) => secret.name.length));
  const header = `${paint(io, BOLD, 'Secrets')} ${paint(io, DIM, `(${secrets.length.toString()}, tier: ${tier})`)}\n`;
  const rows = secrets.map(
    (secret) => `  ${paint(io, CYAN, secret.name.padEnd(width))}  ${secret.value ?? MASK}\n`,
  );
  return header + rows.join('');
}

/** Human description of how a tier derives its key. */
export function describeDerivation(info: Pick<StoreInfo, 'tier' | 'iterations'>): string {
  if (info.iterations === 0) {
    return 'direct master key (no derivation)';
  }
  return `PBKDF2-HMAC-SHA256, ${info.iterations.toLocaleString('en-US')} iterations`;
}

export function formatInfo(io: Pick<CliIO, 'color'>, info: StoreInfo): string {
  const rows: Array<[string, string]> = [
    ['Store', info.storePath],
    ['Version', info.version],
    ['Security tier', info.tier],
    ['Key derivation', describeDerivation(info)],
    ['Secrets', info.secretCount.toString()],
  ];
  if (info.createdAt !== undefined) {
    rows.push(['Created', info.createdAt]);
  }
  const width = Math.max(...rows.map(([label]) => label.length));
  return rows.map(([label, value]) => `${paint(io, BOLD, label.padEnd(width))}  ${value}\n`).join('');
}

export const USAGE = `Usage: sealenv [--directory DIR] [--config FILE] <command>

Commands:
  init [--tier standard|enhanced|max]   Create the master key and an empty store
  add NAME VALUE                        Add or update a secret
  get NAME [--no-show]                  Print a secret value
  ls [--values]                         List secret names (and values)
  rm NAME                               Remove a secret
  export [--format env|json]            Print every secret
  run [--] COMMAND [ARGS...]            Run a command with secrets in its environment
  info                                  Show store tier and secret count
  help                                  Show this help
  version                               Show the version
`;
