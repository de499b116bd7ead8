/**
 * Argument parsing for the sealenv command line.
 * Hand-rolled: the surface is small and every command takes at most two positionals.
 */
import { ValidationError } from '../core/errors.js';
import { parseSecurityTier } from '../crypto/tier-policy.js';
import type { SecurityTier } from '../crypto/types.js';
import { assertExportFormat } from '../store/export-format.js';
import type { ExportFormat } from '../store/types.js';

// ─── Types ──────────────────────────────────────────────────────

export type CliCommand =
  | { type: 'init'; tier?: SecurityTier }
  | { type: 'add'; name: string; value: string }
  | { type: 'get'; name: string; show: boolean }
  | { type: 'ls'; values: boolean }
  | { type: 'rm'; name: string }
  | { type: 'export'; format: ExportFormat }
  | { type: 'run'; command: string[] }
  | { type: 'info' }
  | { type: 'help' }
  | { type: 'version' };

export interface CliArgs {
  directory: string;
  configPath?: string;
  command: CliCommand;
}

const VALUE_OPTIONS: Record<string, string> = {
  '-d': 'directory',
  '--directory': 'directory',
  '-c': 'config',
  '--config': 'config',
  '--tier': 'tier',
  '-t': 'tier',
  '-f': 'format',
  '--format': 'format',
};

const FLAG_OPTIONS: Record<string, string> = {
  '--values': 'values',
  '--show': 'show',
  '--no-show': 'no-show',
  '-h': 'help',
  '--help': 'help',
  '-V': 'version',
  '--version': 'version',
};

// ─── Parsing ────────────────────────────────────────────────────

interface RawArgs {
  positionals: string[];
  options: Map<string, string>;
  flags: Set<string>;
  rest?: string[];
}

function tokenize(argv: readonly string[]): RawArgs {
  const raw: RawArgs = { positionals: [], options: new Map(), flags: new Set() };

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    if (token === undefined) break;

    if (token === '--') {
      if (raw.positionals[0] === 'run') {
        raw.rest = argv.slice(i + 1);
      } else {
        // `sealenv add NAME -- -value-with-leading-dash`
        raw.positionals.push(...argv.slice(i + 1));
      }
      break;
    }

    // After `run`, the first bare word starts the child command
    if (raw.positionals[0] === 'run' && !token.startsWith('-')) {
      raw.rest = argv.slice(i);
      break;
    }

    const eq = token.startsWith('--') ? token.indexOf('=') : -1;
    const option = eq === -1 ? token : token.slice(0, eq);
    const inlineValue = eq === -1 ? undefined : token.slice(eq + 1);

    const valueName = VALUE_OPTIONS[option];
    if (valueName !== undefined) {
      const value = inlineValue ?? argv[i + 1];
      if (value === undefined || (inlineValue === undefined && value.startsWith('-'))) {
        throw new ValidationError(`Option ${option} requires a value`, { option });
      }
      raw.options.set(valueName, value);
      if (inlineValue === undefined) i++;
      continue;
    }

    const flagName = FLAG_OPTIONS[token];
    if (flagName !== undefined) {
      raw.flags.add(flagName);
      continue;
    }

    if (token.startsWith('-') && token !== '-') {
      throw new ValidationError(`Unknown option ${token}`, { option: token });
    }

    raw.positionals.push(token);
  }

  return raw;
}

function requirePositional(raw: RawArgs, index: number, label: string, usage: string): string {
  const value = raw.positionals[index];
  if (value === undefined) {
    throw new ValidationError(`Missing ${label}. Usage: sealenv ${usage}`, { usage });
  }
  return value;
}

function rejectExtra(raw: RawArgs, expected: number, usage: string): void {
  if (raw.positionals.length > expected) {
    throw new ValidationError(
      `Unexpected argument "${raw.positionals[expected] ?? ''}". Usage: sealenv ${usage}`,
      { usage },
    );
  }
}

function buildCommand(raw: RawArgs): CliCommand {
  if (raw.flags.has('version')) return { type: 'version' };
  if (raw.flags.has('help')) return { type: 'help' };

  const name = raw.positionals[0];
  switch (name) {
    case undefined:
    case 'help':
      return { type: 'help' };

    case 'version':
      return { type: 'version' };

    case 'init': {
      rejectExtra(raw, 1, 'init [--tier standard|enhanced|max]');
      const tier = raw.options.get('tier');
      return tier === undefined ? { type: 'init' } : { type: 'init', tier: parseSecurityTier(tier) };
    }

    case 'add': {
      const usage = 'add NAME VALUE';
      rejectExtra(raw, 3, usage);
      return {
        type: 'add',
        name: requirePositional(raw, 1, 'secret name', usage),
        value: requirePositional(raw, 2, 'secret value', usage),
      };
    }

    case 'get': {
      const usage = 'get NAME [--no-show]';
      rejectExtra(raw, 2, usage);
      return {
        type: 'get',
        name: requirePositional(raw, 1, 'secret name', usage),
        show: !raw.flags.has('no-show'),
      };
    }

    case 'ls':
    case 'list':
      rejectExtra(raw, 1, 'ls [--values]');
      return { type: 'ls', values: raw.flags.has('values') };

    case 'rm':
    case 'remove': {
      const usage = 'rm NAME';
      rejectExtra(raw, 2, usage);
      return { type: 'rm', name: requirePositional(raw, 1, 'secret name', usage) };
    }

    case 'export': {
      rejectExtra(raw, 1, 'export [--format env|json]');
      const format = raw.options.get('format') ?? 'env';
      assertExportFormat(format);
      return { type: 'export', format };
    }

    case 'run': {
      const command = raw.rest ?? [];
      if (command.length === 0) {
        throw new ValidationError('Missing command. Usage: sealenv run [--] COMMAND [ARGS...]');
      }
      return { type: 'run', command };
    }

    case 'info':
      rejectExtra(raw, 1, 'info');
      return { type: 'info' };

    default:
      throw new ValidationError(`Unknown command "${name}". Run "sealenv help" for usage.`, {
        command: name,
      });
  }
}

/**
 * Parse process arguments (without the node and script entries).
 * @throws ValidationError for usage errors, ConfigError for an unknown tier
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const raw = tokenize(argv);
  return {
    directory: raw.options.get('directory') ?? '.',
    configPath: raw.options.get('config'),
    command: buildCommand(raw),
  };
}
