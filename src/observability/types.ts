// ─── Logging ────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LogContext {
  component: string;
  storePath?: string;
  [key: string]: unknown;
}
