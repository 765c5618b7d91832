// ─── Logging ────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogContext {
  component: string;
  step?: string;
  [key: string]: unknown;
}
