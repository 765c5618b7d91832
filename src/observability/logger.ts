import pino from 'pino';
import type { LogContext } from './types.js';

/** Structured logger interface for Kiln. */
export interface Logger {
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  fatal(msg: string, context?: LogContext): void;
  child(bindings: Record<string, unknown>): Logger;
}

export interface LoggerOptions {
  level?: string;
  name?: string;
  /** Write to stderr so stdout stays free for command output. */
  stderr?: boolean;
}

/** Adapt pino's `(obj, msg)` call order to the `(msg, context)` interface. */
function wrap(instance: pino.Logger): Logger {
  return {
    debug: (msg, context) => instance.debug(context ?? {}, msg),
    info: (msg, context) => instance.info(context ?? {}, msg),
    warn: (msg, context) => instance.warn(context ?? {}, msg),
    error: (msg, context) => instance.error(context ?? {}, msg),
    fatal: (msg, context) => instance.fatal(context ?? {}, msg),
    child: (bindings) => wrap(instance.child(bindings)),
  };
}

/** Create a structured pino logger instance. */
export function createLogger(options?: LoggerOptions): Logger {
  const pretty = process.env['NODE_ENV'] === 'development';
  const pinoOptions: pino.LoggerOptions = {
    name: options?.name ?? 'kiln',
    level: options?.level ?? process.env['KILN_LOG_LEVEL'] ?? process.env['LOG_LEVEL'] ?? 'info',
    transport: pretty
      ? {
          target: 'pino-pretty',
          options: { colorize: true, destination: options?.stderr ? 2 : 1 },
        }
      : undefined,
    serializers: {
      err: pino.stdSerializers.err,
    },
    redact: {
      paths: ['token', 'auth', 'authorization', 'password', '*.token', '*.auth', '*.authorization'],
      censor: '[REDACTED]',
    },
  };

  const instance =
    options?.stderr && !pretty ? pino(pinoOptions, pino.destination(2)) : pino(pinoOptions);
  return wrap(instance);
}
