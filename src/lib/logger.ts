/**
 * Logging for the annotate CLI.
 *
 * Text format prints one human-readable line per message (errors and
 * warnings prefixed with "E:" / "W:"). JSON format prints one structured
 * entry per line for log aggregators.
 */
import type { LogFormat } from './types.js';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogEntry {
  level: LogLevel;
  context: string;
  message: string;
  timestamp: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  format: LogFormat;
  debug: boolean;
}

export interface Logger {
  error(context: string, error: unknown, extra?: Record<string, unknown>): void;
  warn(context: string, message: string, extra?: Record<string, unknown>): void;
  info(context: string, message: string, extra?: Record<string, unknown>): void;
  debug(context: string, message: string, extra?: Record<string, unknown>): void;
}

const TEXT_PREFIX: Record<LogLevel, string> = {
  debug: 'D: ',
  info: '',
  warn: 'W: ',
  error: 'E: ',
};

function formatLog(
  format: LogFormat,
  level: LogLevel,
  context: string,
  message: string,
  extra?: Record<string, unknown>
): string {
  if (format === 'json') {
    const entry: LogEntry = {
      level,
      context,
      message,
      timestamp: new Date().toISOString(),
      ...extra,
    };
    return JSON.stringify(entry);
  }

  const fields = Object.entries(extra ?? {}).map(([key, value]) => `${key}=${String(value)}`);
  const details = fields.length > 0 ? ` (${fields.join(', ')})` : '';
  return `${TEXT_PREFIX[level]}${message}${details}`;
}

export function createLogger(options: LoggerOptions): Logger {
  const { format } = options;
  return {
    error(context, error, extra) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(formatLog(format, 'error', context, message, extra));
    },
    warn(context, message, extra) {
      console.warn(formatLog(format, 'warn', context, message, extra));
    },
    info(context, message, extra) {
      console.log(formatLog(format, 'info', context, message, extra));
    },
    debug(context, message, extra) {
      if (options.debug) {
        console.log(formatLog(format, 'debug', context, message, extra));
      }
    },
  };
}
