import { format } from 'util';

export type LogLevel = 'debug' | 'info' | 'warning' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warning: 2,
  error: 3,
};

const PREFIX = '[md-table-docx]';

let minimumLevel: LogLevel = 'info';

/**
 * Everything is logged to stderr so stdout only carries the
 * conversion result.
 */
export function logToStderr(level: LogLevel, message: string, ...args: unknown[]): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel]) return;
  const text = args.length > 0 ? format(message, ...args) : message;
  process.stderr.write(`${PREFIX} ${level.toUpperCase()}: ${text}\n`);
}

export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

export const logger = {
  debug: (message: string, ...args: unknown[]) => logToStderr('debug', message, ...args),
  info: (message: string, ...args: unknown[]) => logToStderr('info', message, ...args),
  warning: (message: string, ...args: unknown[]) => logToStderr('warning', message, ...args),
  error: (message: string, ...args: unknown[]) => logToStderr('error', message, ...args),
};
