import { appendFileSync, mkdirSync } from 'node:fs';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'success' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  header(title: string): void;
  section(title: string): void;
}

export type LoggerOptions = {
  debugMode?: boolean;
  /** Appended to in debug mode only. */
  logFile?: string;
};

const PREFIX: Record<LogLevel, string> = {
  debug: '[debug]',
  info: '',
  success: '✓',
  warn: '⚠',
  error: '✗',
};

/**
 * Console-backed logger. Built once by the CLI and handed to each component.
 */
export function createLogger(opts: LoggerOptions = {}): Logger {
  const debugMode = opts.debugMode ?? false;
  const logFile = debugMode ? opts.logFile : undefined;

  if (logFile) mkdirSync(path.dirname(logFile), { recursive: true });

  const toFile = (level: LogLevel, message: string) => {
    if (!logFile) return;
    appendFileSync(logFile, `${new Date().toISOString()} ${level.toUpperCase()} ${message}\n`);
  };

  const emit = (level: LogLevel, message: string) => {
    toFile(level, message);
    if (level === 'debug' && !debugMode) return;
    const line = PREFIX[level] ? `${PREFIX[level]} ${message}` : message;
    if (level === 'warn' || level === 'error') console.error(line);
    else console.log(line);
  };

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    success: (message) => emit('success', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
    header: (title) => {
      console.log(`\n${'='.repeat(60)}\n  ${title}\n${'='.repeat(60)}\n`);
      toFile('info', title);
    },
    section: (title) => {
      console.log(`\n${title}\n${'-'.repeat(title.length)}`);
      toFile('info', title);
    },
  };
}

const noop = () => {};

export const noopLogger: Logger = {
  debug: noop,
  info: noop,
  success: noop,
  warn: noop,
  error: noop,
  header: noop,
  section: noop,
};
