import { appendFileSync, writeFileSync } from 'node:fs';

const ANSI_RED = '\u001b[31m';
const ANSI_YELLOW = '\u001b[33m';
const ANSI_DIM = '\u001b[2m';
const ANSI_RESET = '\u001b[0m';
const ANSI_PATTERN = /\u001b\[[0-9;]*m/g;

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const LEVEL_RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export interface Logger {
  error(message: string): void;
  warn(message: string): void;
  /** Per-file notices and summaries. Shown unless quiet. */
  info(message: string): void;
  debug(message: string): void;
}

export interface LoggerOptions {
  readonly level?: LogLevel;
  /** Truncated on creation, then receives every message regardless of level. */
  readonly logFile?: string;
  readonly useColors?: boolean;
}

export const silentLogger: Logger = {
  error: () => undefined,
  warn: () => undefined,
  info: () => undefined,
  debug: () => undefined,
};

export function resolveLogLevel(flags: { verbose?: boolean; quiet?: boolean }): LogLevel {
  if (flags.quiet) {
    return 'error';
  }
  return flags.verbose ? 'debug' : 'info';
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? 'info'];
  const useColors = options.useColors ?? process.stdout.isTTY ?? false;
  const logFile = options.logFile;

  if (logFile) {
    writeFileSync(logFile, '', 'utf8');
  }

  const emit = (level: Exclude<LogLevel, 'silent'>, message: string): void => {
    if (logFile) {
      appendFileSync(
        logFile,
        `${new Date().toISOString()} [${level.toUpperCase()}] ${message.replace(ANSI_PATTERN, '')}\n`,
        'utf8',
      );
    }
    if (LEVEL_RANK[level] > threshold) {
      return;
    }
    switch (level) {
      case 'error':
        console.error(useColors ? `${ANSI_RED}${message}${ANSI_RESET}` : message);
        break;
      case 'warn':
        console.warn(useColors ? `${ANSI_YELLOW}Warning: ${message}${ANSI_RESET}` : `Warning: ${message}`);
        break;
      case 'info':
        console.log(message);
        break;
      case 'debug':
        console.error(useColors ? `${ANSI_DIM}[debug] ${message}${ANSI_RESET}` : `[debug] ${message}`);
        break;
    }
  };

  return {
    error: (message) => emit('error', message),
    warn: (message) => emit('warn', message),
    info: (message) => emit('info', message),
    debug: (message) => emit('debug', message),
  };
}
