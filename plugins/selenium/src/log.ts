/**
 * Leveled stderr logging.
 *
 * stdout belongs to the JSON-RPC stream, so every line goes to stderr with a
 * `[scope]` prefix, formatted the same way console.error formats its
 * arguments.
 */

import { writeSync } from 'fs';
import { format } from 'util';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  /** Same sink and level, different prefix. */
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level: LogLevel;
  scope?: string;
  /** Write each line synchronously to fd 2 instead of through process.stderr. */
  unbuffered?: boolean;
  /** Overrides the stderr sink (tests). */
  write?: (line: string) => void;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function stderrSink(unbuffered: boolean): (line: string) => void {
  if (unbuffered) {
    return (line) => {
      writeSync(2, line);
    };
  }
  return (line) => {
    process.stderr.write(line);
  };
}

export function createLogger(options: LoggerOptions): Logger {
  const write = options.write ?? stderrSink(options.unbuffered ?? false);
  const threshold = SEVERITY[options.level];

  const build = (scope: string): Logger => {
    const emit =
      (level: Exclude<LogLevel, 'silent'>) =>
      (message: string, ...details: unknown[]): void => {
        if (SEVERITY[level] < threshold) return;
        const tag = level === 'info' ? `[${scope}]` : `[${scope}] ${level}:`;
        write(`${tag} ${format(message, ...details)}\n`);
      };

    return {
      debug: emit('debug'),
      info: emit('info'),
      warn: emit('warn'),
      error: emit('error'),
      child: (childScope) => build(`${scope}:${childScope}`),
    };
  };

  return build(options.scope ?? 'selenium');
}

/** A logger that drops everything. */
export const silentLogger: Logger = createLogger({ level: 'silent', write: () => {} });
