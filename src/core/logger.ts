/**
 * Scoped console logging.
 *
 * Everything goes to stderr so that commands printing JSON keep stdout clean.
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const satisfies readonly LogLevel[];

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LABELS: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: chalk.gray('DEBUG'),
  info: chalk.cyan('INFO '),
  warn: chalk.yellow('WARN '),
  error: chalk.red('ERROR'),
};

let currentLevel: LogLevel = 'warn';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

/**
 * Create a logger whose lines are prefixed with `scope`.
 */
export function createLogger(scope: string): Logger {
  const write = (level: Exclude<LogLevel, 'silent'>, message: string) => {
    if (SEVERITY[level] < SEVERITY[currentLevel]) return;
    console.error(`${LABELS[level]} ${chalk.gray(`[${scope}]`)} ${message}`);
  };

  return {
    debug: (message) => write('debug', message),
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
  };
}
