/*
  Small stderr logger. stdout carries command results (often JSON meant for
  piping), so diagnostics never go there.
*/
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let threshold: LogLevel = parseLogLevel(process.env.AWTIME_LOG_LEVEL) ?? 'info';

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVELS, value);
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const lower = value.toLowerCase();
  return isLogLevel(lower) ? lower : undefined;
}

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function write(level: LogLevel, tag: string, args: unknown[]) {
  if (LEVELS[level] < LEVELS[threshold]) return;
  console.error(tag, ...args);
}

export const logger = {
  debug: (...args: unknown[]) => write('debug', chalk.gray('[debug]'), args),
  info: (...args: unknown[]) => write('info', chalk.cyan('[info]'), args),
  warn: (...args: unknown[]) => write('warn', chalk.yellow('[warn]'), args),
  error: (...args: unknown[]) => write('error', chalk.red('[error]'), args),
};
