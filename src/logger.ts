import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const PAINT: Record<Exclude<LogLevel, 'silent'>, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.green,
  warn: chalk.yellow,
  error: chalk.red,
};

let activeLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

export interface Logger {
  debug(message: string, details?: Record<string, unknown>): void;
  info(message: string, details?: Record<string, unknown>): void;
  warn(message: string, details?: Record<string, unknown>): void;
  error(message: string, details?: Record<string, unknown>): void;
}

// Everything goes to stderr so stdout stays free for CLI output.
function write(level: Exclude<LogLevel, 'silent'>, scope: string, message: string, details?: Record<string, unknown>): void {
  if (SEVERITY[level] < SEVERITY[activeLevel]) {
    return;
  }
  const prefix = `${chalk.dim(new Date().toISOString())} ${PAINT[level](level.toUpperCase())} ${chalk.cyan(`[${scope}]`)}`;
  if (details && Object.keys(details).length > 0) {
    console.error(`${prefix} ${message}`, JSON.stringify(details));
  } else {
    console.error(`${prefix} ${message}`);
  }
}

export function createLogger(scope: string): Logger {
  return {
    debug: (message, details) => write('debug', scope, message, details),
    info: (message, details) => write('info', scope, message, details),
    warn: (message, details) => write('warn', scope, message, details),
    error: (message, details) => write('error', scope, message, details),
  };
}
