/**
 * Logger utility for the study service
 *
 * Prefixes every line with time, level and module. Lines below the configured
 * level are dropped.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

function isEnabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

export function formatLogLine(level: LogLevel, module: string, message: string, timestamp: Date): string {
  const time = timestamp.toISOString().split('T')[1]?.slice(0, 12) ?? timestamp.toISOString();
  return `[${time}] [${level.toUpperCase().padEnd(5)}] [${module}] ${message}`;
}

/**
 * Creates a logger for a specific module.
 */
export function createLogger(module: string): Logger {
  const log = (level: LogLevel, message: string, data?: unknown) => {
    if (!isEnabled(level)) {
      return;
    }

    const line = formatLogLine(level, module, message, new Date());
    const args = data !== undefined ? [line, data] : [line];

    switch (level) {
      case 'debug':
      case 'info':
        console.log(...args);
        break;
      case 'warn':
        console.warn(...args);
        break;
      case 'error':
        console.error(...args);
        break;
    }
  };

  return {
    debug: (message, data) => log('debug', message, data),
    info: (message, data) => log('info', message, data),
    warn: (message, data) => log('warn', message, data),
    error: (message, data) => log('error', message, data),
  };
}
