export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  isLevelEnabled(level: LogLevel): boolean;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Console logger with the `[service]` line prefix used across the services.
 * Lines below `level` are dropped.
 */
export function createLogger(service: string, level: LogLevel = 'info'): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const enabled = (l: LogLevel) => LOG_LEVELS.indexOf(l) >= threshold;
  const line = (message: string) => `[${service}] ${message}`;

  return {
    debug(message) {
      if (enabled('debug')) console.debug(line(message));
    },
    info(message) {
      if (enabled('info')) console.log(line(message));
    },
    warn(message) {
      if (enabled('warn')) console.warn(line(message));
    },
    error(message) {
      if (enabled('error')) console.error(line(message));
    },
    isLevelEnabled: enabled,
  };
}
