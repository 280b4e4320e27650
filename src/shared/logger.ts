// Scoped console logging

export type LoggingLevel = 'error' | 'warn' | 'info' | 'debug';

const LEVEL_ORDER: Record<LoggingLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3
};

export const isLoggingLevel = (value: string): value is LoggingLevel => Object.hasOwn(LEVEL_ORDER, value);

let activeLevel: LoggingLevel = (() => {
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  return fromEnv && isLoggingLevel(fromEnv) ? fromEnv : 'info';
})();

export const setLogLevel = (level: LoggingLevel): void => {
  activeLevel = level;
};

export interface Logger {
  error(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  debug(message: string, ...meta: unknown[]): void;
}

const enabled = (level: LoggingLevel): boolean => LEVEL_ORDER[level] <= LEVEL_ORDER[activeLevel];

export const createLogger = (scope: string): Logger => {
  const prefix = `[${scope}]`;
  return {
    error: (message, ...meta) => {
      if (enabled('error')) console.error(prefix, message, ...meta);
    },
    warn: (message, ...meta) => {
      if (enabled('warn')) console.warn(prefix, message, ...meta);
    },
    info: (message, ...meta) => {
      if (enabled('info')) console.log(prefix, message, ...meta);
    },
    debug: (message, ...meta) => {
      if (enabled('debug')) console.log(prefix, message, ...meta);
    }
  };
};
