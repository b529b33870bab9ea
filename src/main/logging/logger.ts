export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function createConsoleLogger(scope: string, level: LogLevel = 'info'): Logger {
  const enabled = (candidate: LogLevel): boolean => LEVEL_WEIGHT[candidate] >= LEVEL_WEIGHT[level];

  return {
    debug(message, data) {
      if (!enabled('debug')) return;
      // eslint-disable-next-line no-console
      console.debug(`[${scope}] ${message}`, data || '');
    },
    info(message, data) {
      if (!enabled('info')) return;
      // eslint-disable-next-line no-console
      console.info(`[${scope}] ${message}`, data || '');
    },
    warn(message, data) {
      if (!enabled('warn')) return;
      // eslint-disable-next-line no-console
      console.warn(`[${scope}] ${message}`, data || '');
    },
    error(message, data) {
      // eslint-disable-next-line no-console
      console.error(`[${scope}] ${message}`, data || '');
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
