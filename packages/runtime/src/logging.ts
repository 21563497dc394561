// Logging for catalog writes
//
// The Catalog logs each write once: info when it commits, warn when it is
// rejected with a CatalogError, error for anything else.

export type LogLevel = 'info' | 'warn' | 'error';

export type LogData = Record<string, unknown>;

export type CatalogLogger = Record<LogLevel, (message: string, data?: LogData) => void>;

/**
 * Writes `[catalog] message` to the console method of the same level.
 */
export const consoleLogger: CatalogLogger = {
  info(message, data) {
    console.info(`[catalog] ${message}`, data ?? '');
  },
  warn(message, data) {
    console.warn(`[catalog] ${message}`, data ?? '');
  },
  error(message, data) {
    console.error(`[catalog] ${message}`, data ?? '');
  },
};

export const silentLogger: CatalogLogger = {
  info() {},
  warn() {},
  error() {},
};

export type LogEntry = {
  level: LogLevel;
  message: string;
  data?: LogData;
  timestamp: string;
};

/**
 * Create a logger that keeps its entries for inspection
 */
export function createCapturingLogger(): CatalogLogger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];

  const log = (level: LogLevel) => (message: string, data?: LogData) => {
    entries.push({ level, message, data, timestamp: new Date().toISOString() });
  };

  return {
    entries,
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  };
}
