export interface DalDebugLogger {
  db: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

const silentLogger: DalDebugLogger = {
  db: () => undefined,
  error: () => undefined,
};

let debugLogger: DalDebugLogger = silentLogger;

export const debug = {
  db: (...args: unknown[]) => {
    debugLogger.db(...args);
  },
  error: (...args: unknown[]) => {
    debugLogger.error(...args);
  },
};

export const setDebugLogger = (logger: DalDebugLogger): void => {
  debugLogger = logger;
};

/**
 * Restore the default no-op logger.
 */
export const resetDebugLogger = (): void => {
  debugLogger = silentLogger;
};

/**
 * Shorten a statement for a single log line.
 */
export const summarizeSql = (sql: string, max = 100): string =>
  sql.length > max ? `${sql.substring(0, max)}...` : sql;

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
