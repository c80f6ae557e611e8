import type { SqlDialect, StatementParams } from '../connection-types.js';
import { debug, describeError, summarizeSql } from '../runtime.js';

const serializeParams = (params: StatementParams | undefined): string => {
  try {
    return JSON.stringify(params ?? {}, (_key, value: unknown) =>
      typeof value === 'bigint' ? value.toString() : value
    );
  } catch (error) {
    return `<unserializable: ${describeError(error)}>`;
  }
};

/**
 * Run one driver call, logging its duration or its failure. Errors are
 * re-thrown as the driver raised them.
 */
export async function runLogged<T>(
  dialect: SqlDialect,
  sql: string,
  params: StatementParams | undefined,
  run: () => T | Promise<T>
): Promise<T> {
  const start = Date.now();
  try {
    const result = await run();
    debug.db(`[${dialect}] Query executed in ${Date.now() - start}ms: ${summarizeSql(sql)}`);
    return result;
  } catch (error) {
    debug.error(`[${dialect}] Query error: ${describeError(error)}`);
    debug.error(`Query text: ${sql}`);
    debug.error(`Query params: ${serializeParams(params)}`);
    throw error;
  }
}
