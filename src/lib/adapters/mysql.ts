import {
  createPool,
  type Pool,
  type PoolOptions,
  type ResultSetHeader,
  type RowDataPacket,
} from 'mysql2/promise';
import type {
  DatabaseConnection,
  ExecuteResult,
  Row,
  StatementParams,
} from '../connection-types.js';
import { hasParams, isRow } from '../connection-types.js';
import { runLogged } from './statement-log.js';

/**
 * The part of a `mysql2/promise` pool the connection uses. Results are left
 * untyped and narrowed here, since the driver's result type depends on the
 * statement kind.
 */
export interface MysqlExecutor {
  query(sql: string, values?: StatementParams): Promise<unknown>;
  end(): Promise<void>;
}

export const poolExecutor = (pool: Pool): MysqlExecutor => ({
  async query(sql, values) {
    const [result] = await pool.query<RowDataPacket[] | ResultSetHeader>(sql, values);
    return result;
  },
  end: () => pool.end(),
});

const readHeader = (result: unknown): ExecuteResult => {
  if (!isRow(result)) {
    return { rowCount: 0, lastInsertId: null };
  }
  const { affectedRows, insertId } = result;
  return {
    rowCount: typeof affectedRows === 'number' ? affectedRows : 0,
    // MySQL reports 0 when the table has no AUTO_INCREMENT column
    lastInsertId: typeof insertId === 'number' && insertId > 0 ? insertId : null,
  };
};

/**
 * MySQL connection over a `mysql2/promise` pool with `namedPlaceholders`
 * enabled, so `:name` placeholders bind from the params object.
 */
export class MysqlConnection implements DatabaseConnection {
  readonly dialect = 'mysql' as const;
  private readonly executor: MysqlExecutor;

  constructor(executor: MysqlExecutor) {
    this.executor = executor;
  }

  /**
   * Create a pool from a `mysql://` URL or pool options.
   */
  static create(options: string | PoolOptions): MysqlConnection {
    const poolOptions: PoolOptions =
      typeof options === 'string' ? { uri: options } : { ...options };
    const pool = createPool({ ...poolOptions, namedPlaceholders: true });
    return new MysqlConnection(poolExecutor(pool));
  }

  async query(sql: string, params?: StatementParams): Promise<Row[]> {
    const result = await runLogged(this.dialect, sql, params, () =>
      this.executor.query(sql, hasParams(params) ? params : undefined)
    );
    return Array.isArray(result) ? result.filter(isRow) : [];
  }

  async execute(sql: string, params?: StatementParams): Promise<ExecuteResult> {
    const result = await runLogged(this.dialect, sql, params, () =>
      this.executor.query(sql, hasParams(params) ? params : undefined)
    );
    return readHeader(result);
  }

  async close(): Promise<void> {
    await this.executor.end();
  }
}

export default MysqlConnection;
