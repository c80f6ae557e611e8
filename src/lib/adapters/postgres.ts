import type { PoolClient, PoolConfig, QueryResult } from 'pg';
import { Pool } from 'pg';
import type {
  DatabaseConnection,
  ExecuteOptions,
  ExecuteResult,
  Row,
  StatementParams,
} from '../connection-types.js';
import { debug, describeError } from '../runtime.js';
import { assertIdentifier } from '../sql-clauses.js';
import { compileNamedParameters } from './named-parameters.js';
import { runLogged } from './statement-log.js';

type PoolLike = Pool | PoolClient;

export type PostgresExecutor = (text: string, values: unknown[]) => Promise<QueryResult<Row>>;

/**
 * PostgreSQL connection over a `pg` pool or checked-out client.
 *
 * PostgreSQL has no last-insert-id call, so inserts that name a `returning`
 * column get a `RETURNING` clause and the generated key is read from the
 * first returned row.
 */
export class PostgresConnection implements DatabaseConnection {
  readonly dialect = 'postgres' as const;
  private readonly executor: PostgresExecutor;
  private readonly release: () => Promise<void>;

  constructor(executor: PostgresExecutor, release: () => Promise<void> = async () => undefined) {
    this.executor = executor;
    this.release = release;
  }

  /**
   * Wrap a pool (ended on close) or a pool client (released on close).
   */
  static fromPool(pool: PoolLike): PostgresConnection {
    if (!('release' in pool)) {
      // Idle client failures surface on the pool
      pool.on('error', error => {
        debug.error(`PostgreSQL pool error: ${describeError(error)}`);
      });
    }
    const release = async () => {
      if ('release' in pool) {
        pool.release();
      } else {
        await pool.end();
      }
    };
    return new PostgresConnection((text, values) => pool.query<Row>(text, values), release);
  }

  static create(config: PoolConfig): PostgresConnection {
    return PostgresConnection.fromPool(new Pool(config));
  }

  async query(sql: string, params?: StatementParams): Promise<Row[]> {
    const { text, values } = compileNamedParameters(sql, params);
    const result = await runLogged(this.dialect, text, params, () => this.executor(text, values));
    return result.rows;
  }

  async execute(
    sql: string,
    params?: StatementParams,
    options: ExecuteOptions = {}
  ): Promise<ExecuteResult> {
    const { returning } = options;
    const statement =
      returning === undefined ? sql : `${sql} RETURNING ${assertIdentifier(returning, 'returning')}`;
    const { text, values } = compileNamedParameters(statement, params);
    const result = await runLogged(this.dialect, text, params, () => this.executor(text, values));

    const [first] = result.rows;
    return {
      rowCount: result.rowCount ?? 0,
      lastInsertId: returning !== undefined && first !== undefined ? (first[returning] ?? null) : null,
    };
  }

  async close(): Promise<void> {
    await this.release();
  }
}

export default PostgresConnection;
