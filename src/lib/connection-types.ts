export type SqlDialect = 'postgres' | 'mysql' | 'sqlite';

/**
 * One fetched row, keyed by result column name.
 */
export interface Row {
  [column: string]: unknown;
}

/**
 * Named statement parameters. Keys are placeholder names without the leading
 * colon, so `:email` in the SQL is bound from `params.email`.
 */
export type StatementParams = Record<string, unknown>;

export interface Statement {
  sql: string;
  params: StatementParams;
}

export interface ExecuteOptions {
  /**
   * Column holding the generated key. Drivers without a last-insert-id
   * facility read it back from the statement instead.
   */
  returning?: string;
}

export interface ExecuteResult {
  rowCount: number;
  lastInsertId: unknown;
}

/**
 * Live database handle shared by every record opened on it. Implementations
 * run one statement per call and never retry.
 */
export interface DatabaseConnection {
  readonly dialect: SqlDialect;
  query(sql: string, params?: StatementParams): Promise<Row[]>;
  execute(sql: string, params?: StatementParams, options?: ExecuteOptions): Promise<ExecuteResult>;
  close(): Promise<void>;
}

export const isRow = (value: unknown): value is Row =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const hasParams = (params: StatementParams | undefined): params is StatementParams =>
  params !== undefined && Object.keys(params).length > 0;
