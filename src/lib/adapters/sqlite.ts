import Database from 'better-sqlite3';
import type {
  DatabaseConnection,
  ExecuteResult,
  Row,
  StatementParams,
} from '../connection-types.js';
import { hasParams, isRow } from '../connection-types.js';
import { runLogged } from './statement-log.js';

/**
 * SQLite connection over a `better-sqlite3` database. The driver binds
 * `:name` placeholders natively from an object of unprefixed keys.
 */
export class SqliteConnection implements DatabaseConnection {
  readonly dialect = 'sqlite' as const;
  readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /**
   * Open a database file, or an in-memory database for `:memory:`.
   */
  static open(filename = ':memory:', options: Database.Options = {}): SqliteConnection {
    return new SqliteConnection(new Database(filename, options));
  }

  async query(sql: string, params?: StatementParams): Promise<Row[]> {
    return runLogged(this.dialect, sql, params, () => {
      const statement = this.db.prepare(sql);
      const rows = hasParams(params) ? statement.all(params) : statement.all();
      return rows.filter(isRow);
    });
  }

  async execute(sql: string, params?: StatementParams): Promise<ExecuteResult> {
    return runLogged(this.dialect, sql, params, () => {
      const statement = this.db.prepare(sql);
      const info = hasParams(params) ? statement.run(params) : statement.run();
      return { rowCount: info.changes, lastInsertId: info.lastInsertRowid };
    });
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }
}

export default SqliteConnection;
