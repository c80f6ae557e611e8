import type { ActiveRecordOptions } from './active-record.js';
import ActiveRecord from './active-record.js';
import { MysqlConnection } from './adapters/mysql.js';
import { PostgresConnection } from './adapters/postgres.js';
import { SqliteConnection } from './adapters/sqlite.js';
import type { ConnectionConfig } from './connection-config.js';
import type { DatabaseConnection } from './connection-types.js';
import { ConnectionError, ValidationError } from './errors.js';
import { debug, describeError } from './runtime.js';

export type ConnectionFactory = (config: ConnectionConfig) => DatabaseConnection;

const requireUrl = (config: ConnectionConfig): string => {
  if (config.url === undefined || config.url === '') {
    throw new ValidationError(`A ${config.dialect} connection needs a url`, 'url');
  }
  return config.url;
};

/**
 * Build the driver connection for a config.
 */
export const createConnection: ConnectionFactory = config => {
  switch (config.dialect) {
    case 'postgres':
      return PostgresConnection.create({ connectionString: requireUrl(config) });
    case 'mysql':
      return MysqlConnection.create(requireUrl(config));
    case 'sqlite':
      return SqliteConnection.open(config.filename ?? ':memory:');
    default: {
      const unknownDialect: never = config.dialect;
      throw new ValidationError(`Unsupported dialect: ${String(unknownDialect)}`, 'dialect');
    }
  }
};

/**
 * Connection manager for the data mapper
 *
 * Owns one database connection and opens records bound to it. Every record
 * opened here shares that connection; there is no pooling or transaction
 * handling on top of what the driver does.
 */
class DataAccessLayer {
  config: ConnectionConfig;
  private connection: DatabaseConnection | null;
  private readonly factory: ConnectionFactory;

  constructor(config: ConnectionConfig, factory: ConnectionFactory = createConnection) {
    this.config = { ...config };
    this.connection = null;
    this.factory = factory;
  }

  /**
   * Create the connection for the configured dialect and check it answers
   * @returns This instance for chaining
   */
  async connect(): Promise<this> {
    if (this.connection) {
      return this;
    }

    let connection: DatabaseConnection | null = null;
    try {
      connection = this.factory(this.config);
      await connection.query('SELECT 1');
      this.connection = connection;
      debug.db(`${this.config.dialect} connection established`);
      return this;
    } catch (error) {
      debug.error(`Failed to connect to ${this.config.dialect}: ${describeError(error)}`);
      if (connection) {
        await connection.close();
      }
      throw error;
    }
  }

  /**
   * Close the connection
   */
  async disconnect(): Promise<void> {
    if (this.connection) {
      const connection = this.connection;
      this.connection = null;
      await connection.close();
      debug.db(`${this.config.dialect} connection closed`);
    }
  }

  getConnection(): DatabaseConnection {
    if (!this.connection) {
      throw new ConnectionError('DAL not connected. Call connect() first.');
    }
    return this.connection;
  }

  /**
   * Open a record bound to `name`, introspecting the table's columns.
   * @param name - Table name
   * @param primaryKey - Primary key column (default `id`)
   * @param options - Probe chain override
   */
  async table(
    name: string,
    primaryKey = 'id',
    options: Omit<ActiveRecordOptions, 'primaryKey'> = {}
  ): Promise<ActiveRecord> {
    return ActiveRecord.open(this.getConnection(), name, { ...options, primaryKey });
  }

  isConnected(): boolean {
    return this.connection !== null;
  }
}

export { DataAccessLayer };
export default DataAccessLayer;
