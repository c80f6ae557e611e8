import ActiveRecord from './lib/active-record.js';
import { MysqlConnection } from './lib/adapters/mysql.js';
import { PostgresConnection } from './lib/adapters/postgres.js';
import { SqliteConnection } from './lib/adapters/sqlite.js';
import type { ConnectionConfig } from './lib/connection-config.js';
import {
  parseDatabaseUrl,
  resolveConnectionConfig,
  resolveConnectionConfigFromStore,
} from './lib/connection-config.js';
import DataAccessLayer, { createConnection } from './lib/data-access-layer.js';
import Errors from './lib/errors.js';
import JoinQuery from './lib/join-query.js';
import QueryBuilder from './lib/query-builder.js';
import { createResourceHandler } from './lib/resource-handler.js';
import { resetDebugLogger, setDebugLogger } from './lib/runtime.js';
import Schema, {
  DEFAULT_SCHEMA_PROBES,
  informationSchemaProbe,
  introspectSchema,
  mysqlDescribeProbe,
  sqlitePragmaProbe,
} from './lib/schema.js';

/**
 * Schema-reflecting active-record data mapper.
 *
 * Records discover their table's columns when opened and render
 * parameterized SQL for PostgreSQL, MySQL and SQLite connections.
 */

type CreateDataAccessLayer = ((config?: ConnectionConfig) => DataAccessLayer) & {
  DataAccessLayer: typeof DataAccessLayer;
  ActiveRecord: typeof ActiveRecord;
  QueryBuilder: typeof QueryBuilder;
  Schema: typeof Schema;
  Errors: typeof Errors;
};

/**
 * Create a Data Access Layer instance.
 *
 * @param config Connection settings; resolved from the environment when omitted.
 * @returns A DAL instance; call `connect()` before opening tables.
 */
const createDataAccessLayer = ((config?: ConnectionConfig) =>
  new DataAccessLayer(config ?? resolveConnectionConfig())) as CreateDataAccessLayer;

createDataAccessLayer.DataAccessLayer = DataAccessLayer;
createDataAccessLayer.ActiveRecord = ActiveRecord;
createDataAccessLayer.QueryBuilder = QueryBuilder;
createDataAccessLayer.Schema = Schema;
createDataAccessLayer.Errors = Errors;

export {
  ActiveRecord,
  DataAccessLayer,
  JoinQuery,
  QueryBuilder,
  Schema,
  Errors,
  MysqlConnection,
  PostgresConnection,
  SqliteConnection,
  DEFAULT_SCHEMA_PROBES,
  informationSchemaProbe,
  mysqlDescribeProbe,
  sqlitePragmaProbe,
  introspectSchema,
  createConnection,
  createResourceHandler,
  parseDatabaseUrl,
  resolveConnectionConfig,
  resolveConnectionConfigFromStore,
  setDebugLogger,
  resetDebugLogger,
  createDataAccessLayer,
};

export {
  DALError,
  DocumentNotFound,
  EmptyCondition,
  InvalidClauseError,
  MissingPrimaryKey,
  SchemaUnavailable,
  ValidationError,
  ConnectionError,
  QueryError,
} from './lib/errors.js';

export type { ActiveRecordOptions, PersistenceState } from './lib/active-record.js';
export type { ConnectionConfig };
export type {
  DatabaseConnection,
  ExecuteOptions,
  ExecuteResult,
  Row,
  SqlDialect,
  Statement,
  StatementParams,
} from './lib/connection-types.js';
export type { Conditions, JoinDescriptor, SelectOptions } from './lib/query-builder.js';
export type { JoinType } from './lib/sql-clauses.js';
export type { IntrospectOptions, SchemaProbe } from './lib/schema.js';
export type { ConfigStore, CurrentRequest } from './lib/request.js';
export type { ResourceHandler, ResourceResult } from './lib/resource-handler.js';
export type { DalDebugLogger } from './lib/runtime.js';

export default createDataAccessLayer;
