import type { DatabaseConnection, Row } from './connection-types.js';
import { SchemaUnavailable } from './errors.js';
import { debug, describeError } from './runtime.js';
import { assertIdentifier } from './sql-clauses.js';

/**
 * Column layout of one table as discovered at runtime. Only names are kept;
 * they decide which attribute writes a record accepts.
 */
export class Schema {
  readonly table: string;
  readonly fields: readonly string[];
  readonly primaryKey: string;
  private readonly fieldSet: ReadonlySet<string>;

  constructor(table: string, fields: readonly string[], primaryKey = 'id') {
    this.table = assertIdentifier(table, 'table name', true);
    this.primaryKey = assertIdentifier(primaryKey, 'primary key');
    this.fields = Object.freeze([...fields]);
    this.fieldSet = new Set(this.fields);
  }

  /**
   * Whether a record built on this schema stores a value written under `name`.
   */
  accepts(name: string): boolean {
    return name === this.primaryKey || this.fieldSet.has(name);
  }

  hasField(name: string): boolean {
    return this.fieldSet.has(name);
  }
}

/**
 * One strategy for listing a table's columns. Probes throw (or return an
 * empty list) when the connected engine does not understand them.
 */
export interface SchemaProbe {
  readonly name: string;
  describe(connection: DatabaseConnection, table: string): Promise<string[]>;
}

const readColumn = (rows: Row[], ...keys: string[]): string[] =>
  rows.flatMap(row => {
    for (const key of keys) {
      const value = row[key];
      if (typeof value === 'string') {
        return [value];
      }
    }
    return [];
  });

export const mysqlDescribeProbe: SchemaProbe = {
  name: 'describe',
  async describe(connection, table) {
    const rows = await connection.query(`DESCRIBE ${table}`);
    return readColumn(rows, 'Field');
  },
};

export const sqlitePragmaProbe: SchemaProbe = {
  name: 'pragma',
  async describe(connection, table) {
    const rows = await connection.query(`PRAGMA table_info(${table})`);
    return readColumn(rows, 'name');
  },
};

/**
 * Standard `information_schema` lookup, used for PostgreSQL. A qualified
 * `schema.table` name restricts the lookup to that schema; an unqualified one
 * to the connection's current schema (the current database on MySQL).
 */
export const informationSchemaProbe: SchemaProbe = {
  name: 'information_schema',
  async describe(connection, table) {
    const dot = table.indexOf('.');
    const schemaName = dot === -1 ? null : table.slice(0, dot);
    const tableName = dot === -1 ? table : table.slice(dot + 1);
    const currentSchema = connection.dialect === 'mysql' ? 'DATABASE()' : 'current_schema()';
    const schemaFilter =
      schemaName === null
        ? ` AND table_schema = ${currentSchema}`
        : ' AND table_schema = :schemaName';
    const rows = await connection.query(
      'SELECT column_name FROM information_schema.columns ' +
        `WHERE table_name = :tableName${schemaFilter} ORDER BY ordinal_position`,
      schemaName === null ? { tableName } : { tableName, schemaName }
    );
    return readColumn(rows, 'column_name', 'COLUMN_NAME');
  },
};

export const DEFAULT_SCHEMA_PROBES: readonly SchemaProbe[] = Object.freeze([
  mysqlDescribeProbe,
  sqlitePragmaProbe,
  informationSchemaProbe,
]);

export interface IntrospectOptions {
  primaryKey?: string;
  probes?: readonly SchemaProbe[];
}

/**
 * Discover the ordered column list of `table`, trying each probe in turn.
 *
 * @returns Schema built from the first probe that reports any columns
 * @throws SchemaUnavailable when every probe fails
 */
export async function introspectSchema(
  connection: DatabaseConnection,
  table: string,
  options: IntrospectOptions = {}
): Promise<Schema> {
  const { primaryKey = 'id', probes = DEFAULT_SCHEMA_PROBES } = options;
  assertIdentifier(table, 'table name', true);

  const failures: unknown[] = [];
  for (const probe of probes) {
    let fields: string[];
    try {
      fields = await probe.describe(connection, table);
    } catch (error) {
      debug.db(`Schema probe '${probe.name}' failed for ${table}: ${describeError(error)}`);
      failures.push(error);
      continue;
    }

    if (fields.length === 0) {
      debug.db(`Schema probe '${probe.name}' found no columns for ${table}`);
      failures.push(new Error(`Probe '${probe.name}' returned no columns`));
      continue;
    }

    debug.db(`Schema for ${table} loaded via '${probe.name}' (${fields.length} columns)`);
    return new Schema(table, fields, primaryKey);
  }

  debug.error(`Unable to load schema for table: ${table}`);
  throw new SchemaUnavailable(table, failures);
}

export default Schema;
