import type { DatabaseConnection, Row } from './connection-types.js';
import FieldStore from './field-store.js';
import JoinQuery from './join-query.js';
import type { Conditions } from './query-builder.js';
import QueryBuilder, { WILDCARD } from './query-builder.js';
import type { IntrospectOptions } from './schema.js';
import Schema, { introspectSchema } from './schema.js';

/**
 * `new`: never stored. `persisted`: hydrated from a row or inserted.
 */
export type PersistenceState = 'new' | 'persisted';

export type ActiveRecordOptions = IntrospectOptions;

/**
 * One row of one table, with the table's column list discovered at runtime.
 *
 * Field access goes through `get`/`set`; `set` only stores names the schema
 * knows (plus the primary key) and ignores the rest. `save` inserts while the
 * record is new and updates once it is persisted. `findById` loads into the
 * record itself; `findBy` and `findAll` return fresh records sharing this
 * record's schema and connection.
 */
export class ActiveRecord {
  readonly connection: DatabaseConnection;
  readonly schema: Schema;
  readonly builder: QueryBuilder;
  private readonly store: FieldStore;
  private state: PersistenceState;

  constructor(connection: DatabaseConnection, schema: Schema) {
    this.connection = connection;
    this.schema = schema;
    this.builder = new QueryBuilder(schema, connection.dialect);
    this.store = new FieldStore(schema);
    this.state = 'new';
  }

  /**
   * Introspect `table` on `connection` and return an empty record bound to it.
   *
   * @param connection Live database connection
   * @param table Table name, optionally schema-qualified
   * @param options Primary key name (default `id`) and probe chain
   * @returns New, unfilled record
   * @throws SchemaUnavailable when no probe can list the table's columns
   */
  static async open(
    connection: DatabaseConnection,
    table: string,
    options: ActiveRecordOptions = {}
  ): Promise<ActiveRecord> {
    const schema = await introspectSchema(connection, table, options);
    return new ActiveRecord(connection, schema);
  }

  get(name: string): unknown {
    return this.store.get(name);
  }

  /**
   * Store `value` under `name` if the schema knows the name; otherwise do
   * nothing.
   */
  set(name: string, value: unknown): void {
    this.store.set(name, value);
  }

  has(name: string): boolean {
    return this.store.has(name);
  }

  unset(name: string): void {
    this.store.unset(name);
  }

  fill(data: Row): this {
    for (const [name, value] of Object.entries(data)) {
      this.store.set(name, value);
    }
    return this;
  }

  toMap(): Row {
    return this.store.toMap();
  }

  clear(): this {
    this.store.clear();
    this.state = 'new';
    return this;
  }

  getId(): unknown {
    return this.store.get(this.schema.primaryKey);
  }

  isPersisted(): boolean {
    return this.state === 'persisted';
  }

  getState(): PersistenceState {
    return this.state;
  }

  getTable(): string {
    return this.schema.table;
  }

  getPrimaryKey(): string {
    return this.schema.primaryKey;
  }

  getFields(): readonly string[] {
    return this.schema.fields;
  }

  /**
   * Load the row with primary key `id` into this record.
   *
   * @returns This record, now persisted, or `null` (leaving it untouched) when no row matches
   */
  async findById(id: unknown): Promise<this | null> {
    const { sql, params } = this.builder.select({
      conditions: Object.fromEntries([[this.schema.primaryKey, id]]),
      limit: 1,
    });
    const [row] = await this.connection.query(sql, params);
    if (row === undefined) {
      return null;
    }
    this.store.replace(row);
    this.state = 'persisted';
    return this;
  }

  async findBy(field: string, value: unknown, limit: number | null = null): Promise<ActiveRecord[]> {
    return this.findAll(Object.fromEntries([[field, value]]), '', limit);
  }

  async findAll(
    conditions: Conditions = {},
    orderBy = '',
    limit: number | null = null
  ): Promise<ActiveRecord[]> {
    const { sql, params } = this.builder.select({ conditions, orderBy, limit });
    const rows = await this.connection.query(sql, params);
    return rows.map(row => this._hydrate(row));
  }

  /**
   * Start a join query over this record's table.
   *
   * @returns A new immutable {@link JoinQuery}; this record is not modified
   */
  addJoin(
    table: string,
    localKey: string,
    foreignKey: string,
    type = 'INNER',
    fields: readonly string[] = [WILDCARD]
  ): JoinQuery {
    return new JoinQuery(this.connection, this.builder).addJoin(
      table,
      localKey,
      foreignKey,
      type,
      fields
    );
  }

  /**
   * Plain select returning raw rows. Use {@link addJoin} for joined rows.
   */
  async fetchWithJoins(conditions: Conditions = {}): Promise<Row[]> {
    return new JoinQuery(this.connection, this.builder).fetchWithJoins(conditions);
  }

  /**
   * Insert when new, update when persisted. Whether the row still exists is
   * not checked.
   *
   * @returns `true` once the statement succeeded; driver errors reject
   * @throws MissingPrimaryKey when updating without a primary key value
   */
  async save(): Promise<boolean> {
    if (this.state === 'new') {
      return this._insert();
    }
    return this._update();
  }

  /**
   * Delete this record's row and reset the record to the `new` state.
   *
   * @returns Whether a row was removed
   * @throws MissingPrimaryKey without touching the database when no primary key is set
   */
  async delete(): Promise<boolean> {
    const { sql, params } = this.builder.deleteById(this.getId());
    const result = await this.connection.execute(sql, params);
    this.store.clear();
    this.state = 'new';
    return result.rowCount > 0;
  }

  /**
   * @returns Number of rows removed
   * @throws EmptyCondition without touching the database when `conditions` is empty
   */
  async deleteWhere(conditions: Conditions): Promise<number> {
    const { sql, params } = this.builder.deleteWhere(conditions);
    const result = await this.connection.execute(sql, params);
    return result.rowCount;
  }

  async _insert(): Promise<boolean> {
    const { primaryKey } = this.schema;
    const { sql, params } = this.builder.insert(this.store.toMap());
    const result = await this.connection.execute(sql, params, { returning: primaryKey });

    const { lastInsertId } = result;
    if (!this.store.has(primaryKey) && lastInsertId !== null && lastInsertId !== undefined) {
      this.store.set(primaryKey, lastInsertId);
    }
    this.state = 'persisted';
    return true;
  }

  async _update(): Promise<boolean> {
    const statement = this.builder.update(this.store.toMap());
    if (statement !== null) {
      await this.connection.execute(statement.sql, statement.params);
    }
    return true;
  }

  /**
   * Build a persisted record from a fetched row. Every column of the row is
   * kept, including ones outside the schema.
   */
  _hydrate(row: Row): ActiveRecord {
    const record = new ActiveRecord(this.connection, this.schema);
    record.store.replace(row);
    record.state = 'persisted';
    return record;
  }
}

export default ActiveRecord;
