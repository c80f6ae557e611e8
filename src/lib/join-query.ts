import type { DatabaseConnection, Row, Statement } from './connection-types.js';
import type { Conditions, JoinDescriptor } from './query-builder.js';
import QueryBuilder, { createJoinDescriptor, WILDCARD } from './query-builder.js';

/**
 * Immutable multi-table SELECT over a record's table.
 *
 * Each `addJoin` returns a new query; the receiver is left untouched, so a
 * partially built chain can be shared and extended in different directions.
 * Results are raw row maps: their columns no longer match a single table, so
 * they are never hydrated into records.
 *
 * @example
 * const rows = await orders
 *   .addJoin('users', 'user_id', 'id', 'INNER', ['name'])
 *   .addJoin('products', 'product_id', 'id', 'LEFT', ['title'])
 *   .fetchWithJoins({ status: 'completed' });
 * // rows[0].j0_name, rows[0].j1_title
 */
export class JoinQuery {
  readonly connection: DatabaseConnection;
  readonly builder: QueryBuilder;
  readonly joins: readonly JoinDescriptor[];

  constructor(
    connection: DatabaseConnection,
    builder: QueryBuilder,
    joins: readonly JoinDescriptor[] = []
  ) {
    this.connection = connection;
    this.builder = builder;
    this.joins = Object.freeze([...joins]);
  }

  addJoin(
    table: string,
    localKey: string,
    foreignKey: string,
    type = 'INNER',
    fields: readonly string[] = [WILDCARD]
  ): JoinQuery {
    const descriptor = createJoinDescriptor(
      this.joins.length,
      table,
      localKey,
      foreignKey,
      type,
      fields
    );
    return new JoinQuery(this.connection, this.builder, [...this.joins, descriptor]);
  }

  toStatement(conditions: Conditions = {}): Statement {
    return this.builder.select({ conditions, joins: this.joins });
  }

  async fetchWithJoins(conditions: Conditions = {}): Promise<Row[]> {
    const { sql, params } = this.toStatement(conditions);
    return this.connection.query(sql, params);
  }
}

export default JoinQuery;
