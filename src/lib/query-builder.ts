import type { Row, SqlDialect, Statement } from './connection-types.js';
import { EmptyCondition, MissingPrimaryKey } from './errors.js';
import type Schema from './schema.js';
import {
  assertIdentifier,
  type JoinType,
  normalizeJoinType,
  normalizeLimit,
  normalizeOrderBy,
} from './sql-clauses.js';

export const WILDCARD = '*';

/**
 * Equality conditions, combined with AND in iteration order.
 */
export type Conditions = Record<string, unknown>;

/**
 * One additional table in a SELECT. The alias is positional (`j0`, `j1`, ...)
 * and every named field comes back as `<alias>_<field>`.
 */
export interface JoinDescriptor {
  readonly targetTable: string;
  readonly localKey: string;
  readonly foreignKey: string;
  readonly joinType: JoinType;
  readonly selectedFields: readonly string[];
  readonly alias: string;
}

export interface SelectOptions {
  conditions?: Conditions;
  orderBy?: string;
  limit?: number | null;
  joins?: readonly JoinDescriptor[];
}

interface WhereClause {
  sql: string;
  params: Row;
}

const isPresent = (value: unknown): boolean => value !== undefined && value !== null;

/**
 * Build a validated join descriptor for position `index` in a join chain.
 */
export function createJoinDescriptor(
  index: number,
  targetTable: string,
  localKey: string,
  foreignKey: string,
  joinType: string = 'INNER',
  selectedFields: readonly string[] = [WILDCARD]
): JoinDescriptor {
  return Object.freeze({
    targetTable: assertIdentifier(targetTable, 'join table', true),
    localKey: assertIdentifier(localKey, 'join local key'),
    foreignKey: assertIdentifier(foreignKey, 'join foreign key'),
    joinType: normalizeJoinType(joinType),
    selectedFields: Object.freeze(
      selectedFields.map(field => (field === WILDCARD ? field : assertIdentifier(field, 'join field')))
    ),
    alias: `j${index}`,
  });
}

/**
 * Renders parameterized statements for one table.
 *
 * Values are always bound through `:name` placeholders. Identifiers (table,
 * column and alias names) are interpolated: those coming from callers are
 * checked against a strict identifier pattern first, those coming from the
 * introspected schema are trusted as the database reported them.
 */
class QueryBuilder {
  readonly schema: Schema;
  readonly dialect: SqlDialect;

  constructor(schema: Schema, dialect: SqlDialect = 'sqlite') {
    this.schema = schema;
    this.dialect = dialect;
  }

  get tableName(): string {
    return this.schema.table;
  }

  /**
   * SELECT over the schema columns, expanded with any joins.
   *
   * @param options Conditions, ORDER BY text, LIMIT and join chain
   * @returns Statement with one parameter per condition
   */
  select(options: SelectOptions = {}): Statement {
    const { conditions = {}, orderBy = '', limit = null, joins = [] } = options;
    const table = this.tableName;
    const order = normalizeOrderBy(orderBy);
    const max = normalizeLimit(limit);

    const columns = this.schema.fields.map(field => `${table}.${field}`);
    const joinClauses: string[] = [];

    for (const join of joins) {
      const { alias } = join;
      for (const field of join.selectedFields) {
        columns.push(field === WILDCARD ? `${alias}.*` : `${alias}.${field} AS ${alias}_${field}`);
      }
      joinClauses.push(
        `${join.joinType} JOIN ${join.targetTable} AS ${alias} ON ${table}.${join.localKey} = ${alias}.${join.foreignKey}`
      );
    }

    let sql = `SELECT ${columns.join(', ')} FROM ${table}`;
    if (joinClauses.length > 0) {
      sql += ` ${joinClauses.join(' ')}`;
    }

    // Joined tables usually share column names such as `id`, so conditions
    // are pinned to the main table whenever a join is present.
    const where = this._where(conditions, joins.length > 0 ? table : null);
    if (where.sql !== '') {
      sql += ` WHERE ${where.sql}`;
    }
    if (order !== '') {
      sql += ` ORDER BY ${order}`;
    }
    if (max !== null) {
      sql += ` LIMIT ${max}`;
    }

    return { sql, params: where.params };
  }

  /**
   * INSERT of every stored value except the primary key.
   */
  insert(values: Row): Statement {
    const entries = Object.entries(values).filter(([field]) => field !== this.schema.primaryKey);

    if (entries.length === 0) {
      // MySQL has no DEFAULT VALUES form
      const sql =
        this.dialect === 'mysql'
          ? `INSERT INTO ${this.tableName} () VALUES ()`
          : `INSERT INTO ${this.tableName} DEFAULT VALUES`;
      return { sql, params: {} };
    }

    const fields = entries.map(([field]) => field);
    const placeholders = fields.map(field => `:${field}`);

    return {
      sql: `INSERT INTO ${this.tableName} (${fields.join(', ')}) VALUES (${placeholders.join(', ')})`,
      params: Object.fromEntries(entries),
    };
  }

  /**
   * UPDATE of every stored value, keyed on the primary key.
   *
   * @returns `null` when there is nothing besides the primary key to write
   * @throws MissingPrimaryKey when the primary key value is absent
   */
  update(values: Row): Statement | null {
    const { primaryKey } = this.schema;
    const id = values[primaryKey];
    if (!isPresent(id)) {
      throw new MissingPrimaryKey(this.tableName, primaryKey, 'update');
    }

    const entries = Object.entries(values).filter(([field]) => field !== primaryKey);
    if (entries.length === 0) {
      return null;
    }

    const sets = entries.map(([field]) => `${field} = :${field}`);

    return {
      sql: `UPDATE ${this.tableName} SET ${sets.join(', ')} WHERE ${primaryKey} = :${primaryKey}`,
      params: Object.fromEntries([...entries, [primaryKey, id]]),
    };
  }

  /**
   * @throws MissingPrimaryKey when `id` is absent
   */
  deleteById(id: unknown): Statement {
    const { primaryKey } = this.schema;
    if (!isPresent(id)) {
      throw new MissingPrimaryKey(this.tableName, primaryKey, 'delete');
    }

    return {
      sql: `DELETE FROM ${this.tableName} WHERE ${primaryKey} = :${primaryKey}`,
      params: Object.fromEntries([[primaryKey, id]]),
    };
  }

  /**
   * @throws EmptyCondition when no condition is given
   */
  deleteWhere(conditions: Conditions): Statement {
    if (Object.keys(conditions).length === 0) {
      throw new EmptyCondition();
    }

    const where = this._where(conditions, null);
    return {
      sql: `DELETE FROM ${this.tableName} WHERE ${where.sql}`,
      params: where.params,
    };
  }

  _where(conditions: Conditions, qualifier: string | null): WhereClause {
    const entries = Object.entries(conditions);
    const clauses = entries.map(([field]) => {
      assertIdentifier(field, 'condition field');
      const column = qualifier === null ? field : `${qualifier}.${field}`;
      return `${column} = :${field}`;
    });

    return {
      sql: clauses.join(' AND '),
      params: Object.fromEntries(entries),
    };
  }
}

export { QueryBuilder };
export default QueryBuilder;
