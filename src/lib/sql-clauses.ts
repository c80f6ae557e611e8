import { InvalidClauseError } from './errors.js';

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const QUALIFIED_IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)?$/;
const ORDER_TERM_PATTERN =
  /^([A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)?)(?:\s+(ASC|DESC))?$/i;

export const JOIN_TYPES = ['INNER', 'LEFT', 'RIGHT'] as const;

export type JoinType = (typeof JOIN_TYPES)[number];

const isJoinType = (value: string): value is JoinType =>
  (JOIN_TYPES as readonly string[]).includes(value);

/**
 * Check that a name can be interpolated into SQL as a bare identifier.
 *
 * @param name Candidate identifier
 * @param clause Where the identifier is used, reported on failure
 * @param allowQualified Accept one `schema.` (or `table.`) prefix
 * @returns The unchanged name
 */
export function assertIdentifier(name: string, clause = 'identifier', allowQualified = false): string {
  const pattern = allowQualified ? QUALIFIED_IDENTIFIER_PATTERN : IDENTIFIER_PATTERN;
  if (typeof name !== 'string' || !pattern.test(name)) {
    throw new InvalidClauseError(`Unsafe ${clause}: "${String(name)}"`, clause);
  }
  return name;
}

/**
 * Parse caller-supplied ORDER BY text into a normalized clause body.
 *
 * Only comma-separated `column [ASC|DESC]` terms are accepted; columns may be
 * table-qualified. Blank input yields an empty string (no ORDER BY).
 */
export function normalizeOrderBy(orderBy: string | null | undefined): string {
  if (orderBy === null || orderBy === undefined || orderBy.trim() === '') {
    return '';
  }

  return orderBy
    .split(',')
    .map(term => {
      const match = ORDER_TERM_PATTERN.exec(term.trim());
      if (!match) {
        throw new InvalidClauseError(`Invalid ORDER BY term: "${term.trim()}"`, 'orderBy');
      }
      const [, column, direction] = match;
      return direction ? `${column} ${direction.toUpperCase()}` : column;
    })
    .join(', ');
}

export function normalizeLimit(limit: number | null | undefined): number | null {
  if (limit === null || limit === undefined) {
    return null;
  }
  if (!Number.isSafeInteger(limit) || limit < 0) {
    throw new InvalidClauseError(`LIMIT must be a non-negative integer, got ${String(limit)}`, 'limit');
  }
  return limit;
}

export function normalizeJoinType(type: string): JoinType {
  const normalized = typeof type === 'string' ? type.trim().toUpperCase() : '';
  if (!isJoinType(normalized)) {
    throw new InvalidClauseError(
      `Unsupported join type "${String(type)}"; expected one of ${JOIN_TYPES.join(', ')}`,
      'joinType'
    );
  }
  return normalized;
}
