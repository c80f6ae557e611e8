import type { StatementParams } from '../connection-types.js';
import { QueryError } from '../errors.js';

// Quoted literals and `::type` casts are matched first so they pass through
// untouched; only the third alternative captures a placeholder name.
const TOKEN_PATTERN = /'(?:[^']|'')*'|"(?:[^"]|"")*"|::|:([A-Za-z_][A-Za-z0-9_]*)/g;

export interface PositionalStatement {
  text: string;
  values: unknown[];
}

/**
 * Rewrite `:name` placeholders as PostgreSQL `$n` parameters.
 *
 * A name used more than once keeps its first index.
 *
 * @throws QueryError when the SQL names a parameter `params` does not hold
 */
export function compileNamedParameters(
  sql: string,
  params: StatementParams = {}
): PositionalStatement {
  const indexes = new Map<string, number>();
  const values: unknown[] = [];

  const text = sql.replace(TOKEN_PATTERN, (token: string, name: string | undefined) => {
    if (name === undefined) {
      return token;
    }

    let index = indexes.get(name);
    if (index === undefined) {
      if (!Object.hasOwn(params, name)) {
        throw new QueryError(`Missing value for named parameter :${name}`);
      }
      values.push(params[name]);
      index = values.length;
      indexes.set(name, index);
    }
    return `$${index}`;
  });

  return { text, values };
}
