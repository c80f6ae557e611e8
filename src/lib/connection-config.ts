import type { SqlDialect } from './connection-types.js';
import { ValidationError } from './errors.js';
import type { ConfigStore } from './request.js';

export interface ConnectionConfig {
  dialect: SqlDialect;
  /**
   * Connection URL for PostgreSQL and MySQL.
   */
  url?: string;
  /**
   * Database file for SQLite (`:memory:` for an in-memory database).
   */
  filename?: string;
}

export type ConfigSource = Readonly<Record<string, string | undefined>>;

const SQLITE_PREFIXES = ['sqlite://', 'sqlite:', 'file:'] as const;

/**
 * Turn a database URL into a connection config.
 *
 * @throws ValidationError for an unsupported scheme
 */
export function parseDatabaseUrl(url: string): ConnectionConfig {
  const trimmed = url.trim();

  if (/^postgres(?:ql)?:\/\//i.test(trimmed)) {
    return { dialect: 'postgres', url: trimmed };
  }

  if (/^mysql:\/\//i.test(trimmed)) {
    return { dialect: 'mysql', url: trimmed };
  }

  const sqlitePrefix = SQLITE_PREFIXES.find(prefix => trimmed.toLowerCase().startsWith(prefix));
  if (sqlitePrefix !== undefined) {
    const filename = trimmed.slice(sqlitePrefix.length);
    if (filename === '') {
      throw new ValidationError(`Database URL "${url}" does not name a SQLite file`, 'url');
    }
    return { dialect: 'sqlite', filename };
  }

  throw new ValidationError(`Unsupported database URL scheme in "${url}"`, 'url');
}

/**
 * Resolve the connection settings from environment variables.
 *
 * `TABLEMAPPER_DATABASE_URL` wins over `DATABASE_URL`; without either,
 * `SQLITE_FILENAME` selects a SQLite file.
 *
 * @throws ValidationError when nothing usable is set
 */
export function resolveConnectionConfig(env: ConfigSource = process.env): ConnectionConfig {
  const url = env.TABLEMAPPER_DATABASE_URL ?? env.DATABASE_URL;
  if (url !== undefined && url.trim() !== '') {
    return parseDatabaseUrl(url);
  }

  const filename = env.SQLITE_FILENAME;
  if (filename !== undefined && filename.trim() !== '') {
    return { dialect: 'sqlite', filename: filename.trim() };
  }

  throw new ValidationError(
    'Set TABLEMAPPER_DATABASE_URL (or DATABASE_URL / SQLITE_FILENAME) before connecting.'
  );
}

/**
 * Resolve the connection settings from the `DATABASE.URL` key of a config
 * store.
 */
export function resolveConnectionConfigFromStore(store: ConfigStore): ConnectionConfig {
  const url = store.get('DATABASE.URL');
  if (typeof url !== 'string' || url.trim() === '') {
    throw new ValidationError('Config key DATABASE.URL must be a non-empty string', 'DATABASE.URL');
  }
  return parseDatabaseUrl(url);
}
