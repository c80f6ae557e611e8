import assert from 'node:assert/strict';
import test from 'node:test';

import {
  parseDatabaseUrl,
  resolveConnectionConfig,
  resolveConnectionConfigFromStore,
} from '../src/lib/connection-config.js';
import { ValidationError } from '../src/lib/errors.js';
import type { ConfigStore } from '../src/lib/request.js';

test('parseDatabaseUrl recognises each supported scheme', () => {
  assert.deepStrictEqual(parseDatabaseUrl('postgres://app@localhost/shop'), {
    dialect: 'postgres',
    url: 'postgres://app@localhost/shop',
  });
  assert.deepStrictEqual(parseDatabaseUrl('postgresql://app@db/shop'), {
    dialect: 'postgres',
    url: 'postgresql://app@db/shop',
  });
  assert.deepStrictEqual(parseDatabaseUrl('mysql://app:test-secret@db:3306/shop'), {
    dialect: 'mysql',
    url: 'mysql://app:test-secret@db:3306/shop',
  });
  assert.deepStrictEqual(parseDatabaseUrl('sqlite:./data/app.db'), {
    dialect: 'sqlite',
    filename: './data/app.db',
  });
  assert.deepStrictEqual(parseDatabaseUrl('file::memory:'), {
    dialect: 'sqlite',
    filename: ':memory:',
  });
});

test('parseDatabaseUrl rejects unknown schemes and empty SQLite paths', () => {
  assert.throws(() => parseDatabaseUrl('mongodb://localhost/app'), ValidationError);
  assert.throws(() => parseDatabaseUrl('sqlite:'), ValidationError);
});

test('resolveConnectionConfig prefers the package-specific variable', () => {
  const config = resolveConnectionConfig({
    TABLEMAPPER_DATABASE_URL: 'sqlite:mapper.db',
    DATABASE_URL: 'postgres://localhost/other',
  });

  assert.deepStrictEqual(config, { dialect: 'sqlite', filename: 'mapper.db' });
});

test('resolveConnectionConfig falls back to DATABASE_URL then SQLITE_FILENAME', () => {
  assert.deepStrictEqual(resolveConnectionConfig({ DATABASE_URL: 'mysql://localhost/app' }), {
    dialect: 'mysql',
    url: 'mysql://localhost/app',
  });
  assert.deepStrictEqual(resolveConnectionConfig({ SQLITE_FILENAME: ' local.db ' }), {
    dialect: 'sqlite',
    filename: 'local.db',
  });
});

test('resolveConnectionConfig fails when nothing is configured', () => {
  assert.throws(
    () => resolveConnectionConfig({ DATABASE_URL: '  ' }),
    (error: unknown) => error instanceof ValidationError && error.code === 'VALIDATION_ERROR'
  );
});

test('resolveConnectionConfigFromStore reads DATABASE.URL', () => {
  const values = new Map<string, unknown>([['DATABASE.URL', 'sqlite::memory:']]);
  const store: ConfigStore = {
    get: keyPath => values.get(keyPath),
    set: (keyPath, value) => {
      values.set(keyPath, value);
    },
  };

  assert.deepStrictEqual(resolveConnectionConfigFromStore(store), {
    dialect: 'sqlite',
    filename: ':memory:',
  });

  store.set('DATABASE.URL', 42);
  assert.throws(
    () => resolveConnectionConfigFromStore(store),
    (error: unknown) => error instanceof ValidationError && error.field === 'DATABASE.URL'
  );
});
