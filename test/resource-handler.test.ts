import assert from 'node:assert/strict';
import test from 'node:test';

import ActiveRecord from '../src/lib/active-record.js';
import { DocumentNotFound, ValidationError } from '../src/lib/errors.js';
import type { CurrentRequest } from '../src/lib/request.js';
import { createResourceHandler } from '../src/lib/resource-handler.js';
import { createSqliteFixture } from './helpers/sqlite-fixture.js';

const request = (
  method: string,
  segments: string[] = [],
  body: unknown = null,
  query: Record<string, string> = {}
): CurrentRequest => ({ method, segments, query, body });

const withUsersHandler = async (
  run: (handle: ReturnType<typeof createResourceHandler>) => Promise<void>
) => {
  const { connection, cleanup } = createSqliteFixture();
  try {
    await run(createResourceHandler(() => ActiveRecord.open(connection, 'users')));
  } finally {
    await cleanup();
  }
};

test('POST stores the known fields of the body', async () => {
  await withUsersHandler(async handle => {
    const created = await handle(
      request('POST', [], { name: 'Jane', email: 'jane@example.com', role: 'admin' })
    );

    assert.deepStrictEqual(created, { name: 'Jane', email: 'jane@example.com', id: 1 });
  });
});

test('GET returns one record or the filtered collection', async () => {
  await withUsersHandler(async handle => {
    await handle(request('POST', [], { name: 'Jane', status: 'active' }));
    await handle(request('POST', [], { name: 'Joe', status: 'inactive' }));

    assert.deepStrictEqual(await handle(request('GET', ['2'])), {
      id: 2,
      name: 'Joe',
      email: null,
      status: 'inactive',
    });
    assert.deepStrictEqual(
      await handle(request('get', [], null, { status: 'active', page: '2' })),
      [{ id: 1, name: 'Jane', email: null, status: 'active' }]
    );
  });
});

test('PUT updates the record named by the path', async () => {
  await withUsersHandler(async handle => {
    await handle(request('POST', [], { name: 'Jane', status: 'active' }));

    const updated = await handle(request('PUT', ['1'], { id: 5, status: 'inactive' }));

    assert.deepStrictEqual(updated, { id: 1, name: 'Jane', email: null, status: 'inactive' });
    assert.deepStrictEqual(await handle(request('GET', ['1'])), updated);
  });
});

test('DELETE removes the record and reports missing ones', async () => {
  await withUsersHandler(async handle => {
    await handle(request('POST', [], { name: 'Jane' }));

    assert.deepStrictEqual(await handle(request('DELETE', ['1'])), { deleted: true });
    await assert.rejects(handle(request('DELETE', ['1'])), DocumentNotFound);
    await assert.rejects(
      handle(request('GET', ['1'])),
      (error: unknown) => error instanceof DocumentNotFound && error.message === 'users with id 1 not found'
    );
  });
});

test('bodies must be objects and unsupported methods are rejected', async () => {
  await withUsersHandler(async handle => {
    await assert.rejects(handle(request('POST', [], ['not', 'an', 'object'])), ValidationError);
    await assert.rejects(handle(request('DELETE')), ValidationError);
    await assert.rejects(handle(request('OPTIONS', ['1'])), ValidationError);
  });
});
