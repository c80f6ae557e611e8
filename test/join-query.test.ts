import assert from 'node:assert/strict';
import test from 'node:test';

import ActiveRecord from '../src/lib/active-record.js';
import JoinQuery from '../src/lib/join-query.js';
import QueryBuilder from '../src/lib/query-builder.js';
import Schema from '../src/lib/schema.js';
import { createStubConnection } from './helpers/dal-mocks.js';
import { createSqliteFixture } from './helpers/sqlite-fixture.js';

test('JoinQuery.addJoin returns a new query and leaves the receiver unchanged', () => {
  const connection = createStubConnection();
  const base = new JoinQuery(connection, new QueryBuilder(new Schema('orders', ['id', 'user_id'])));

  const withUsers = base.addJoin('users', 'user_id', 'id', 'INNER', ['name']);
  const withBoth = withUsers.addJoin('products', 'product_id', 'id', 'LEFT', ['title']);
  const branch = withUsers.addJoin('addresses', 'user_id', 'user_id', 'RIGHT');

  assert.strictEqual(base.joins.length, 0);
  assert.strictEqual(withUsers.joins.length, 1);
  assert.deepStrictEqual(
    withBoth.joins.map(join => `${join.alias}:${join.targetTable}`),
    ['j0:users', 'j1:products']
  );
  assert.deepStrictEqual(
    branch.joins.map(join => `${join.alias}:${join.targetTable}`),
    ['j0:users', 'j1:addresses']
  );
});

test('JoinQuery.fetchWithJoins sends one statement with the join chain', async () => {
  const connection = createStubConnection({ query: () => [{ id: 1, j0_name: 'Ada' }] });
  const query = new JoinQuery(
    connection,
    new QueryBuilder(new Schema('orders', ['id', 'user_id']))
  ).addJoin('users', 'user_id', 'id', 'INNER', ['name']);

  const rows = await query.fetchWithJoins({ id: 1 });

  assert.deepStrictEqual(rows, [{ id: 1, j0_name: 'Ada' }]);
  assert.deepStrictEqual(connection.calls, [
    {
      kind: 'query',
      sql:
        'SELECT orders.id, orders.user_id, j0.name AS j0_name FROM orders ' +
        'INNER JOIN users AS j0 ON orders.user_id = j0.id WHERE orders.id = :id',
      params: { id: 1 },
    },
  ]);
});

test('orders joined to users and products expose aliased columns', async () => {
  const { connection, cleanup } = createSqliteFixture();
  try {
    const user = await ActiveRecord.open(connection, 'users');
    await user.fill({ name: 'Order User', email: 'order@example.com', status: 'active' }).save();

    const product = await ActiveRecord.open(connection, 'products');
    await product.fill({ title: 'Widget', price: 9.99 }).save();

    const order = await ActiveRecord.open(connection, 'orders');
    await order
      .fill({ user_id: user.getId(), product_id: product.getId(), status: 'completed' })
      .save();

    const orders = await ActiveRecord.open(connection, 'orders');
    const rows = await orders
      .addJoin('users', 'user_id', 'id', 'INNER', ['name'])
      .addJoin('products', 'product_id', 'id', 'LEFT', ['title'])
      .fetchWithJoins();

    assert.strictEqual(rows.length, 1);
    assert.deepStrictEqual(
      { ...rows[0] },
      {
        id: 1,
        user_id: 1,
        product_id: 1,
        status: 'completed',
        j0_name: 'Order User',
        j1_title: 'Widget',
      }
    );
    assert.strictEqual(orders.isPersisted(), false);
  } finally {
    await cleanup();
  }
});

test('LEFT joins keep rows without a match', async () => {
  const { sqlite, connection, cleanup } = createSqliteFixture();
  try {
    sqlite.db.exec("INSERT INTO orders (user_id, product_id, status) VALUES (NULL, 99, 'draft')");
    const orders = await ActiveRecord.open(connection, 'orders');

    const rows = await orders
      .addJoin('products', 'product_id', 'id', 'left', ['title'])
      .fetchWithJoins({ status: 'draft' });

    assert.strictEqual(rows.length, 1);
    assert.strictEqual(rows[0]?.j0_title, null);
    assert.strictEqual(rows[0]?.product_id, 99);
  } finally {
    await cleanup();
  }
});
