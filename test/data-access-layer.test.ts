import assert from 'node:assert/strict';
import test from 'node:test';

import DataAccessLayer from '../src/lib/data-access-layer.js';
import {
  ConnectionError,
  ConstraintError,
  QueryError,
  TransactionError,
  UnknownModelError,
  ValidationError,
} from '../src/lib/errors.js';
import { reportQueryError } from '../src/lib/pg-executor.js';
import { resetDebugLogger, setDebugLogger } from '../src/lib/runtime.js';
import types from '../src/lib/type.js';
import { createTestDAL, defineGarageModels } from './helpers/dal-mocks.js';

const captureLogs = () => {
  const db: string[] = [];
  const error: string[] = [];
  setDebugLogger({
    db: (...args) => db.push(args.map(String).join(' ')),
    error: (...args) => error.push(args.map(String).join(' ')),
  });
  return { db, error };
};

test('defined models are registered by name and by table', () => {
  const { dal } = createTestDAL();
  const { User, Car, Garage, Profile } = defineGarageModels(dal);

  assert.equal(dal.getModel('User'), User);
  assert.equal(dal.getModel('Cars'), Car);
  assert.deepEqual(dal.getRegisteredModels(), [User, Car, Garage, Profile]);
  assert.throws(
    () => dal.getModel('Boat'),
    (error: unknown) => error instanceof UnknownModelError && error.modelName === 'Boat'
  );
});

test('a model name or table can only be defined once', () => {
  const { dal } = createTestDAL();
  defineGarageModels(dal);

  assert.throws(
    () => dal.defineModel({ name: 'User', schema: {} }),
    (error: unknown) =>
      error instanceof ValidationError && error.message === "Model 'User' is already defined on this DAL"
  );
  assert.throws(
    () => dal.defineModel({ name: 'Person', tableName: 'Users', schema: {} }),
    (error: unknown) =>
      error instanceof ValidationError &&
      error.message === "Table 'Users' is already mapped to model 'User'"
  );
});

test('models on different DALs do not see each other', () => {
  const first = createTestDAL().dal;
  const second = createTestDAL().dal;
  const { User } = defineGarageModels(first);

  assert.equal(User.context, first);
  assert.throws(() => second.getModel('User'), UnknownModelError);
});

test('relations are discovered once and again after a new model is defined', () => {
  const { dal } = createTestDAL();
  dal.defineModel({ name: 'User', schema: { cars: types.collection('Car') } });
  dal.defineModel({ name: 'Car', schema: { user: types.reference('User') } });

  const relations = dal.getRelations();
  assert.equal(relations.length, 2);
  assert.equal(dal.getRelations(), relations);
  assert.equal(dal.relationFor('Car', 'user')?.foreignKeyColumnName, 'UserId');

  dal.defineModel({ name: 'Garage', schema: { cars: types.collection('Car') } });
  assert.equal(dal.getRelations().length, 4);
  assert.equal(dal.relationsOf('Garage').length, 1);

  const rediscovered = dal.resetRelations();
  assert.deepEqual(rediscovered, dal.getRelations());
});

test('clear forgets every model', () => {
  const { dal } = createTestDAL();
  defineGarageModels(dal);
  dal.clear();

  assert.deepEqual(dal.getRegisteredModels(), []);
  assert.deepEqual(dal.getRelations(), []);
});

test('a DAL without a pool or executor refuses to run statements', async () => {
  const dal = new DataAccessLayer({ schema: null, env: {} });

  assert.equal(dal.isConnected(), false);
  assert.throws(
    () => dal.executor,
    (error: unknown) =>
      error instanceof ConnectionError && error.message === 'DAL not connected. Call connect() first.'
  );
  await assert.rejects(() => dal.transaction(async () => 1), ConnectionError);
  await dal.disconnect();
});

test('a DAL around a custom executor is connected without a pool', async () => {
  const { dal, executor } = createTestDAL();

  assert.equal(await dal.connect(), dal);
  assert.equal(dal.pool, null);
  assert.equal(dal.isConnected(), true);
  assert.equal(dal.executor, executor);
  assert.equal(dal.schema, null);
});

test('the schema defaults to public', () => {
  assert.equal(new DataAccessLayer({ env: {} }).schema, 'public');
  assert.equal(new DataAccessLayer({ schema: 'garage', env: {} }).schema, 'garage');
});

test('settings come from PG variables unless given explicitly', () => {
  const dal = new DataAccessLayer({
    user: 'app',
    env: { PGHOST: 'db.internal', PGUSER: 'ignored', PGSCHEMA: 'inventory' },
  });

  assert.equal(dal.config.host, 'db.internal');
  assert.equal(dal.config.user, 'app');
  assert.equal(dal.schema, 'inventory');
  assert.equal(dal.config.port, 5432);
});

test('a transaction commits when the callback resolves', async () => {
  const { dal, executor } = createTestDAL();
  const { User } = defineGarageModels(dal);

  const result = await dal.transaction(async tx => {
    const user = await User.create({ name: 'Ada' }, { executor: tx });
    return user.id;
  });

  assert.equal(result, 1);
  assert.deepEqual(executor.queries.map(query => query.method), ['execute', 'scalar', 'execute']);
  assert.equal(executor.statements[0], 'BEGIN');
  assert.equal(executor.statements[2], 'COMMIT');
});

test('a transaction rolls back and rethrows when the callback fails', async () => {
  const { dal, executor } = createTestDAL();
  const failure = new Error('boom');

  await assert.rejects(
    () =>
      dal.transaction(async () => {
        throw failure;
      }),
    (error: unknown) => error === failure
  );
  assert.deepEqual(executor.statements, ['BEGIN', 'ROLLBACK']);
});

test('a failed rollback surfaces as TransactionError', async () => {
  const { dal, executor } = createTestDAL();
  executor.failOn(/^ROLLBACK$/, new Error('connection lost'));

  await assert.rejects(
    () =>
      dal.transaction(async () => {
        throw new Error('boom');
      }),
    (error: unknown) =>
      error instanceof TransactionError &&
      error.message === "Rollback failed after 'boom': connection lost"
  );
});

test('model definitions, discovery and transactions are logged', async () => {
  const logs = captureLogs();
  try {
    const { dal } = createTestDAL();
    dal.defineModel({ name: 'User', schema: { cars: types.collection('Car') } });
    dal.defineModel({ name: 'Car', schema: { user: types.reference('User') } });
    dal.getRelations();
    await dal.transaction(async () => undefined);

    assert.deepEqual(logs.db, [
      "Model 'User' defined on table 'Users'",
      "Model 'Car' defined on table 'Cars'",
      'Discovered 2 relations across 2 models',
      'Transaction started',
      'Transaction committed',
    ]);
  } finally {
    resetDebugLogger();
  }
});

test('failed statements are logged and keep their text and parameters', () => {
  const logs = captureLogs();
  try {
    const error = reportQueryError(
      { message: 'relation "Boats" does not exist', code: '42P01' },
      'SELECT * FROM "Boats" WHERE "Id" = $1',
      [3]
    );

    assert.ok(error instanceof QueryError);
    assert.equal(error.message, 'Table does not exist: relation "Boats" does not exist');
    assert.equal(error.sql, 'SELECT * FROM "Boats" WHERE "Id" = $1');
    assert.deepEqual(error.parameters, [3]);
    assert.deepEqual(logs.error, [
      'Query error: Table does not exist: relation "Boats" does not exist',
      'Query text: SELECT * FROM "Boats" WHERE "Id" = $1',
      'Query params: [3]',
    ]);
  } finally {
    resetDebugLogger();
  }
});

test('bigint parameters are logged without hiding the query error', () => {
  const logs = captureLogs();
  try {
    const error = reportQueryError(
      { message: 'duplicate key value', code: '23505' },
      'INSERT INTO "Users" ("Id") VALUES ($1)',
      [9007199254740993n]
    );

    assert.ok(error instanceof ConstraintError);
    assert.equal(error.message, 'Unique constraint violation: duplicate key value');
    assert.equal(logs.error.at(-1), 'Query params: ["9007199254740993"]');
  } finally {
    resetDebugLogger();
  }
});
