import assert from 'node:assert/strict';
import test from 'node:test';

import { CardinalityError, ValidationError } from '../src/lib/errors.js';
import { loadRelationBatch } from '../src/lib/relation-loader.js';
import { createTestDAL, defineGarageModels, row } from './helpers/dal-mocks.js';

const setup = () => {
  const { dal, executor } = createTestDAL();
  return { dal, executor, ...defineGarageModels(dal) };
};

test('load fetches an owned reference once and memoizes it', async () => {
  const { User, Car, executor } = setup();
  const car = Car.hydrate(row({ Id: 5, Model: 'Roadster', Year: 2008, UserId: 3 }));
  executor.queueRows([row({ Id: 3, Name: 'Ada', Email: null, Active: true })]);

  const owner = await car.load('user');
  assert.ok(owner instanceof User);
  assert.equal(owner.id, 3);
  assert.equal(await car.load('user'), owner);
  assert.equal(car.isDirty, false);

  assert.deepEqual(executor.queries, [
    {
      method: 'rows',
      sql: 'SELECT *\nFROM "Users"\nWHERE "Id" IN ($1)\nORDER BY "Id"',
      params: [3],
    },
  ]);
});

test('the foreign side of a one-to-one loads through the key on the other table', async () => {
  const { User, executor } = setup();
  const user = User.hydrate(row({ Id: 1, Name: 'Ada', Email: null, Active: true }));
  executor.queueRows([row({ Id: 2, Bio: 'Engineer', UserId: 1 })]);

  const profile = await user.load('profile');

  assert.equal(profile?.id, 2);
  assert.equal(profile?.getValue('user'), user);
  assert.deepEqual(executor.queries[0], {
    method: 'rows',
    sql: 'SELECT *\nFROM "Profiles"\nWHERE "UserId" IN ($1) AND "DeletedAt" IS NULL\nORDER BY "Id"',
    params: [1],
  });
});

test('a one-to-one that matches several rows is a cardinality error', async () => {
  const { User, executor } = setup();
  const user = User.hydrate(row({ Id: 1, Name: 'Ada', Email: null, Active: true }));
  executor.queueRows([
    row({ Id: 2, Bio: 'Engineer', UserId: 1 }),
    row({ Id: 3, Bio: 'Pilot', UserId: 1 }),
  ]);

  await assert.rejects(
    () => user.load('profile'),
    (error: unknown) =>
      error instanceof CardinalityError && error.expected === 'zero or one' && error.actual === 2
  );
});

test('unsaved entities and primitives are handled without a query', async () => {
  const { Car, executor } = setup();
  const car = new Car({ model: 'Roadster' });

  assert.deepEqual(await car.load('garages'), []);
  await assert.rejects(
    () => car.load('model'),
    (error: unknown) =>
      error instanceof ValidationError && error.message === "'model' is not a relation of Car"
  );
  assert.deepEqual(executor.queries, []);
});

test('one query serves every entity in a batch', async () => {
  const { Car, executor } = setup();
  const [roadster, beetle] = Car.hydrateAll([
    row({ Id: 5, Model: 'Roadster', Year: 2008, UserId: 3 }),
    row({ Id: 6, Model: 'Beetle', Year: 1970, UserId: 3 }),
  ]);
  assert.ok(roadster && beetle);
  executor.queueRows([row({ Id: 3, Name: 'Ada', Email: null, Active: true })]);

  await loadRelationBatch(Car, [roadster, beetle], 'user');

  assert.equal(roadster.user, beetle.user);
  assert.equal(roadster.user?.id, 3);
  assert.equal(executor.queries.length, 1);
});
