import assert from 'node:assert/strict';
import test from 'node:test';

import { TypeCoercionError } from '../src/lib/errors.js';
import HydrationScope from '../src/lib/hydration-scope.js';
import { hydrateRow, hydrateRows, toIdentity } from '../src/lib/hydrator.js';
import { createTestDAL, defineGarageModels, row, timestamp } from './helpers/dal-mocks.js';

const setup = () => {
  const { dal } = createTestDAL();
  return defineGarageModels(dal);
};

test('toIdentity reads numbers, numeric strings and bigints', () => {
  assert.equal(toIdentity(7, 'Car.id'), 7);
  assert.equal(toIdentity('12', 'Car.id'), 12);
  assert.equal(toIdentity(BigInt(3), 'Car.id'), 3);
  assert.equal(toIdentity(0, 'Car.id'), null);
  assert.equal(toIdentity(null, 'Car.id'), null);
  assert.equal(toIdentity(undefined, 'Car.id'), null);
  assert.throws(() => toIdentity('seven', 'Car.id'), TypeCoercionError);
  assert.throws(() => toIdentity(1.5, 'Car.id'), TypeCoercionError);
});

test('a hydrated entity carries coerced row values and is clean', () => {
  const { Car } = setup();
  const car = hydrateRow(
    Car,
    row({ Id: '5', Model: 'Roadster', Year: '2008', UserId: null }),
    new HydrationScope()
  );

  assert.equal(car.id, 5);
  assert.equal(car.year, 2008);
  assert.equal(car.model, 'Roadster');
  assert.deepEqual(car.createdAt, timestamp);
  assert.equal(car.isDirty, false);
  assert.equal(car.isNew, false);
});

test('unloaded relations stay undefined and a null key loads null', () => {
  const { Car } = setup();
  const car = Car.hydrate(row({ Id: 5, Model: 'Roadster', Year: 2008, UserId: null }));

  assert.equal(car.user, null);
  assert.equal(car._loaded.has('user'), true);
  assert.equal(car.garages, undefined);
  assert.equal(car._loaded.has('garages'), false);
  assert.deepEqual(car._foreignKeys, { UserId: null });
});

test('a foreign key whose target is not in the scope is recorded but not loaded', () => {
  const { Car } = setup();
  const car = Car.hydrate(row({ Id: 5, Model: 'Roadster', Year: 2008, UserId: 3 }));

  assert.equal(car.user, undefined);
  assert.equal(car._loaded.has('user'), false);
  assert.equal(car._foreignKeys.UserId, 3);
});

test('one scope yields one instance per id', () => {
  const { User, Car } = setup();
  const scope = new HydrationScope();
  const [owner, again] = hydrateRows(
    User,
    [
      row({ Id: 1, Name: 'Ada', Email: null, Active: true }),
      row({ Id: 1, Name: 'Ada', Email: null, Active: true }),
    ],
    scope
  );
  const cars = Car.hydrateAll(
    [
      row({ Id: 5, Model: 'Roadster', Year: 2008, UserId: 1 }),
      row({ Id: 6, Model: 'Beetle', Year: 1970, UserId: 1 }),
    ],
    scope
  );

  assert.equal(owner, again);
  assert.equal(cars.length, 2);
  for (const car of cars) {
    assert.equal(car.user, owner);
    assert.equal(car._scope, scope);
  }
  assert.equal(scope.find('Car', 6), cars[1]);
});

test('an unconvertible column raises TypeCoercionError naming the property', () => {
  const { Car } = setup();
  assert.throws(
    () => Car.hydrate(row({ Id: 5, Model: 'Roadster', Year: 'new', UserId: null })),
    (error: unknown) => error instanceof TypeCoercionError && error.field === 'Car.year'
  );
});
