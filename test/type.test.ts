import assert from 'node:assert/strict';
import test from 'node:test';

import { TypeCoercionError, ValidationError } from '../src/lib/errors.js';
import types from '../src/lib/type.js';
import { createTestDAL } from './helpers/dal-mocks.js';

const rejectsWith = (message: string) => (error: unknown) =>
  error instanceof ValidationError && error.message === message;

test('string fields enforce length, enum and email rules', () => {
  const name = types.string().min(2).max(5);
  assert.equal(name.validate('Ada', 'name'), 'Ada');
  assert.throws(() => name.validate('A', 'name'), rejectsWith('name must be longer than 2 characters'));
  assert.throws(
    () => name.validate('Adelaide', 'name'),
    rejectsWith('name must be shorter than 5 characters')
  );

  const color = types.string().enum(['red', 'blue']);
  assert.throws(() => color.validate('green', 'color'), rejectsWith('color must be one of: red, blue'));

  const email = types.string().email();
  assert.equal(email.validate('ada@example.com', 'email'), 'ada@example.com');
  assert.throws(() => email.validate('not-an-email', 'email'), ValidationError);
});

test('required fields reject null while optional ones pass it through', () => {
  assert.throws(() => types.string().required().validate(null, 'name'), rejectsWith('name is required'));
  assert.equal(types.string().validate(null, 'name'), null);
});

test('number fields check integer and range constraints', () => {
  const year = types.number().integer().min(1900).max(2100);
  assert.equal(year.validate(1999, 'year'), 1999);
  assert.throws(() => year.validate(1999.5, 'year'), rejectsWith('year must be an integer'));
  assert.throws(
    () => year.validate(1800, 'year'),
    rejectsWith('year must be greater than or equal to 1900')
  );
  assert.throws(() => year.validate('1999', 'year'), rejectsWith('year must be a finite number'));
});

test('custom validators run on the normalized value', () => {
  const even = types.number().validator(value => value % 2 === 0);
  assert.equal(even.validate(4, 'count'), 4);
  assert.throws(() => even.validate(3, 'count'), rejectsWith('Validation failed for count'));
});

test('defaults may be values or factories', () => {
  assert.equal(types.boolean().default(true).getDefault(), true);

  let calls = 0;
  const tags = types.array(types.string()).default(() => {
    calls += 1;
    return [];
  });
  const first = tags.getDefault();
  const second = tags.getDefault();
  assert.deepEqual(first, []);
  assert.notEqual(first, second);
  assert.equal(calls, 2);
});

test('date fields accept ISO strings and reject invalid dates', () => {
  const date = types.date();
  const parsed = date.validate('2024-03-01T12:00:00.000Z', 'seenAt');
  assert.ok(parsed instanceof Date);
  assert.equal(parsed.toISOString(), '2024-03-01T12:00:00.000Z');
  assert.throws(() => date.validate('yesterday', 'seenAt'), rejectsWith('seenAt must be a valid date'));
});

test('coerce converts driver values', () => {
  assert.equal(types.number().coerce('42.5', 'Car.price'), 42.5);
  assert.equal(types.number().coerce(BigInt(7), 'Car.doors'), 7);
  assert.equal(types.boolean().coerce('t', 'User.active'), true);
  assert.equal(types.boolean().coerce(0, 'User.active'), false);
  assert.equal(types.string().coerce(12, 'Car.model'), '12');
  assert.deepEqual(types.object().coerce('{"a":1}', 'User.settings'), { a: 1 });
  assert.deepEqual(types.array(types.number()).coerce(['1', 2], 'Car.ratings'), [1, 2]);
  assert.equal(types.date().coerce(null, 'User.deletedAt'), null);
});

test('coerce raises TypeCoercionError for values it cannot convert', () => {
  assert.throws(
    () => types.number().coerce('abc', 'Car.year'),
    (error: unknown) =>
      error instanceof TypeCoercionError &&
      error.field === 'Car.year' &&
      error.value === 'abc' &&
      error.message === 'Cannot convert string value for Car.year to number'
  );
  assert.throws(() => types.boolean().coerce('maybe', 'User.active'), TypeCoercionError);
  assert.throws(() => types.object().coerce('{broken', 'User.settings'), TypeCoercionError);
});

test('column() overrides the derived column name', () => {
  assert.equal(types.string().column('user_name').columnName, 'user_name');
  assert.throws(() => types.string().column(''), ValidationError);
});

test('relation fields accept entities only', () => {
  const { dal } = createTestDAL();
  const Garage = dal.defineModel({ name: 'Garage', schema: { address: types.string() } });
  const garage = new Garage({ address: '1 Main St' });

  const reference = types.reference('Garage');
  assert.equal(reference.validate(garage, 'garage'), garage);
  assert.equal(reference.validate(undefined, 'garage'), null);
  assert.throws(
    () => reference.validate({ address: '1 Main St' }, 'garage'),
    rejectsWith('garage must be a Garage entity')
  );

  const collection = types.collection('Garage');
  assert.deepEqual(collection.validate([garage], 'garages'), [garage]);
  assert.throws(
    () => collection.validate([garage, 'x'], 'garages'),
    rejectsWith('garages must be an array of Garage entities')
  );
});
