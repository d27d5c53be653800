import assert from 'node:assert/strict';
import test from 'node:test';

import {
  DiscoveryAmbiguityError,
  DiscoveryError,
  UnknownModelError,
} from '../src/lib/errors.js';
import { describeModel, type ModelSchema } from '../src/lib/model-definition.js';
import type { Relation } from '../src/lib/model-types.js';
import RelationshipDiscoverer, { RelationIndex } from '../src/lib/relationship-discoverer.js';
import types from '../src/lib/type.js';

const model = (name: string, schema: ModelSchema) => describeModel({ name, schema });

const summary = (relation: Relation) =>
  `${relation.localType}.${relation.localProperty ?? '-'} ${relation.relationType} ` +
  `${relation.foreignType}.${relation.foreignProperty ?? '-'}`;

test('a reference paired with a collection is many-to-one and one-to-many', () => {
  const relations = new RelationshipDiscoverer().discover([
    model('User', { name: types.string(), cars: types.collection('Car') }),
    model('Car', { model: types.string(), user: types.reference('User') }),
  ]);

  assert.deepEqual(relations.map(summary), [
    'Car.user ManyToOne User.cars',
    'User.cars OneToMany Car.user',
  ]);

  const [carSide, userSide] = relations;
  assert.equal(carSide?.foreignKeyTableName, 'Cars');
  assert.equal(carSide?.foreignKeyColumnName, 'UserId');
  assert.equal(carSide?.ownsForeignKey, true);
  assert.equal(carSide?.localTableName, 'Cars');
  assert.equal(carSide?.foreignTableNameSingular, 'User');
  assert.equal(userSide?.foreignKeyTableName, 'Cars');
  assert.equal(userSide?.foreignKeyColumnName, 'UserId');
  assert.equal(userSide?.ownsForeignKey, false);
  assert.equal(userSide?.pivotTableName, null);
});

test('two collections form a many-to-many relation through a pivot table', () => {
  const relations = new RelationshipDiscoverer().discover([
    model('Garage', { cars: types.collection('Car') }),
    model('Car', { garages: types.collection('Garage') }),
  ]);

  assert.deepEqual(relations.map(summary), [
    'Car.garages ManyToMany Garage.cars',
    'Garage.cars ManyToMany Car.garages',
  ]);
  for (const relation of relations) {
    assert.equal(relation.pivotTableName, 'CarsToGarages');
    assert.equal(relation.pivotTableFirstColumnName, 'CarId');
    assert.equal(relation.pivotTableSecondColumnName, 'GarageId');
    assert.equal(relation.foreignKeyColumnName, null);
  }
  assert.equal(relations[0]?.pivotLocalColumnName, 'CarId');
  assert.equal(relations[0]?.pivotForeignColumnName, 'GarageId');
  assert.equal(relations[1]?.pivotLocalColumnName, 'GarageId');
});

test('one-to-one keys live on the table of the type that sorts first', () => {
  const relations = new RelationshipDiscoverer().discover([
    model('User', { profile: types.reference('Profile') }),
    model('Profile', { user: types.reference('User') }),
  ]);

  assert.deepEqual(relations.map(summary), [
    'Profile.user OneToOne User.profile',
    'User.profile OneToOne Profile.user',
  ]);
  assert.equal(relations[0]?.foreignKeyTableName, 'Profiles');
  assert.equal(relations[0]?.foreignKeyColumnName, 'UserId');
  assert.equal(relations[0]?.ownsForeignKey, true);
  assert.equal(relations[1]?.ownsForeignKey, false);
});

test('link identifiers pair several relations between the same types', () => {
  const relations = new RelationshipDiscoverer().discover([
    model('User', { carsOld: types.collection('Car'), newCars: types.collection('Car') }),
    model('Car', { userOld: types.reference('User'), newUser: types.reference('User') }),
  ]);

  assert.deepEqual(relations.map(summary), [
    'Car.userOld ManyToOne User.carsOld',
    'Car.newUser ManyToOne User.newCars',
    'User.carsOld OneToMany Car.userOld',
    'User.newCars OneToMany Car.newUser',
  ]);
  assert.deepEqual(
    relations.map(relation => [relation.linkIdentifier, relation.foreignKeyColumnName]),
    [
      ['Old', 'UserOldId'],
      ['New', 'UserNewId'],
      ['Old', 'UserOldId'],
      ['New', 'UserNewId'],
    ]
  );
});

test('a link identifier is woven into the pivot table name', () => {
  const relations = new RelationshipDiscoverer().discover([
    model('Car', {
      garagesWinter: types.collection('Garage'),
      summerGarages: types.collection('Garage'),
    }),
    model('Garage', { carsWinter: types.collection('Car'), summerCars: types.collection('Car') }),
  ]);

  assert.deepEqual(
    relations.map(relation => relation.pivotTableName),
    ['CarsWinterGarages', 'CarsSummerGarages', 'CarsWinterGarages', 'CarsSummerGarages']
  );
});

test('a reference without an inverse is a lazy many-to-one with a mirror', () => {
  const relations = new RelationshipDiscoverer().discover([
    model('Car', { maker: types.reference('Maker') }),
    model('Maker', { name: types.string() }),
  ]);

  assert.deepEqual(relations.map(summary), [
    'Car.maker ManyToOne Maker.-',
    'Maker.- OneToMany Car.maker',
  ]);
  assert.equal(relations[0]?.foreignKeyColumnName, 'MakerId');
  assert.equal(relations[1]?.foreignKeyTableName, 'Cars');
  assert.equal(relations[1]?.ownsForeignKey, false);
});

test('a collection without an inverse keeps its key on the target table', () => {
  const relations = new RelationshipDiscoverer().discover([
    model('Garage', { cars: types.collection('Car') }),
    model('Car', { model: types.string() }),
  ]);

  assert.deepEqual(relations.map(summary), [
    'Garage.cars OneToMany Car.-',
    'Car.- ManyToOne Garage.cars',
  ]);
  assert.equal(relations[0]?.foreignKeyTableName, 'Cars');
  assert.equal(relations[0]?.foreignKeyColumnName, 'GarageId');
  assert.equal(relations[1]?.ownsForeignKey, true);
});

test('several lazy references to one type take their link from the property name', () => {
  const relations = new RelationshipDiscoverer().discover([
    model('Post', { author: types.reference('User'), editor: types.reference('User') }),
    model('User', { name: types.string() }),
  ]);

  assert.deepEqual(relations.map(summary), [
    'Post.author ManyToOne User.-',
    'User.- OneToMany Post.author',
    'Post.editor ManyToOne User.-',
    'User.- OneToMany Post.editor',
  ]);
  assert.deepEqual(
    relations.map(relation => [relation.linkIdentifier, relation.foreignKeyColumnName]),
    [
      ['Author', 'UserAuthorId'],
      ['Author', 'UserAuthorId'],
      ['Editor', 'UserEditorId'],
      ['Editor', 'UserEditorId'],
    ]
  );
  assert.equal(relations[0]?.foreignKeyTableName, 'Posts');
});

test('several lazy collections of one type get a key column each', () => {
  const relations = new RelationshipDiscoverer().discover([
    model('Author', { books: types.collection('Book'), drafts: types.collection('Book') }),
    model('Book', { title: types.string() }),
  ]);

  assert.deepEqual(relations.map(summary), [
    'Author.books OneToMany Book.-',
    'Book.- ManyToOne Author.books',
    'Author.drafts OneToMany Book.-',
    'Book.- ManyToOne Author.drafts',
  ]);
  assert.equal(relations[0]?.linkIdentifier, null);
  assert.equal(relations[0]?.foreignKeyColumnName, 'AuthorId');
  assert.equal(relations[2]?.linkIdentifier, 'Drafts');
  assert.equal(relations[2]?.foreignKeyColumnName, 'AuthorDraftsId');
  assert.equal(relations[2]?.foreignKeyTableName, 'Books');
});

test('lazy references that would share a key column fail discovery', () => {
  assert.throws(
    () =>
      new RelationshipDiscoverer().discover([
        model('Post', { author: types.reference('User'), authorUser: types.reference('User') }),
        model('User', { name: types.string() }),
      ]),
    (error: unknown) =>
      error instanceof DiscoveryAmbiguityError &&
      error.message === 'Post.author and Post.authorUser would share the key of their relation to User'
  );
});

test('a self-referencing one-to-one keeps its key with the first declared property', () => {
  const relations = new RelationshipDiscoverer().discover([
    model('Employee', {
      mentor: types.reference('Employee'),
      mentee: types.reference('Employee'),
    }),
  ]);

  assert.deepEqual(relations.map(summary), [
    'Employee.mentor OneToOne Employee.mentee',
    'Employee.mentee OneToOne Employee.mentor',
  ]);
  assert.equal(relations[0]?.ownsForeignKey, true);
  assert.equal(relations[0]?.foreignKeyColumnName, 'EmployeeId');
  assert.equal(relations[1]?.ownsForeignKey, false);
});

test('a self-referencing many-to-many is rejected', () => {
  assert.throws(
    () =>
      new RelationshipDiscoverer().discover([
        model('Member', {
          followers: types.collection('Member'),
          following: types.collection('Member'),
        }),
      ]),
    (error: unknown) => error instanceof DiscoveryError && !(error instanceof DiscoveryAmbiguityError)
  );
});

test('relations that cannot be told apart fail discovery', () => {
  assert.throws(
    () =>
      new RelationshipDiscoverer().discover([
        model('User', { cars: types.collection('Car') }),
        model('Car', { user: types.reference('User'), owner: types.reference('User') }),
      ]),
    DiscoveryAmbiguityError
  );
});

test('a relation to an unregistered type fails with UnknownModelError', () => {
  assert.throws(
    () => new RelationshipDiscoverer().discover([model('Car', { maker: types.reference('Maker') })]),
    (error: unknown) => error instanceof UnknownModelError && error.modelName === 'Maker'
  );
});

test('discovery is repeatable and independent of input order', () => {
  const models = [
    model('User', { cars: types.collection('Car'), profile: types.reference('Profile') }),
    model('Car', { user: types.reference('User'), garages: types.collection('Garage') }),
    model('Garage', { cars: types.collection('Car') }),
    model('Profile', { user: types.reference('User') }),
  ];
  const discoverer = new RelationshipDiscoverer();
  const first = discoverer.discover(models);
  const second = discoverer.discover([...models].reverse());

  assert.equal(first.length, 6);
  assert.deepEqual(second, first);
});

test('RelationIndex looks relations up by type and property', () => {
  const relations = new RelationshipDiscoverer().discover([
    model('User', { cars: types.collection('Car') }),
    model('Car', { user: types.reference('User') }),
  ]);
  const index = new RelationIndex(relations);

  assert.equal(index.relationsOf('User').length, 1);
  assert.equal(index.relationFor('Car', 'user')?.relationType, 'ManyToOne');
  assert.equal(index.relationFor('Car', 'garages'), null);
  assert.deepEqual(index.relationsOf('Boat'), []);
});

test('explicit table names override pluralization', () => {
  const discoverer = new RelationshipDiscoverer();
  assert.deepEqual(discoverer.tableNames({ name: 'Person', tableName: null }), {
    table: 'People',
    singular: 'Person',
  });
  assert.deepEqual(discoverer.tableNames({ name: 'Car', tableName: 'Vehicles' }), {
    table: 'Vehicles',
    singular: 'Vehicle',
  });
});
