import type DataAccessLayer from '../../src/lib/data-access-layer.js';
import type { InferData, InferInstance } from '../../src/lib/model-definition.js';
import type Model from '../../src/lib/model.js';
import types from '../../src/lib/type.js';
import type { Equal, Expect, IsAssignable, Not } from './type-helpers.js';

const carSchema = {
  model: types.string().required(),
  year: types.number().integer(),
  user: types.reference('User'),
  garages: types.collection('Garage'),
};

type CarData = InferData<typeof carSchema>;
type CarInstance = InferInstance<typeof carSchema>;

export type DataAssertions = [
  Expect<Equal<CarData['model'], string>>,
  Expect<Equal<CarData['year'], number | null | undefined>>,
  Expect<Equal<CarData['user'], Model | null | undefined>>,
  Expect<Equal<CarData['garages'], Model[] | undefined>>,
];

export type InstanceAssertions = [
  Expect<IsAssignable<CarInstance, Model>>,
  Expect<Equal<CarInstance['id'], number>>,
  Expect<Equal<CarInstance['deletedAt'], Date | null>>,
  Expect<Not<IsAssignable<CarInstance['model'], number>>>,
];

declare const dal: DataAccessLayer;
const Car = dal.defineModel({ name: 'Car', schema: carSchema });

export const construct = (): CarInstance => new Car({ model: 'Roadster' });

export const findOne = async (): Promise<CarInstance | null> => Car.find(1);

export const awaitedQuery = async (): Promise<string[]> => {
  const cars = await Car.where('c => c.year > {0}', 2000).orderBy('year');
  return cars.map(car => car.model);
};
