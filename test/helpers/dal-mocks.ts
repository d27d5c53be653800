import DataAccessLayer, { type DataAccessLayerConfig } from '../../src/lib/data-access-layer.js';
import type { QueryExecutor, QueryParameters, RowRecord } from '../../src/lib/model-types.js';
import types from '../../src/lib/type.js';

export type ExecutorMethod = 'rows' | 'scalar' | 'execute' | 'stream';

export interface RecordedQuery {
  method: ExecutorMethod;
  sql: string;
  params: unknown[];
}

interface Failure {
  pattern: RegExp;
  error: Error;
}

/**
 * In-process executor that records every statement and answers from
 * scripted queues. INSERTs without a scripted scalar get increasing ids.
 */
export class MockExecutor implements QueryExecutor {
  readonly queries: RecordedQuery[] = [];
  private readonly rowSets: RowRecord[][] = [];
  private readonly scalars: unknown[] = [];
  private readonly counts: number[] = [];
  private readonly failures: Failure[] = [];
  private lastId: number;

  constructor(firstId = 1) {
    this.lastId = firstId - 1;
  }

  queueRows(...sets: RowRecord[][]): this {
    this.rowSets.push(...sets);
    return this;
  }

  queueScalar(...values: unknown[]): this {
    this.scalars.push(...values);
    return this;
  }

  queueCount(...counts: number[]): this {
    this.counts.push(...counts);
    return this;
  }

  failOn(pattern: RegExp, error: Error): this {
    this.failures.push({ pattern, error });
    return this;
  }

  get statements(): string[] {
    return this.queries.map(query => query.sql);
  }

  reset(): void {
    this.queries.length = 0;
    this.rowSets.length = 0;
    this.scalars.length = 0;
    this.counts.length = 0;
    this.failures.length = 0;
  }

  private record(method: ExecutorMethod, sql: string, params: QueryParameters): void {
    this.queries.push({ method, sql, params: [...params] });
    const failure = this.failures.find(candidate => candidate.pattern.test(sql));
    if (failure) {
      throw failure.error;
    }
  }

  async rows(sql: string, params: QueryParameters = []): Promise<RowRecord[]> {
    this.record('rows', sql, params);
    return this.rowSets.shift() ?? [];
  }

  async scalar(sql: string, params: QueryParameters = []): Promise<unknown> {
    this.record('scalar', sql, params);
    if (this.scalars.length > 0) {
      return this.scalars.shift();
    }
    if (sql.startsWith('INSERT')) {
      this.lastId += 1;
      return this.lastId;
    }
    return null;
  }

  async execute(sql: string, params: QueryParameters = []): Promise<number> {
    this.record('execute', sql, params);
    return this.counts.shift() ?? 1;
  }

  async *stream(sql: string, params: QueryParameters = []): AsyncGenerator<RowRecord, void, undefined> {
    this.record('stream', sql, params);
    for (const row of this.rowSets.shift() ?? []) {
      yield row;
    }
  }
}

export interface TestDAL {
  dal: DataAccessLayer;
  executor: MockExecutor;
}

/**
 * A DAL wired to a fresh MockExecutor, with unqualified table names.
 */
export const createTestDAL = (config: DataAccessLayerConfig = {}): TestDAL => {
  const executor = new MockExecutor();
  const dal = new DataAccessLayer({ schema: null, env: {}, executor, ...config });
  return { dal, executor };
};

/**
 * Users own many cars; cars and garages are linked many-to-many; each user
 * has at most one profile.
 */
export const defineGarageModels = (dal: DataAccessLayer) => {
  const User = dal.defineModel({
    name: 'User',
    schema: {
      name: types.string().required(),
      email: types.string().email(),
      active: types.boolean().default(true),
      cars: types.collection('Car'),
      profile: types.reference('Profile'),
    },
  });

  const Car = dal.defineModel({
    name: 'Car',
    schema: {
      model: types.string().required(),
      year: types.number().integer(),
      user: types.reference('User'),
      garages: types.collection('Garage'),
    },
  });

  const Garage = dal.defineModel({
    name: 'Garage',
    schema: {
      address: types.string(),
      cars: types.collection('Car'),
    },
  });

  const Profile = dal.defineModel({
    name: 'Profile',
    schema: {
      bio: types.string(),
      user: types.reference('User'),
    },
  });

  return { User, Car, Garage, Profile };
};

export const timestamp = new Date('2024-03-01T12:00:00.000Z');

/**
 * A row as the driver would return it, with system columns filled in.
 */
export const row = (values: RowRecord): RowRecord => ({
  CreatedAt: timestamp,
  ModifiedAt: timestamp,
  DeletedAt: null,
  ...values,
});
