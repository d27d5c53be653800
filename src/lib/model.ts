import { DALError, ValidationError } from './errors.js';
import HydrationScope from './hydration-scope.js';
import { hydrateRow, hydrateRows } from './hydrator.js';
import type { ModelDefinition, ModelDescriptor, ModelSchema, DefinedModel } from './model-definition.js';
import { describeModel } from './model-definition.js';
import type {
  DeleteOptions,
  ExecutorOptions,
  FindOptions,
  JsonObject,
  ModelClass,
  ModelContext,
  QueryExecutor,
  RowRecord,
  SaveOptions,
} from './model-types.js';
import { deleteEntity, saveEntity } from './persistence.js';
import QueryBuilder, { type RawFragment } from './query-builder.js';
import { loadRelation } from './relation-loader.js';
import { buildFromRecord, serializeEntity } from './serialization.js';
import { sameMembers, trackCollection } from './tracked-collection.js';
import { ENTITY_BRAND } from './type-classifier.js';

/**
 * Deep equality comparison for detecting actual changes in primitive values
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;

  if (a == null || b == null || typeof a !== typeof b) return false;

  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      if (!deepEqual(a[i], b[i])) return false;
    }
    return true;
  }

  if (typeof a === 'object' && typeof b === 'object' && !Array.isArray(a) && !Array.isArray(b)) {
    const recordA: Record<string, unknown> = { ...a };
    const recordB: Record<string, unknown> = { ...b };
    const keysA = Object.keys(recordA);
    const keysB = Object.keys(recordB);

    if (keysA.length !== keysB.length) return false;

    for (const key of keysA) {
      if (!keysB.includes(key) || !deepEqual(recordA[key], recordB[key])) {
        return false;
      }
    }
    return true;
  }

  return false;
}

/**
 * Deep clone for snapshotting json and array values
 */
export function deepClone(value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (value instanceof Date) return new Date(value.getTime());
  if (Array.isArray(value)) {
    const items: unknown[] = value;
    return items.map(item => deepClone(item));
  }
  if (typeof value === 'object') {
    const cloned: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      cloned[key] = deepClone(item);
    }
    return cloned;
  }
  return value;
}

const NOT_ATTACHED = 'MODEL_NOT_ATTACHED';

/**
 * Base entity class. Generated model classes extend it and expose their
 * schema properties as accessors over `_data`.
 */
export class Model {
  static modelName = 'Model';
  static tableName = '';
  static descriptor: ModelDescriptor = describeModel({ name: 'Model', schema: {} });
  static context: ModelContext | null = null;

  readonly [ENTITY_BRAND] = true;

  public _data: Record<string, unknown>;
  /** Snapshot taken at construction, hydration and after each save. */
  public _original: Record<string, unknown>;
  public _changed: Set<string>;
  /** Relation properties whose value reflects the database or a caller assignment. */
  public _loaded: Set<string>;
  /** Owned foreign key columns as last read from or written to the row. */
  public _foreignKeys: Record<string, number | null>;
  public _scope: HydrationScope;

  constructor(data: JsonObject = {}) {
    this._data = {};
    this._original = {};
    this._changed = new Set();
    this._loaded = new Set();
    this._foreignKeys = {};
    this._scope = new HydrationScope();

    const { descriptor } = this.modelClass;
    const now = new Date();

    for (const property of descriptor.properties) {
      if (property.kind === 'collection') {
        this._data[property.name] = this._track(property.name, []);
        this._loaded.add(property.name);
      } else if (property.kind === 'reference') {
        this._data[property.name] = null;
        this._loaded.add(property.name);
      } else if (property.system) {
        this._data[property.name] =
          property.name === 'id' ? 0 : property.name === 'deletedAt' ? null : now;
      } else {
        const defaultValue = property.field.getDefault();
        this._data[property.name] = defaultValue === undefined ? null : defaultValue;
      }
    }

    this._snapshot();

    for (const [key, value] of Object.entries(data)) {
      this.setValue(key, value);
    }
  }

  static requireContext(this: ModelClass): ModelContext {
    if (!this.context) {
      throw new DALError(`Model '${this.modelName}' is not attached to a data access layer`, NOT_ATTACHED);
    }
    return this.context;
  }

  static executorFor(this: ModelClass, options: ExecutorOptions = {}): QueryExecutor {
    return options.executor ?? this.requireContext().executor;
  }

  get modelClass(): ModelClass {
    return this.constructor as ModelClass;
  }

  get id(): number {
    const id = this._data.id;
    return typeof id === 'number' ? id : 0;
  }

  get createdAt(): Date | null {
    const value = this._data.createdAt;
    return value instanceof Date ? value : null;
  }

  get modifiedAt(): Date | null {
    const value = this._data.modifiedAt;
    return value instanceof Date ? value : null;
  }

  get deletedAt(): Date | null {
    const value = this._data.deletedAt;
    return value instanceof Date ? value : null;
  }

  set deletedAt(value: Date | null) {
    this.setValue('deletedAt', value);
  }

  get isNew(): boolean {
    return this.id === 0;
  }

  get isDirty(): boolean {
    return this._changed.size > 0;
  }

  get modifiedProps(): ReadonlySet<string> {
    return this._changed;
  }

  get originalPropertyBag(): Readonly<Record<string, unknown>> {
    return this._original;
  }

  getValue(name: string): unknown {
    if (!this.modelClass.descriptor.byName.has(name)) {
      throw new ValidationError(`Unknown property '${name}' on ${this.modelClass.modelName}`, name);
    }
    return this._data[name];
  }

  /**
   * Assign a property and update dirty tracking. Relation values are checked
   * immediately; primitive values are validated on save.
   */
  setValue(name: string, value: unknown): void {
    const property = this.modelClass.descriptor.byName.get(name);
    if (!property) {
      throw new ValidationError(`Unknown property '${name}' on ${this.modelClass.modelName}`, name);
    }
    if (property.kind === 'primitive' && property.name === 'id') {
      throw new ValidationError('id is assigned by the database', name);
    }

    if (property.kind === 'collection') {
      this._data[name] = this._track(name, property.field.validate(value, name));
      this._loaded.add(name);
    } else if (property.kind === 'reference') {
      this._data[name] = property.field.validate(value, name);
      this._loaded.add(name);
    } else {
      this._data[name] = value;
    }

    this._refreshDirty(name);
  }

  /**
   * Store a value read from the database without marking it dirty.
   */
  _setLoaded(name: string, value: unknown): void {
    const property = this.modelClass.descriptor.byName.get(name);
    if (property?.kind === 'collection' && Array.isArray(value)) {
      const items: unknown[] = value;
      const entities = property.field.validate(items, name);
      this._data[name] = this._track(name, entities);
      this._original[name] = [...entities];
    } else {
      this._data[name] = value;
      this._original[name] = property?.kind === 'primitive' ? deepClone(value) : value;
    }
    this._loaded.add(name);
    this._changed.delete(name);
  }

  private _track(name: string, items: Model[]): Model[] {
    return trackCollection(items, () => this._refreshDirty(name));
  }

  _refreshDirty(name: string): void {
    const property = this.modelClass.descriptor.byName.get(name);
    if (!property) {
      return;
    }
    const current = this._data[name];
    const original = this._original[name];

    let same: boolean;
    if (property.kind === 'collection') {
      same = Array.isArray(current) && Array.isArray(original) && sameMembers(current, original);
    } else if (property.kind === 'reference') {
      same = current === original;
    } else {
      same = deepEqual(current, original);
    }

    if (same) {
      this._changed.delete(name);
    } else {
      this._changed.add(name);
    }
  }

  /**
   * Pick up in-place mutations of json and array values.
   */
  _detectInPlaceChanges(): void {
    for (const property of this.modelClass.descriptor.primitives) {
      const value = this._data[property.name];
      if (value !== null && typeof value === 'object') {
        this._refreshDirty(property.name);
      }
    }
  }

  _snapshot(): void {
    for (const property of this.modelClass.descriptor.properties) {
      const value = this._data[property.name];
      if (property.kind === 'primitive') {
        this._original[property.name] = deepClone(value);
      } else if (property.kind === 'collection') {
        this._original[property.name] = Array.isArray(value) ? [...value] : undefined;
      } else {
        this._original[property.name] = value;
      }
    }
    this._changed.clear();
  }

  async save(options: SaveOptions = {}): Promise<this> {
    await saveEntity(this, options);
    return this;
  }

  /**
   * Soft-delete by stamping `deletedAt`, or remove the row with `hard`.
   */
  async delete(options: DeleteOptions = {}): Promise<void> {
    if (this.isNew) {
      throw new DALError(
        `Cannot delete a ${this.modelClass.modelName} that has not been saved`,
        'NOT_PERSISTED'
      );
    }
    if (options.hard) {
      await deleteEntity(this, options);
      return;
    }
    this.deletedAt = new Date();
    await this.save(options);
  }

  async restore(options: SaveOptions = {}): Promise<this> {
    this.deletedAt = null;
    return this.save(options);
  }

  /**
   * Load a relation property once and keep it on the instance.
   */
  async load<This extends Model, K extends keyof This & string>(
    this: This,
    name: K,
    options: ExecutorOptions = {}
  ): Promise<This[K]> {
    await loadRelation(this, name, options);
    return this[name];
  }

  toRecord(): JsonObject {
    return serializeEntity(this, new Set());
  }

  /**
   * Primitive values keyed by column name.
   */
  toRow(): RowRecord {
    const row: RowRecord = {};
    for (const property of this.modelClass.descriptor.primitives) {
      row[property.column] = this._data[property.name];
    }
    return row;
  }

  static query<T extends Model>(this: ModelClass<T>): QueryBuilder<T> {
    return new QueryBuilder(this);
  }

  static where<T extends Model>(
    this: ModelClass<T>,
    predicate: string | RawFragment,
    ...params: unknown[]
  ): QueryBuilder<T> {
    return new QueryBuilder(this).where(predicate, ...params);
  }

  static filter<T extends Model>(this: ModelClass<T>, criteria: JsonObject): QueryBuilder<T> {
    return new QueryBuilder(this).filter(criteria);
  }

  static withTrashed<T extends Model>(this: ModelClass<T>): QueryBuilder<T> {
    return new QueryBuilder(this).withTrashed();
  }

  static async find<T extends Model>(
    this: ModelClass<T>,
    id: number,
    options: FindOptions & ExecutorOptions = {}
  ): Promise<T | null> {
    if (!Number.isInteger(id) || id <= 0) {
      return null;
    }
    const query = new QueryBuilder(this, options).filter({ id });
    return (options.withTrashed ? query.withTrashed() : query).firstOrDefault();
  }

  static async exists<T extends Model>(
    this: ModelClass<T>,
    id: number,
    options: ExecutorOptions = {}
  ): Promise<boolean> {
    if (!Number.isInteger(id) || id <= 0) {
      return false;
    }
    return new QueryBuilder(this, options).filter({ id }).any();
  }

  static async create<T extends Model>(
    this: ModelClass<T>,
    data: JsonObject = {},
    options: SaveOptions = {}
  ): Promise<T> {
    const entity = new this(data);
    await entity.save(options);
    return entity;
  }

  /**
   * Equality criteria from the non-null primitive values in `data`.
   */
  protected static matchCriteria(this: ModelClass, data: JsonObject): JsonObject {
    const criteria: JsonObject = {};
    for (const [key, value] of Object.entries(data)) {
      const property = this.descriptor.byName.get(key);
      if (property?.kind === 'primitive' && !property.system && value !== null && value !== undefined) {
        criteria[key] = value;
      }
    }
    return criteria;
  }

  static async firstOrNew<T extends Model>(
    this: ModelClass<T>,
    data: JsonObject,
    options: ExecutorOptions = {}
  ): Promise<T> {
    const existing = await new QueryBuilder(this, options)
      .filter(this.matchCriteria(data))
      .firstOrDefault();
    return existing ?? new this(data);
  }

  static async firstOrCreate<T extends Model>(
    this: ModelClass<T>,
    data: JsonObject,
    options: SaveOptions = {}
  ): Promise<T> {
    const entity = await this.firstOrNew(data, options);
    if (entity.isNew) {
      await entity.save(options);
    }
    return entity;
  }

  /**
   * Delete rows by id. Returns the number of affected rows.
   */
  static async destroy<T extends Model>(
    this: ModelClass<T>,
    ids: number | readonly number[],
    options: DeleteOptions = {}
  ): Promise<number> {
    const list = typeof ids === 'number' ? [ids] : [...ids];
    if (list.length === 0) {
      return 0;
    }
    return new QueryBuilder(this, options).whereIn('id', list).deleteAll(options);
  }

  static hydrate<T extends Model>(
    this: ModelClass<T>,
    row: RowRecord,
    scope: HydrationScope = new HydrationScope()
  ): T {
    return hydrateRow(this, row, scope);
  }

  static hydrateAll<T extends Model>(
    this: ModelClass<T>,
    rows: readonly RowRecord[],
    scope: HydrationScope = new HydrationScope()
  ): T[] {
    return hydrateRows(this, rows, scope);
  }

  static fromRecord<T extends Model>(this: ModelClass<T>, record: JsonObject): T {
    return buildFromRecord(this, record, new HydrationScope());
  }
}

const RESERVED_NAMES = new Set<string>([
  ...Object.getOwnPropertyNames(Model.prototype),
  '_data',
  '_original',
  '_changed',
  '_loaded',
  '_foreignKeys',
  '_scope',
]);

/**
 * Generate a model class for a definition and bind it to a context.
 */
export function defineModelClass<Schema extends ModelSchema>(
  context: ModelContext,
  definition: ModelDefinition<Schema>,
  tableName: string
): DefinedModel<Schema> {
  const descriptor = describeModel(definition);

  for (const property of descriptor.properties) {
    if (!(property.kind === 'primitive' && property.system) && RESERVED_NAMES.has(property.name)) {
      throw new ValidationError(
        `Property '${property.name}' on model '${descriptor.name}' clashes with a Model member`,
        property.name
      );
    }
  }

  class DefinedEntity extends Model {
    static override modelName = descriptor.name;
    static override tableName = tableName;
    static override descriptor = descriptor;
    static override context: ModelContext | null = context;
  }

  Object.defineProperty(DefinedEntity, 'name', { value: descriptor.name });

  for (const property of descriptor.properties) {
    if (property.kind === 'primitive' && property.system) {
      continue;
    }
    Object.defineProperty(DefinedEntity.prototype, property.name, {
      get(this: Model) {
        return this.getValue(property.name);
      },
      set(this: Model, value: unknown) {
        this.setValue(property.name, value);
      },
      enumerable: true,
      configurable: true,
    });
  }

  return DefinedEntity as unknown as DefinedModel<Schema>;
}

export default Model;
