import { CardinalityError, RecordNotFoundError, ValidationError } from './errors.js';
import HydrationScope from './hydration-scope.js';
import { hydrateRow, hydrateRows } from './hydrator.js';
import type { Model } from './model.js';
import type {
  DeleteOptions,
  ExecutorOptions,
  JsonObject,
  ModelClass,
  ModelContext,
  QueryExecutor,
} from './model-types.js';
import {
  compileAssignments,
  compilePredicate,
  type CompileMode,
  parseExpression,
} from './predicate-expression.js';
import { loadRelationBatch } from './relation-loader.js';
import SqlBuilder, { type SortDirection } from './sql-builder.js';
import { SqlId } from './sql-identifiers.js';
import { isEntity } from './type-classifier.js';

/**
 * A hand-written WHERE fragment, passed to `where()` instead of an
 * expression: `where(raw('"Name" ILIKE {0}', '%ada%'))`.
 */
export interface RawFragment {
  readonly format: string;
  readonly args: readonly unknown[];
}

export const raw = (format: string, ...args: unknown[]): RawFragment => ({ format, args });

interface Condition {
  format: string;
  args: unknown[];
}

type TrashScope = 'exclude' | 'include' | 'only';

const TOP_LEVEL_OR = /\bOR\b/i;

// AND binds tighter than OR, so a disjunction joined to other conditions
// needs its own parentheses.
const grouped = (format: string): string => (TOP_LEVEL_OR.test(format) ? `(${format})` : format);

function normalizeDirection(direction: string): SortDirection {
  const upper = direction.toUpperCase();
  if (upper !== 'ASC' && upper !== 'DESC') {
    throw new ValidationError(`Invalid sort direction '${direction}'`, 'direction');
  }
  return upper;
}

function requireCount(value: number, name: string): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(`${name} must be a non-negative integer, got ${value}`, name);
  }
  return value;
}

/**
 * Lazily evaluated query over one model type. Nothing runs until a terminal
 * (`run`, `first`, `count`, ...) is awaited, or the query itself is awaited.
 *
 * ```ts
 * const cars = await Car.where('c => c.model == {0}', 'Roadster').orderBy('year', 'DESC').take(10);
 * ```
 */
export class QueryBuilder<T extends Model> implements PromiseLike<T[]> {
  readonly modelClass: ModelClass<T>;
  private readonly executorOverride: QueryExecutor | undefined;
  private conditions: Condition[];
  private orderings: Condition[];
  private limitCount: number | null;
  private offsetCount: number | null;
  private trashScope: TrashScope;
  private includes: string[];

  constructor(modelClass: ModelClass<T>, options: ExecutorOptions = {}) {
    this.modelClass = modelClass;
    this.executorOverride = options.executor;
    this.conditions = [];
    this.orderings = [];
    this.limitCount = null;
    this.offsetCount = null;
    this.trashScope = 'exclude';
    this.includes = [];
  }

  private get context(): ModelContext {
    return this.modelClass.requireContext();
  }

  private get executor(): QueryExecutor {
    return this.executorOverride ?? this.context.executor;
  }

  /**
   * Column behind a property name: its own column for primitives, the
   * foreign key for a reference whose key lives on this table.
   */
  private columnFor(property: string): string | null {
    const descriptor = this.modelClass.descriptor.byName.get(property);
    if (!descriptor) {
      return null;
    }
    if (descriptor.kind === 'primitive') {
      return descriptor.column;
    }
    if (descriptor.kind === 'reference') {
      const relation = this.context.relationFor(this.modelClass.modelName, property);
      if (relation?.ownsForeignKey && relation.foreignKeyColumnName) {
        return relation.foreignKeyColumnName;
      }
    }
    return null;
  }

  private requireColumn(property: string): string {
    const column = this.columnFor(property);
    if (!column) {
      throw new ValidationError(
        `Unknown property '${property}' on ${this.modelClass.modelName}`,
        property
      );
    }
    return column;
  }

  clone(): QueryBuilder<T> {
    const copy = new QueryBuilder(this.modelClass, { executor: this.executorOverride });
    copy.conditions = [...this.conditions];
    copy.orderings = [...this.orderings];
    copy.limitCount = this.limitCount;
    copy.offsetCount = this.offsetCount;
    copy.trashScope = this.trashScope;
    copy.includes = [...this.includes];
    return copy;
  }

  private compile(source: string, params: readonly unknown[], mode: CompileMode): Condition {
    return compilePredicate(parseExpression(source), {
      resolveColumn: property => this.columnFor(property),
      params,
      mode,
    });
  }

  /**
   * Filter by a predicate expression (`u => u.age >= {0} && u.active`) or by
   * a raw fragment built with `raw()`.
   */
  where(predicate: string | RawFragment, ...params: unknown[]): this {
    if (typeof predicate === 'string') {
      this.conditions.push(this.compile(predicate, params, 'where'));
    } else {
      this.conditions.push({ format: predicate.format, args: [...predicate.args] });
    }
    return this;
  }

  /**
   * Same grammar as `where`, with `==` and `!=` meaning LIKE and NOT LIKE.
   */
  like(predicate: string, ...params: unknown[]): this {
    this.conditions.push(this.compile(predicate, params, 'like'));
    return this;
  }

  /**
   * Property equality. Null matches NULL and an array matches any element.
   */
  filter(criteria: JsonObject): this {
    for (const [property, value] of Object.entries(criteria)) {
      const column = new SqlId(this.requireColumn(property));
      const comparable = isEntity(value) ? value.id : value;
      if (comparable === null || comparable === undefined) {
        this.conditions.push({ format: '{0} IS NULL', args: [column] });
      } else if (Array.isArray(comparable)) {
        this.whereIn(property, comparable);
      } else {
        this.conditions.push({ format: '{0} = {1}', args: [column, comparable] });
      }
    }
    return this;
  }

  whereIn(property: string, values: readonly unknown[]): this {
    const column = new SqlId(this.requireColumn(property));
    if (values.length === 0) {
      this.conditions.push({ format: 'FALSE', args: [] });
    } else {
      this.conditions.push({ format: '{0} IN ({1})', args: [column, [...values]] });
    }
    return this;
  }

  orderBy(property: string, direction: SortDirection | 'asc' | 'desc' = 'ASC'): this {
    const column = new SqlId(this.requireColumn(property));
    this.orderings.push({ format: `{0} ${normalizeDirection(direction)}`, args: [column] });
    return this;
  }

  skip(count: number): this {
    this.offsetCount = requireCount(count, 'skip');
    return this;
  }

  take(count: number): this {
    this.limitCount = requireCount(count, 'take');
    return this;
  }

  withTrashed(): this {
    this.trashScope = 'include';
    return this;
  }

  onlyTrashed(): this {
    this.trashScope = 'only';
    return this;
  }

  /**
   * Batch-load relations for every result: one extra query per relation.
   */
  include(...relations: string[]): this {
    for (const name of relations) {
      const property = this.modelClass.descriptor.byName.get(name);
      if (!property || property.kind === 'primitive') {
        throw new ValidationError(`'${name}' is not a relation of ${this.modelClass.modelName}`, name);
      }
      if (!this.includes.includes(name)) {
        this.includes.push(name);
      }
    }
    return this;
  }

  private newBuilder(): SqlBuilder {
    return new SqlBuilder({ schema: this.context.schema, executor: this.executor });
  }

  private applyFilters(builder: SqlBuilder): void {
    if (this.trashScope === 'exclude') {
      builder.WHERE('DeletedAt', null);
    } else if (this.trashScope === 'only') {
      builder.WHERE('DeletedAt', 'IS NOT', null);
    }
    for (const { format, args } of this.conditions) {
      builder.WHERE(grouped(format), ...args);
    }
  }

  private applyPaging(builder: SqlBuilder): void {
    const paged = this.limitCount !== null || this.offsetCount !== null;
    if (this.orderings.length > 0) {
      for (const { format, args } of this.orderings) {
        builder.ORDER_BY(format, ...args);
      }
    } else if (paged) {
      builder.ORDER_BY('Id');
    }
    if (this.limitCount !== null) builder.LIMIT(this.limitCount);
    if (this.offsetCount !== null) builder.OFFSET(this.offsetCount);
  }

  /**
   * The defining SELECT, either of whole rows or of ids only.
   */
  toBuilder(columns: 'rows' | 'ids' = 'rows'): SqlBuilder {
    const builder = this.newBuilder();
    if (columns === 'ids') {
      builder.SELECT('{0}', new SqlId('Id'));
    } else {
      builder.SELECT('*');
    }
    builder.FROM(this.modelClass.tableName);
    this.applyFilters(builder);
    this.applyPaging(builder);
    return builder;
  }

  get sql(): string {
    return this.toBuilder().sql;
  }

  get parameters(): Record<string, unknown> {
    return this.toBuilder().parameters;
  }

  get hash(): string {
    return this.toBuilder().hash;
  }

  async run(): Promise<T[]> {
    const rows = await this.toBuilder().rows();
    const entities = hydrateRows(this.modelClass, rows, new HydrationScope());
    for (const name of this.includes) {
      await loadRelationBatch(this.modelClass, entities, name, { executor: this.executor });
    }
    return entities;
  }

  async toArray(): Promise<T[]> {
    return this.run();
  }

  then<TResult1 = T[], TResult2 = never>(
    onFulfilled?: ((value: T[]) => TResult1 | PromiseLike<TResult1>) | null,
    onRejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): Promise<TResult1 | TResult2> {
    return this.run().then(onFulfilled, onRejected);
  }

  catch<TResult = never>(
    onRejected?: ((reason: unknown) => TResult | PromiseLike<TResult>) | null
  ): Promise<T[] | TResult> {
    return this.run().catch(onRejected);
  }

  finally(onFinally?: (() => void) | null): Promise<T[]> {
    return this.run().finally(onFinally ?? undefined);
  }

  async firstOrDefault(): Promise<T | null> {
    const [first] = await this.clone().take(1).run();
    return first ?? null;
  }

  async first(): Promise<T> {
    const first = await this.firstOrDefault();
    if (!first) {
      throw new RecordNotFoundError(`No ${this.modelClass.modelName} matched the query`);
    }
    return first;
  }

  async singleOrDefault(): Promise<T | null> {
    const results = await this.clone().take(2).run();
    if (results.length > 1) {
      throw new CardinalityError(
        `Expected at most one ${this.modelClass.modelName}, found several`,
        'zero or one',
        results.length
      );
    }
    return results[0] ?? null;
  }

  async single(): Promise<T> {
    const results = await this.clone().take(2).run();
    const [only] = results;
    if (!only || results.length > 1) {
      throw new CardinalityError(
        `Expected exactly one ${this.modelClass.modelName}, found ${results.length === 0 ? 'none' : 'several'}`,
        'exactly one',
        results.length
      );
    }
    return only;
  }

  async count(): Promise<number> {
    const builder = this.newBuilder();
    if (this.limitCount !== null || this.offsetCount !== null) {
      builder.SELECT('COUNT(*)').FROM(this.toBuilder('ids'), 'subQuery');
    } else {
      builder.SELECT('COUNT(*)').FROM(this.modelClass.tableName);
      this.applyFilters(builder);
    }
    const value = await builder.scalar();
    return Number(value ?? 0);
  }

  async any(): Promise<boolean> {
    return (await this.count()) > 0;
  }

  async exists(): Promise<boolean> {
    return this.any();
  }

  /**
   * True when no row of the query fails the predicate. A predicate that
   * evaluates to NULL counts as failing.
   */
  async all(predicate: string, ...params: unknown[]): Promise<boolean> {
    const { format, args } = this.compile(predicate, params, 'where');
    const violations = this.clone().where(raw(`NOT COALESCE((${format}), FALSE)`, ...args));
    return !(await violations.any());
  }

  /**
   * Hydrate rows one by one as the executor yields them. Includes are not
   * applied to streamed entities.
   */
  async *stream(): AsyncGenerator<T, void, undefined> {
    const scope = new HydrationScope();
    for await (const row of this.toBuilder().stream()) {
      yield hydrateRow(this.modelClass, row, scope);
    }
  }

  /**
   * One UPDATE over every row of the query. Takes an assignment expression
   * (`u => u.active == false && u.rank == {0}`) or a property record.
   */
  async updateAll(assignments: string | JsonObject, ...params: unknown[]): Promise<number> {
    let columns: Record<string, unknown>;
    if (typeof assignments === 'string') {
      columns = compileAssignments(parseExpression(assignments), {
        resolveColumn: property => this.columnFor(property),
        params,
      });
    } else {
      columns = {};
      for (const [property, value] of Object.entries(assignments)) {
        columns[this.requireColumn(property)] = isEntity(value) ? value.id : value;
      }
    }
    if (Object.keys(columns).length === 0) {
      throw new ValidationError('updateAll needs at least one assignment', 'assignments');
    }
    if (!('ModifiedAt' in columns)) {
      columns.ModifiedAt = new Date();
    }

    return this.newBuilder()
      .UPDATE(this.modelClass.tableName)
      .SET(columns)
      .WHERE('{0} IN ({1})', new SqlId('Id'), this.toBuilder('ids'))
      .execute();
  }

  /**
   * Soft-delete every row of the query, or remove them with `hard`.
   */
  async deleteAll(options: Pick<DeleteOptions, 'hard'> = {}): Promise<number> {
    const builder = this.newBuilder();
    if (options.hard) {
      builder.DELETE_FROM(this.modelClass.tableName);
    } else {
      const now = new Date();
      builder.UPDATE(this.modelClass.tableName).SET({ DeletedAt: now, ModifiedAt: now });
    }
    return builder.WHERE('{0} IN ({1})', new SqlId('Id'), this.toBuilder('ids')).execute();
  }
}

export default QueryBuilder;
