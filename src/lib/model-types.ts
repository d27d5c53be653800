import type { Model } from './model.js';

export type JsonValue = unknown;

export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * A raw row as returned by the driver, keyed by column name.
 */
export type RowRecord = Record<string, unknown>;

export type QueryParameters = readonly unknown[];

/**
 * Boundary to whatever actually talks to the database. The core only ever
 * hands it rendered SQL and positional parameters.
 */
export interface QueryExecutor {
  rows(sql: string, params?: QueryParameters): Promise<RowRecord[]>;
  /** First column of the first row, or null when there is no row. */
  scalar(sql: string, params?: QueryParameters): Promise<unknown>;
  /** Number of affected rows. */
  execute(sql: string, params?: QueryParameters): Promise<number>;
  stream(sql: string, params?: QueryParameters): AsyncIterable<RowRecord>;
}

export type RelationType = 'OneToOne' | 'OneToMany' | 'ManyToOne' | 'ManyToMany';

/**
 * Immutable description of one direction of a discovered relation.
 */
export interface Relation {
  readonly localType: string;
  readonly foreignType: string;
  /** Null for the undeclared side of a lazy relation. */
  readonly localProperty: string | null;
  readonly foreignProperty: string | null;
  readonly relationType: RelationType;
  readonly localTableName: string;
  readonly foreignTableName: string;
  readonly localTableNameSingular: string;
  readonly foreignTableNameSingular: string;
  readonly foreignKeyTableName: string | null;
  readonly foreignKeyColumnName: string | null;
  /** True when the foreign key column lives on the local table. */
  readonly ownsForeignKey: boolean;
  readonly pivotTableName: string | null;
  readonly pivotTableFirstColumnName: string | null;
  readonly pivotTableSecondColumnName: string | null;
  /** Pivot column holding this side's key. */
  readonly pivotLocalColumnName: string | null;
  readonly pivotForeignColumnName: string | null;
  readonly linkIdentifier: string | null;
}

/**
 * What a model class needs from the DAL it was defined on.
 */
export interface ModelContext {
  readonly executor: QueryExecutor;
  readonly schema: string | null;
  getRelations(): readonly Relation[];
  relationsOf(typeName: string): readonly Relation[];
  relationFor(typeName: string, property: string): Relation | null;
  getModel(name: string): ModelClass;
}

/**
 * A generated model constructor: the statics of `Model` plus a constructor
 * producing `T`.
 */
export type ModelClass<T extends Model = Model> = (new (data?: JsonObject) => T) & typeof Model;

export interface ExecutorOptions {
  /** Run against this executor instead of the DAL's (e.g. a transaction). */
  executor?: QueryExecutor;
}

export type SaveOptions = ExecutorOptions;

export interface DeleteOptions extends ExecutorOptions {
  hard?: boolean;
}

export interface FindOptions {
  withTrashed?: boolean;
}
