import DataAccessLayer, { type DataAccessLayerConfig } from './lib/data-access-layer.js';
import Errors from './lib/errors.js';
import Model from './lib/model.js';
import QueryBuilder from './lib/query-builder.js';
import SqlBuilder from './lib/sql-builder.js';
import types from './lib/type.js';

/**
 * PostgreSQL object-relational mapping core
 *
 * Models are declared with plain property schemas; relations between them,
 * foreign key columns and pivot tables are inferred from property names.
 */

type CreateDataAccessLayer = ((config?: DataAccessLayerConfig) => DataAccessLayer) & {
  DataAccessLayer: typeof DataAccessLayer;
  Model: typeof Model;
  QueryBuilder: typeof QueryBuilder;
  SqlBuilder: typeof SqlBuilder;
  types: typeof types;
  Errors: typeof Errors;
};

/**
 * Create a Data Access Layer instance.
 *
 * @param config Optional PostgreSQL configuration overrides, or a custom executor.
 */
const createDataAccessLayer: CreateDataAccessLayer = Object.assign(
  (config?: DataAccessLayerConfig) => new DataAccessLayer(config),
  { DataAccessLayer, Model, QueryBuilder, SqlBuilder, types, Errors }
);

export {
  CardinalityError,
  ConnectionError,
  ConstraintError,
  convertPostgreSQLError,
  DALError,
  DiscoveryAmbiguityError,
  DiscoveryError,
  ExpressionSyntaxError,
  QueryError,
  RecordNotFoundError,
  TransactionError,
  TypeCoercionError,
  UnknownModelError,
  ValidationError,
} from './lib/errors.js';
export { default as HydrationScope } from './lib/hydration-scope.js';
export { defaultInflector, type Inflector } from './lib/inflector.js';
export type {
  DefinedModel,
  InferData,
  InferInstance,
  ModelDefinition,
  ModelDescriptor,
  ModelSchema,
} from './lib/model-definition.js';
export { default as ModelRegistry } from './lib/model-registry.js';
export type {
  DeleteOptions,
  ExecutorOptions,
  FindOptions,
  JsonObject,
  ModelClass,
  ModelContext,
  QueryExecutor,
  QueryParameters,
  Relation,
  RelationType,
  RowRecord,
  SaveOptions,
} from './lib/model-types.js';
export { PgExecutor } from './lib/pg-executor.js';
export {
  DEFAULT_POSTGRES_CONFIG,
  mergePostgresConfig,
  type PostgresConfig,
  resolvePostgresConfig,
} from './lib/postgres-config.js';
export {
  compileAssignments,
  compilePredicate,
  type ExpressionNode,
  parseExpression,
} from './lib/predicate-expression.js';
export { raw, type RawFragment } from './lib/query-builder.js';
export { RelationIndex, RelationshipDiscoverer } from './lib/relationship-discoverer.js';
export {
  type DalDebugLogger,
  resetDebugLogger,
  setDebugLogger,
} from './lib/runtime.js';
export type { SortDirection } from './lib/sql-builder.js';
export { SqlColumn, SqlId, SqlIdentifier, SqlTable } from './lib/sql-identifiers.js';

export type { DataAccessLayerConfig };
export { DataAccessLayer, Errors, Model, QueryBuilder, SqlBuilder, types, createDataAccessLayer };

export default createDataAccessLayer;
