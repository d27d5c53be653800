import { Pool } from 'pg';
import { ConnectionError, TransactionError } from './errors.js';
import type { Inflector } from './inflector.js';
import { defineModelClass } from './model.js';
import type { DefinedModel, ModelDefinition, ModelSchema } from './model-definition.js';
import ModelRegistry from './model-registry.js';
import type { ModelClass, ModelContext, QueryExecutor, Relation } from './model-types.js';
import PgExecutor from './pg-executor.js';
import {
  mergePostgresConfig,
  type PostgresConfig,
  type PostgresEnvironment,
} from './postgres-config.js';
import RelationshipDiscoverer, { RelationIndex } from './relationship-discoverer.js';
import { debug } from './runtime.js';

export interface DataAccessLayerConfig extends PostgresConfig {
  /** Replaces the pool-backed executor; no pool is opened. */
  executor?: QueryExecutor;
  inflector?: Inflector;
  /** Where `PG*` variables are read from; defaults to `process.env`. */
  env?: PostgresEnvironment;
}

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Main Data Access Layer class for PostgreSQL
 *
 * Owns the connection pool, the model registry and the relations discovered
 * over the registered models. Model classes defined here run their queries
 * through this instance.
 */
export class DataAccessLayer implements ModelContext {
  readonly config: PostgresConfig;
  readonly schema: string | null;
  pool: Pool | null;
  readonly modelRegistry: ModelRegistry;
  private readonly discoverer: RelationshipDiscoverer;
  private readonly executorOverride: QueryExecutor | null;
  private poolExecutor: PgExecutor | null;
  private relationIndex: RelationIndex | null;

  constructor(config: DataAccessLayerConfig = {}) {
    const { executor, inflector, env, ...postgresConfig } = config;
    this.config = mergePostgresConfig(postgresConfig, env);
    this.schema = this.config.schema ?? null;
    this.pool = null;
    this.modelRegistry = new ModelRegistry();
    this.discoverer = new RelationshipDiscoverer(inflector);
    this.executorOverride = executor ?? null;
    this.poolExecutor = null;
    this.relationIndex = null;
  }

  /**
   * Open the connection pool and check it with a round trip. A DAL built
   * around a custom executor has nothing to open.
   */
  async connect(): Promise<this> {
    if (this.executorOverride || this.pool) {
      return this;
    }

    const { schema: _schema, ...poolConfig } = this.config;
    const pool = new Pool(poolConfig);
    try {
      const client = await pool.connect();
      try {
        await client.query('SELECT NOW()');
      } finally {
        client.release();
      }
    } catch (error) {
      debug.error(`Failed to connect to PostgreSQL: ${describeError(error)}`);
      await pool.end();
      throw new ConnectionError(`Failed to connect to PostgreSQL: ${describeError(error)}`);
    }

    pool.on('connect', () => {
      debug.db('New PostgreSQL client connected');
    });
    pool.on('error', error => {
      debug.error(`PostgreSQL pool error: ${error.message}`);
    });

    this.pool = pool;
    this.poolExecutor = new PgExecutor(pool);
    debug.db('PostgreSQL connection pool established');
    return this;
  }

  async disconnect(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
      this.poolExecutor = null;
      debug.db('PostgreSQL connection pool closed');
    }
  }

  isConnected(): boolean {
    if (this.executorOverride) {
      return true;
    }
    return Boolean(this.pool && !this.pool.ended);
  }

  get executor(): QueryExecutor {
    const executor = this.executorOverride ?? this.poolExecutor;
    if (!executor) {
      throw new ConnectionError('DAL not connected. Call connect() first.');
    }
    return executor;
  }

  /**
   * Run the callback with an executor bound to one transaction. The
   * transaction commits when the callback resolves and rolls back when it
   * throws.
   */
  async transaction<T>(callback: (executor: QueryExecutor) => Promise<T>): Promise<T> {
    if (this.executorOverride) {
      return this.runTransaction(this.executorOverride, callback);
    }

    if (!this.pool) {
      throw new ConnectionError('DAL not connected. Call connect() first.');
    }
    const client = await this.pool.connect();
    try {
      return await this.runTransaction(new PgExecutor(this.pool, client), callback);
    } finally {
      client.release();
    }
  }

  private async runTransaction<T>(
    executor: QueryExecutor,
    callback: (executor: QueryExecutor) => Promise<T>
  ): Promise<T> {
    await executor.execute('BEGIN');
    debug.db('Transaction started');

    let result: T;
    try {
      result = await callback(executor);
    } catch (error) {
      try {
        await executor.execute('ROLLBACK');
      } catch (rollbackError) {
        throw new TransactionError(
          `Rollback failed after '${describeError(error)}': ${describeError(rollbackError)}`
        );
      }
      debug.db(`Transaction rolled back due to error: ${describeError(error)}`);
      throw error;
    }

    await executor.execute('COMMIT');
    debug.db('Transaction committed');
    return result;
  }

  /**
   * Define a model class bound to this DAL. The table name defaults to the
   * pluralized model name.
   */
  defineModel<Schema extends ModelSchema>(definition: ModelDefinition<Schema>): DefinedModel<Schema> {
    const { table } = this.discoverer.tableNames({
      name: definition.name,
      tableName: definition.tableName ?? null,
    });
    const model = defineModelClass(this, definition, table);
    this.modelRegistry.register(model);
    this.relationIndex = null;

    debug.db(`Model '${definition.name}' defined on table '${table}'`);
    return model;
  }

  getModel(name: string): ModelClass {
    return this.modelRegistry.require(name);
  }

  getRegisteredModels(): ModelClass[] {
    return this.modelRegistry.list();
  }

  private get relations(): RelationIndex {
    if (!this.relationIndex) {
      const models = this.modelRegistry.list();
      const discovered = this.discoverer.discover(
        models.map(model => ({
          name: model.modelName,
          tableName: model.tableName,
          relations: model.descriptor.relations,
        }))
      );
      this.relationIndex = new RelationIndex(discovered);
      debug.db(`Discovered ${discovered.length} relations across ${models.length} models`);
    }
    return this.relationIndex;
  }

  getRelations(): readonly Relation[] {
    return this.relations.all;
  }

  relationsOf(typeName: string): readonly Relation[] {
    return this.relations.relationsOf(typeName);
  }

  relationFor(typeName: string, property: string): Relation | null {
    return this.relations.relationFor(typeName, property);
  }

  /**
   * Drop the cached relation list and discover it again.
   */
  resetRelations(): readonly Relation[] {
    this.relationIndex = null;
    return this.getRelations();
  }

  /**
   * Forget every model defined on this DAL.
   */
  clear(): void {
    this.modelRegistry.clear();
    this.relationIndex = null;
  }
}

export default DataAccessLayer;
