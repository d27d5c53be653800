import type { Pool, PoolClient, QueryResult } from 'pg';
import { convertPostgreSQLError, QueryError } from './errors.js';
import type { QueryExecutor, QueryParameters, RowRecord } from './model-types.js';
import { debug } from './runtime.js';

type PoolLike = Pool | PoolClient;

const STREAM_BATCH_SIZE = 100;

let cursorCounter = 0;

const logReplacer = (_key: string, value: unknown): unknown =>
  typeof value === 'bigint' ? value.toString() : value;

/**
 * Log a failed statement and convert the driver error. Query errors keep the
 * statement and its parameters.
 */
export function reportQueryError(error: unknown, sql: string, params: QueryParameters): Error {
  const converted = convertPostgreSQLError(error);
  if (converted instanceof QueryError) {
    converted.sql = sql;
    converted.parameters = [...params];
  }
  debug.error(`Query error: ${converted.message}`);
  debug.error(`Query text: ${sql}`);
  debug.error(`Query params: ${JSON.stringify(params, logReplacer)}`);
  return converted;
}

/**
 * Executor backed by a pg pool, or by a single client when bound to a
 * transaction.
 */
export class PgExecutor implements QueryExecutor {
  readonly pool: Pool;
  readonly client: PoolClient | null;

  constructor(pool: Pool, client: PoolClient | null = null) {
    this.pool = pool;
    this.client = client;
  }

  private async query(sql: string, params: QueryParameters = []): Promise<QueryResult<RowRecord>> {
    const target: PoolLike = this.client ?? this.pool;
    try {
      const start = Date.now();
      const result = await target.query<RowRecord>(sql, [...params]);
      const duration = Date.now() - start;

      debug.db(`Query executed in ${duration}ms: ${sql}`);
      return result;
    } catch (error) {
      throw reportQueryError(error, sql, params);
    }
  }

  async rows(sql: string, params: QueryParameters = []): Promise<RowRecord[]> {
    const result = await this.query(sql, params);
    return result.rows;
  }

  async scalar(sql: string, params: QueryParameters = []): Promise<unknown> {
    const result = await this.query(sql, params);
    const [row] = result.rows;
    const [field] = result.fields;
    if (!row || !field) {
      return null;
    }
    return row[field.name] ?? null;
  }

  async execute(sql: string, params: QueryParameters = []): Promise<number> {
    const result = await this.query(sql, params);
    return result.rowCount ?? 0;
  }

  /**
   * Forward-only stream over a server-side cursor. Outside a transaction a
   * dedicated client is checked out and the cursor lives in its own
   * transaction.
   */
  async *stream(sql: string, params: QueryParameters = []): AsyncGenerator<RowRecord, void, undefined> {
    const dedicated = this.client === null;
    const client = this.client ?? (await this.pool.connect());
    const runner = new PgExecutor(this.pool, client);
    const cursor = `cursor_${++cursorCounter}`;
    let completed = false;

    try {
      if (dedicated) {
        await runner.execute('BEGIN');
      }
      await runner.execute(`DECLARE "${cursor}" NO SCROLL CURSOR FOR ${sql}`, params);

      for (;;) {
        const batch = await runner.rows(`FETCH ${STREAM_BATCH_SIZE} FROM "${cursor}"`);
        for (const row of batch) {
          yield row;
        }
        if (batch.length < STREAM_BATCH_SIZE) {
          break;
        }
      }

      if (!dedicated) {
        await runner.execute(`CLOSE "${cursor}"`);
      }
      completed = true;
    } finally {
      if (dedicated) {
        try {
          // A consumer that stops early leaves the cursor open; ROLLBACK drops it.
          await runner.execute(completed ? 'COMMIT' : 'ROLLBACK');
        } finally {
          client.release();
        }
      }
    }
  }
}

export default PgExecutor;
