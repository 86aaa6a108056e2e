import { Pool, type PoolClient, type QueryResult, type QueryResultRow } from 'pg';

export interface Queryable {
  query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>>;
}

export interface Database extends Queryable {
  withTransaction<T>(fn: (client: Queryable) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

export interface TransactionClient extends Queryable {
  release(err?: Error | boolean): void;
}

export interface ClientSource {
  connect(): Promise<TransactionClient>;
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Runs `fn` between begin and commit on a dedicated client. A failed
 * rollback does not replace the original error; it discards the client
 * instead of returning it to the pool.
 */
export async function runInTransaction<T>(source: ClientSource, fn: (client: Queryable) => Promise<T>): Promise<T> {
  const client = await source.connect();
  let broken: Error | undefined;
  try {
    await client.query('begin');
    const result = await fn(client);
    await client.query('commit');
    return result;
  } catch (error) {
    try {
      await client.query('rollback');
    } catch (rollbackError) {
      broken = asError(rollbackError);
    }
    throw error;
  } finally {
    client.release(broken);
  }
}

export function createDatabase(connectionString: string): Database {
  const pool = new Pool({ connectionString, max: 1 });

  function bind(client: PoolClient): TransactionClient {
    return {
      query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]) {
        return client.query<T>(text, params);
      },
      release: (err) => client.release(err),
    };
  }

  return {
    query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]) {
      return pool.query<T>(text, params);
    },
    withTransaction<T>(fn: (client: Queryable) => Promise<T>) {
      return runInTransaction({ connect: async () => bind(await pool.connect()) }, fn);
    },
    close: () => pool.end(),
  };
}
