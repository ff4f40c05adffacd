/**
 * PostgreSQL handle. Constructed once at startup and passed to the stores;
 * nothing reaches for a process-wide pool. Driver failures surface as
 * InfrastructureError so they never mix with the domain taxonomy.
 */
import { Pool, type QueryResultRow } from 'pg';
import { InfrastructureError } from '../services/errors';
import { logger } from '../config/logger';

export interface QueryResult<T> {
  rows: T[];
  rowCount: number;
}

/** The narrow slice of the driver the stores depend on. */
export interface Queryable {
  query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>>;
}

export class Database implements Queryable {
  constructor(private readonly pool: Pool) {}

  async query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>> {
    try {
      const result = await this.pool.query<T>(text, params);
      return { rows: result.rows, rowCount: result.rowCount ?? 0 };
    } catch (err) {
      throw new InfrastructureError('Database query failed', { cause: err });
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

export function createDatabase(connectionString: string): Database {
  const pool = new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  });
  pool.on('error', (err: Error) => {
    logger.error('Unexpected DB pool error', { error: err.message });
  });
  return new Database(pool);
}

/** Postgres unique_violation, looked up through the InfrastructureError cause. */
export function isUniqueViolation(error: unknown): boolean {
  const cause = error instanceof InfrastructureError ? error.cause : error;
  return typeof cause === 'object' && cause !== null && 'code' in cause && cause.code === '23505';
}

export function isMemoryUrl(url: string): boolean {
  return url.trim().toLowerCase() === 'memory';
}
