/**
 * Database connection configuration and utilities
 */

import { Pool, PoolClient, PoolConfig, QueryResult, QueryResultRow } from 'pg';
import { createLogger } from '../utils/logger';

const logger = createLogger('Database');

export interface DatabaseConfig {
  connectionString?: string;
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl?: boolean;
  max?: number; // Maximum number of clients in pool
  idleTimeoutMillis?: number;
  connectionTimeoutMillis?: number;
}

export type QueryParams = ReadonlyArray<unknown>;

export type QueryFn = <T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: QueryParams,
) => Promise<QueryResult<T>>;

export interface PoolStatus {
  connected: boolean;
  totalCount?: number;
  idleCount?: number;
  waitingCount?: number;
}

export class DatabaseConnection {
  private pool: Pool | null = null;

  constructor(private readonly config: DatabaseConfig) {}

  /**
   * Initialize database connection pool
   */
  async connect(): Promise<void> {
    if (this.pool) {
      return;
    }

    const poolConfig: PoolConfig = this.config.connectionString
      ? { connectionString: this.config.connectionString }
      : {
          host: this.config.host,
          port: this.config.port,
          database: this.config.database,
          user: this.config.user,
          password: this.config.password,
          ssl: this.config.ssl,
        };

    const pool = new Pool({
      ...poolConfig,
      max: this.config.max || 20,
      idleTimeoutMillis: this.config.idleTimeoutMillis || 30000,
      connectionTimeoutMillis: this.config.connectionTimeoutMillis || 2000,
    });

    // An unhandled 'error' from an idle client terminates the process.
    pool.on('error', (error) => {
      logger.error('Idle database client error', { error: error.message });
    });

    try {
      const client = await pool.connect();
      try {
        await client.query('SELECT NOW()');
      } finally {
        client.release();
      }
    } catch (error) {
      logger.error('Failed to connect to database', {
        error: error instanceof Error ? error.message : error,
      });
      await pool.end();
      throw error;
    }

    this.pool = pool;
    logger.info('Database connected successfully');
  }

  /**
   * Execute a single query on a pooled client
   */
  async query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: QueryParams,
  ): Promise<QueryResult<T>> {
    const pool = this.requirePool();

    try {
      const start = Date.now();
      const result = await pool.query<T>(text, params ? [...params] : undefined);
      const duration = Date.now() - start;

      logger.debug(`Query executed in ${duration}ms`, {
        query: text,
        params,
        rowCount: result.rowCount,
      });

      return result;
    } catch (error) {
      logger.error('Query execution failed', {
        query: text,
        params,
        error: error instanceof Error ? error.message : error,
      });
      throw error;
    }
  }

  /**
   * Check out one client for several statements; it is released on every exit path.
   */
  async withClient<T>(callback: (query: QueryFn) => Promise<T>): Promise<T> {
    const client = await this.requirePool().connect();

    try {
      return await callback(bindQuery(client));
    } finally {
      client.release();
    }
  }

  /**
   * Execute a transaction
   */
  async transaction<T>(callback: (query: QueryFn) => Promise<T>): Promise<T> {
    return this.withClient(async (query) => {
      await query('BEGIN');
      try {
        const result = await callback(query);
        await query('COMMIT');
        return result;
      } catch (error) {
        await query('ROLLBACK');
        throw error;
      }
    });
  }

  /**
   * Close database connection
   */
  async disconnect(): Promise<void> {
    if (this.pool) {
      const pool = this.pool;
      this.pool = null;
      await pool.end();
      logger.info('Database connection closed');
    }
  }

  getStatus(): PoolStatus {
    if (!this.pool) {
      return { connected: false };
    }

    return {
      connected: true,
      totalCount: this.pool.totalCount,
      idleCount: this.pool.idleCount,
      waitingCount: this.pool.waitingCount,
    };
  }

  private requirePool(): Pool {
    if (!this.pool) {
      throw new Error('Database not connected. Call connect() first.');
    }
    return this.pool;
  }
}

const bindQuery =
  (client: PoolClient): QueryFn =>
  <T extends QueryResultRow = QueryResultRow>(text: string, params?: QueryParams) =>
    client.query<T>(text, params ? [...params] : undefined);

// Default database configuration from environment variables
export const getDefaultConfig = (): DatabaseConfig => ({
  connectionString: process.env.DATABASE_URL || undefined,
  host: process.env.DB_HOST || 'localhost',
  port: parseInt(process.env.DB_PORT || '5432', 10),
  database: process.env.DB_NAME || 'posts',
  user: process.env.DB_USER || 'postgres',
  password: process.env.DB_PASSWORD || '',
  ssl: process.env.DB_SSL === 'true',
  max: parseInt(process.env.DB_POOL_MAX || '20', 10),
  idleTimeoutMillis: parseInt(process.env.DB_IDLE_TIMEOUT || '30000', 10),
  connectionTimeoutMillis: parseInt(
    process.env.DB_CONNECTION_TIMEOUT || '2000',
    10,
  ),
});

// Export singleton instance
export const db = new DatabaseConnection(getDefaultConfig());

export default DatabaseConnection;
