import pg from 'pg';
import dotenv from 'dotenv';
import { createLogger } from '../utils/logger.js';

dotenv.config();

const { Pool } = pg;

const logger = createLogger('DatabaseConfig');

/**
 * Minimal query surface the stores depend on. The pool satisfies it, and
 * tests substitute an in-process fake.
 */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<pg.QueryResult<pg.QueryResultRow>>;
}

/**
 * PostgreSQL Database Configuration
 *
 * Backs the graph store (concept nodes, relationship edges), chunk links and
 * trigram similarity search.
 */
export class DatabaseConfig {
  private static pool: pg.Pool | null = null;

  /**
   * Get required environment variables
   */
  static getConfig() {
    const host = process.env.PGHOST;
    const user = process.env.PGUSER;
    const database = process.env.PGDATABASE || process.env.POSTGRES_DB;

    if (!host || !user || !database) {
      throw new Error(
        'Missing required PostgreSQL configuration. ' +
          'Please ensure PGHOST, PGUSER and PGDATABASE are set in .env'
      );
    }

    return {
      host,
      port: parseInt(process.env.PGPORT || '5432', 10),
      user,
      password: process.env.PGPASSWORD,
      database,
      max: parseInt(process.env.PG_POOL_MAX || '20', 10),
    };
  }

  /**
   * Get or create the PostgreSQL connection pool
   */
  static getPool(): pg.Pool {
    if (!this.pool) {
      const config = this.getConfig();
      this.pool = new Pool({
        ...config,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 30000, // 30 seconds to acquire connection
      });

      // Idle clients can error when the server goes away; surface it instead of crashing
      this.pool.on('error', (error) => {
        logger.error('Idle PostgreSQL client error', { error: error.message });
      });

      logger.info('Database pool initialized', {
        user: config.user,
        host: config.host,
        port: config.port,
        database: config.database,
      });
    }

    return this.pool;
  }

  /**
   * Queryable view of the pool for the stores
   */
  static getQueryable(): Queryable {
    const pool = this.getPool();
    return {
      query: (text, values) => pool.query(text, values),
    };
  }

  /**
   * Test database connection
   */
  static async testConnection(): Promise<boolean> {
    try {
      const result = await this.getPool().query('SELECT NOW() AS now');
      logger.info('Database connection successful', { serverTime: result.rows[0]?.now });
      return true;
    } catch (error) {
      logger.error('Database connection failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  /**
   * Close the pool
   */
  static async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
      logger.info('Database pool closed');
    }
  }
}
