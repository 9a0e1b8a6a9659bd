/**
 * Session store - game-session records in PostgreSQL
 */
import pg from 'pg';
import type { ColumnInfo, GameStatus, SessionStore, SessionUpdateResult } from '../types/index';
import { LoggerService } from './logger';

/**
 * Minimal query surface the store needs; pg.Pool provides it
 */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
  end(): Promise<void>;
}

export interface PoolOptions {
  connectionString: string;
  min: number;
  max: number;
}

/**
 * Creates a pg connection pool, or null when no connection string is configured
 */
export function createPool(options: PoolOptions, logger: LoggerService): SqlClient | null {
  if (!options.connectionString) {
    logger.warn('DATABASE_URL is not set, session store disabled');
    return null;
  }

  const pool = new pg.Pool({
    connectionString: options.connectionString,
    min: options.min,
    max: options.max,
  });
  pool.on('error', (error) => {
    logger.error('Idle database client error', error);
  });
  logger.info(`Connection pool created with ${options.min}-${options.max} connections`);

  return {
    query: (text, values) => pool.query(text, values),
    end: () => pool.end(),
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function readString(row: unknown, key: string): string | null {
  if (typeof row !== 'object' || row === null) {
    return null;
  }
  const value: unknown = Reflect.get(row, key);
  return typeof value === 'string' ? value : null;
}

const DB_UNAVAILABLE = 'Database connection failed';
const INITIAL_STATUS: GameStatus = 'starting';
const ACTIVE_STATUS: GameStatus = 'active';

/**
 * PostgreSQL-backed game sessions in the `games` table
 */
export class PostgresSessionStore implements SessionStore {
  private readonly client: SqlClient | null;
  private readonly logger: LoggerService;

  constructor(client: SqlClient | null, logger: LoggerService) {
    this.client = client;
    this.logger = logger;
  }

  get isConfigured(): boolean {
    return this.client !== null;
  }

  /**
   * Inserts a session in 'starting' status
   * @returns The stored game id, or null on failure
   */
  async createSession(gameId: string, usernames: string[]): Promise<string | null> {
    if (!this.client) {
      this.logger.error('createSession: database not configured');
      return null;
    }

    try {
      const result = await this.client.query(
        `INSERT INTO games (game_id, start_time, status, player_usernames)
         VALUES ($1, $2, $3, $4)
         RETURNING game_id`,
        [gameId, new Date(), INITIAL_STATUS, usernames.join(',')]
      );
      const storedId = readString(result.rows[0], 'game_id');
      if (!result.rowCount || storedId === null) {
        this.logger.error('createSession: INSERT affected 0 rows');
        return null;
      }
      return storedId;
    } catch (error) {
      this.logger.error(`createSession: DB INSERT error: ${errorMessage(error)}`);
      return null;
    }
  }

  /**
   * Marks a session active and replaces its player list
   */
  async updateSession(gameId: string, usernames: string[]): Promise<SessionUpdateResult> {
    if (!this.client) {
      return { success: false, message: DB_UNAVAILABLE };
    }

    try {
      const result = await this.client.query(
        `UPDATE games
         SET status = $1, player_usernames = $2
         WHERE game_id = $3::TEXT`,
        [ACTIVE_STATUS, usernames.join(','), gameId]
      );

      if (result.rowCount && result.rowCount > 0) {
        const message = `Game status updated to 'active' and usernames updated for game_id: ${gameId}`;
        this.logger.info(message);
        return { success: true, message };
      }

      const message = `Game status update failed: game_id '${gameId}' not found or no update performed.`;
      this.logger.warn(message);
      return { success: false, message };
    } catch (error) {
      const message = `Database error updating game status and usernames: ${errorMessage(error)}`;
      this.logger.error(message);
      return { success: false, message };
    }
  }

  /**
   * Deletes a session
   * @returns false when no session matched
   * @throws Error when the database is unavailable or the query fails
   */
  async deleteSession(gameId: string): Promise<boolean> {
    if (!this.client) {
      throw new Error(DB_UNAVAILABLE);
    }
    const result = await this.client.query('DELETE FROM games WHERE game_id = $1 RETURNING game_id', [
      gameId,
    ]);
    return Boolean(result.rowCount && result.rowCount > 0);
  }

  /**
   * Runs a trivial query
   */
  async ping(): Promise<boolean> {
    if (!this.client) {
      return false;
    }
    try {
      await this.client.query('SELECT 1');
      return true;
    } catch (error) {
      this.logger.warn(`Database ping failed: ${errorMessage(error)}`);
      return false;
    }
  }

  /**
   * Lists column names and types of a table
   * @throws Error when the database is unavailable or the query fails
   */
  async describeColumns(table: string): Promise<ColumnInfo[]> {
    if (!this.client) {
      throw new Error(DB_UNAVAILABLE);
    }
    const result = await this.client.query(
      `SELECT column_name, data_type
       FROM information_schema.columns
       WHERE table_name = $1
       ORDER BY column_name`,
      [table]
    );
    const columns: ColumnInfo[] = [];
    for (const row of result.rows) {
      const name = readString(row, 'column_name');
      const dataType = readString(row, 'data_type');
      if (name !== null && dataType !== null) {
        columns.push({ name, dataType });
      }
    }
    return columns;
  }

  async close(): Promise<void> {
    if (this.client) {
      await this.client.end();
    }
  }
}
