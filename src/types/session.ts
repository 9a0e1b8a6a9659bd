/**
 * Game session type definitions
 */

/**
 * Lifecycle states stored in the games table
 */
export type GameStatus = 'starting' | 'active';

/**
 * Outcome of a status/usernames update
 */
export interface SessionUpdateResult {
  success: boolean;
  message: string;
}

/**
 * Column name and type reported by information_schema
 */
export interface ColumnInfo {
  name: string;
  dataType: string;
}

/**
 * Persistence operations for game sessions
 */
export interface SessionStore {
  readonly isConfigured: boolean;
  createSession(gameId: string, usernames: string[]): Promise<string | null>;
  updateSession(gameId: string, usernames: string[]): Promise<SessionUpdateResult>;
  deleteSession(gameId: string): Promise<boolean>;
  ping(): Promise<boolean>;
  describeColumns(table: string): Promise<ColumnInfo[]>;
  close(): Promise<void>;
}
