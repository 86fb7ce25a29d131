/**
 * Database interface that abstracts the SQLite implementation.
 * Stores only talk to this, so tests and tools can hand them any adapter.
 */
export interface IDatabase {
  /**
   * Prepare a SQL statement for repeated execution.
   */
  prepare(sql: string): IStatement;

  /**
   * Execute one or more SQL statements without returning results.
   */
  exec(sql: string): void;

  /**
   * Run `fn` inside a single transaction; rolled back if it throws.
   */
  transaction<T>(fn: () => T): T;

  /**
   * Close the database connection.
   */
  close(): void;

  /**
   * Reset schema: Drop and recreate tables.
   * Used in write workflows to ensure clean state.
   */
  resetSchema?(): void;
}

/**
 * Prepared statement interface for executing parameterized queries.
 * Rows come back untyped; stores validate them before use.
 */
export interface IStatement {
  /**
   * Execute the statement with the given parameters.
   * For INSERT/UPDATE/DELETE operations.
   */
  run(...params: unknown[]): IRunResult;

  /**
   * Execute the statement and return all matching rows.
   */
  all(...params: unknown[]): unknown[];
}

/**
 * Result of a run() operation.
 */
export interface IRunResult {
  changes: number;
  lastInsertRowid: number | bigint;
}

export interface OpenOptions {
  readonly?: boolean;      // Open without write access; the schema is left untouched
  fileMustExist?: boolean; // Fail instead of creating an empty database file
}
