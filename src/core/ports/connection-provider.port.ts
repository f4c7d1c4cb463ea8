/**
 * Connection Provider Port
 *
 * Abstracts the database driver so the invoker can open, use and release
 * one connection per call without knowing how it was obtained.
 */

/**
 * Result of one statement, in column-position order
 */
export interface QueryResult {
  columns: string[];
  rows: unknown[][];
  rowCount: number | null;
}

export interface SqlExecutor {
  query(sql: string, params?: unknown[]): Promise<QueryResult>;
}

/**
 * A connection owned by a single call
 */
export interface SqlConnection extends SqlExecutor {
  /**
   * Give the connection back (close it, or return it to its pool).
   * Called exactly once, on every exit path. After a failed query the
   * error is passed along so a broken connection can be discarded.
   */
  release(error?: unknown): Promise<void>;
}

export interface ConnectionProvider {
  /**
   * Open a connection for a descriptor (URI or configured name)
   * Throws ConnectionError when the connection cannot be opened.
   */
  open(connection: string): Promise<SqlConnection>;
}
