/**
 * PostgreSQL Connection Providers
 *
 * - PgConnectionProvider: a new pg.Client per call, closed on release
 * - PgPoolConnectionProvider: borrows a client from a caller-owned pg.Pool
 */

import pg from "pg";
import {
  ConnectionError,
  describeError,
  redactConnection,
} from "../../core/domain/errors/index.js";
import type {
  ConnectionProvider,
  SqlConnection,
} from "../../core/ports/connection-provider.port.js";
import {
  resolveConnectionString,
  type DataAccessConfig,
} from "../../config/data-access-config.js";
import { PgSqlExecutor, type PgQueryable } from "./pg-executor.js";

export interface PgClientLike extends PgQueryable {
  connect(): Promise<void>;
  end(): Promise<void>;
}

export interface PgPooledClientLike extends PgQueryable {
  release(err?: Error | boolean): void;
}

export interface PgPoolLike {
  connect(): Promise<PgPooledClientLike>;
}

export interface PgConnectionProviderConfig {
  connectionStrings: DataAccessConfig["connectionStrings"];
  /** Builds the client for a resolved connection string */
  createClient: (connectionString: string) => PgClientLike;
}

const DEFAULT_CONFIG: PgConnectionProviderConfig = {
  connectionStrings: {},
  createClient: (connectionString) => new pg.Client({ connectionString }),
};

class PgSqlConnection extends PgSqlExecutor implements SqlConnection {
  constructor(
    client: PgQueryable,
    private readonly onRelease: (error?: unknown) => Promise<void>,
  ) {
    super(client);
  }

  release(error?: unknown): Promise<void> {
    return this.onRelease(error);
  }
}

/**
 * Errors reported by the server leave the connection usable; anything else
 * (socket loss, protocol failure) means the client must not go back to the pool.
 */
function discardReason(error: unknown): Error | boolean {
  if (error === undefined || error instanceof pg.DatabaseError) {
    return false;
  }
  return error instanceof Error ? error : true;
}

export class PgConnectionProvider implements ConnectionProvider {
  private readonly config: PgConnectionProviderConfig;

  constructor(config: Partial<PgConnectionProviderConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async open(connection: string): Promise<SqlConnection> {
    const connectionString = resolveConnectionString(connection, this.config);
    const client = this.config.createClient(connectionString);

    try {
      await client.connect();
    } catch (error) {
      throw new ConnectionError(
        redactConnection(connection),
        describeError(error),
        error,
      );
    }

    return new PgSqlConnection(client, () => client.end());
  }
}

/**
 * Pooling stays with pg; the descriptor only labels errors.
 */
export class PgPoolConnectionProvider implements ConnectionProvider {
  constructor(private readonly pool: PgPoolLike) {}

  async open(connection: string): Promise<SqlConnection> {
    let client: PgPooledClientLike;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw new ConnectionError(
        redactConnection(connection),
        describeError(error),
        error,
      );
    }

    return new PgSqlConnection(client, async (error) =>
      client.release(discardReason(error)),
    );
  }
}
