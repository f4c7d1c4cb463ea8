/**
 * Data Access Configuration
 *
 * Loaded from environment variables:
 *
 * - DATABASE_URL              connection named "default"
 * - DB_CONNECTION_<NAME>      connection named "<name>" (lower-cased)
 * - DB_PROCEDURE_SCHEMA       schema prefixed to unqualified procedure names
 * - DB_LOG_FIELD_ERRORS       "false" or "0" silences field mapping warnings
 */

import { ConnectionError } from "../core/domain/errors/index.js";

export interface DataAccessConfig {
  /** Connection strings keyed by lower-cased connection name */
  connectionStrings: Record<string, string>;
  procedureSchema?: string;
  logFieldErrors: boolean;
}

export const DEFAULT_CONNECTION = "default";

const CONNECTION_PREFIX = "DB_CONNECTION_";
const URI = /^postgres(ql)?:\/\//i;

export function loadDataAccessConfig(
  env: NodeJS.ProcessEnv = process.env,
): DataAccessConfig {
  const connectionStrings: Record<string, string> = {};

  if (env.DATABASE_URL) {
    connectionStrings[DEFAULT_CONNECTION] = env.DATABASE_URL;
  }

  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith(CONNECTION_PREFIX) && value) {
      const name = key.slice(CONNECTION_PREFIX.length).toLowerCase();
      if (name) {
        connectionStrings[name] = value;
      }
    }
  }

  const logSetting = env.DB_LOG_FIELD_ERRORS?.trim().toLowerCase();

  return {
    connectionStrings,
    procedureSchema: env.DB_PROCEDURE_SCHEMA || undefined,
    logFieldErrors: logSetting !== "false" && logSetting !== "0",
  };
}

/**
 * Turn a connection descriptor into a connection string.
 * URIs pass through; anything else is a configured connection name.
 */
export function resolveConnectionString(
  connection: string,
  config: Pick<DataAccessConfig, "connectionStrings">,
): string {
  if (URI.test(connection)) {
    return connection;
  }

  const connectionString = config.connectionStrings[connection.toLowerCase()];
  if (!connectionString) {
    throw new ConnectionError(connection, "unknown connection name");
  }
  return connectionString;
}
