import pg from "pg";
import type { QueryResult, SqlExecutor } from "../../core/ports/connection-provider.port.js";

/**
 * Type parser lookup in the shape pg's query config accepts
 */
export interface PgTypeParsers {
  getTypeParser(oid: number, format?: "text"): (value: string) => unknown;
}

/**
 * The slice of pg.Client / pg.PoolClient the executor needs
 */
export interface PgQueryable {
  query(config: {
    text: string;
    values?: unknown[];
    rowMode: "array";
    types?: PgTypeParsers;
  }): Promise<{
    fields: Array<{ name: string }>;
    rows: unknown[][];
    rowCount: number | null;
  }>;
}

const JSON_OID = 114;
const JSONB_OID = 3802;

const keepText = (value: string): string => value;

/**
 * pg's own parsers, except json/jsonb which stay as the server's text so a
 * JSON string such as "dark" keeps its quotes.
 */
export const procedureTypeParsers: PgTypeParsers = {
  getTypeParser: (oid) =>
    oid === JSON_OID || oid === JSONB_OID ? keepText : pg.types.getTypeParser(oid),
};

/**
 * PostgreSQL Executor (Default)
 *
 * Runs statements in array row mode so every column position survives,
 * including repeated column names.
 */
export class PgSqlExecutor implements SqlExecutor {
  constructor(private readonly client: PgQueryable) {}

  async query(sql: string, params: unknown[] = []): Promise<QueryResult> {
    const result = await this.client.query({
      text: sql,
      values: params,
      rowMode: "array",
      types: procedureTypeParsers,
    });
    return {
      columns: result.fields.map((field) => field.name),
      rows: result.rows,
      rowCount: result.rowCount,
    };
  }
}
