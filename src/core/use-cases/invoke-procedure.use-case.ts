/**
 * Invoke Procedure Use Case
 *
 * Public entry point: binds a parameter bag, calls a stored procedure on a
 * fresh connection and maps the result onto a record schema.
 *
 * `fetchOne` asks the server for a single row (LIMIT 1). The row count is not
 * validated: if more rows arrive anyway, the first is kept and the rest are
 * ignored. `run` issues CALL, so its target must be a PROCEDURE rather than a
 * FUNCTION; rows it returns (OUT parameters) are ignored.
 */

import {
  ConnectionError,
  DomainError,
  FieldMappingError,
  ProcedureError,
  describeError,
  redactConnection,
} from "../domain/errors/index.js";
import type { RecordSchema } from "../domain/schema/record-schema.js";
import { ObjectMapper } from "../domain/services/object-mapper.js";
import {
  materialize,
  type RowSet,
} from "../domain/services/row-materializer.js";
import {
  expectsResultSet,
  type ExpectedRows,
} from "../domain/value-objects/expected-rows.js";
import {
  bindParameters,
  buildProcedureCommand,
  qualifyProcedureName,
  type ParameterBag,
  type ProcedureCommand,
} from "../domain/value-objects/procedure-command.js";
import type {
  ConnectionProvider,
  QueryResult,
  SqlConnection,
} from "../ports/connection-provider.port.js";
import type {
  MetricRecorder,
  SpanLike,
  TracerPort,
} from "../ports/telemetry.port.js";

export interface ProcedureInvokerConfig {
  /** Schema prefixed to unqualified procedure names */
  defaultSchema?: string;
  /** Write field mapping failures to the console (default: true) */
  logFieldErrors: boolean;
  /** Called once per contained field mapping failure */
  onFieldError?: (error: FieldMappingError, procedure: string) => void;
  metrics?: MetricRecorder;
  tracer?: TracerPort;
}

const DEFAULT_CONFIG: ProcedureInvokerConfig = {
  logFieldErrors: true,
};

export class ProcedureInvoker {
  private readonly config: ProcedureInvokerConfig;

  constructor(
    private readonly connections: ConnectionProvider,
    config: Partial<ProcedureInvokerConfig> = {},
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Map the first returned row, or null when there is none
   */
  async fetchOne<T>(
    connection: string,
    procedure: string,
    schema: RecordSchema<T>,
    params?: ParameterBag | null,
  ): Promise<T | null> {
    const name = this.qualify(procedure);
    const rows = await this.call(connection, name, params, "ONE");
    const first = rows[0];
    if (!first) {
      return null;
    }
    return this.mapperFor(name).mapRow(first, schema).value;
  }

  /**
   * Map every returned row, in the order the server produced them
   */
  async fetchMany<T>(
    connection: string,
    procedure: string,
    schema: RecordSchema<T>,
    params?: ParameterBag | null,
  ): Promise<T[]> {
    const name = this.qualify(procedure);
    const rows = await this.call(connection, name, params, "MANY");
    if (rows.length === 0) {
      return [];
    }
    return this.mapperFor(name)
      .mapRows(rows, schema)
      .map((mapping) => mapping.value);
  }

  /**
   * Execute a PROCEDURE without expecting a result set
   */
  async run(
    connection: string,
    procedure: string,
    params?: ParameterBag | null,
  ): Promise<void> {
    await this.call(connection, this.qualify(procedure), params, "NONE");
  }

  private qualify(procedure: string): string {
    return qualifyProcedureName(procedure, this.config.defaultSchema);
  }

  private async call(
    connection: string,
    name: string,
    params: ParameterBag | null | undefined,
    expected: ExpectedRows,
  ): Promise<RowSet> {
    const command = buildProcedureCommand(
      name,
      bindParameters(name, params),
      expected,
    );

    this.config.metrics?.recordCall(name, expected);
    const startedAt = Date.now();

    try {
      const result = await this.traced(
        `procedure.${expected.toLowerCase()}`,
        (span) => {
          span.setAttribute("db.system", "postgresql");
          span.setAttribute("db.procedure", name);
          span.setAttribute("db.parameter_count", command.parameters.length);
          return this.execute(connection, command);
        },
      );

      return expectsResultSet(expected) ? materialize(result) : [];
    } catch (error) {
      this.config.metrics?.recordFailure(
        name,
        error instanceof Error ? error.name : "UnknownError",
      );
      throw error;
    } finally {
      this.config.metrics?.recordDuration(Date.now() - startedAt, name);
    }
  }

  private async execute(
    connection: string,
    command: ProcedureCommand,
  ): Promise<QueryResult> {
    const session = await this.open(connection);

    let result: QueryResult;
    try {
      result = await session.query(command.text, command.values);
    } catch (error) {
      await this.releaseAfterFailure(session, error);
      if (error instanceof DomainError) {
        throw error;
      }
      throw new ProcedureError(command.procedure, describeError(error), error);
    }

    try {
      await session.release();
    } catch (error) {
      throw new ConnectionError(
        redactConnection(connection),
        `release failed: ${describeError(error)}`,
        error,
      );
    }
    return result;
  }

  /**
   * The query error is what the caller sees; a release failure is only logged.
   */
  private async releaseAfterFailure(
    session: SqlConnection,
    queryError: unknown,
  ): Promise<void> {
    try {
      await session.release(queryError);
    } catch (error) {
      console.warn(
        `[ProcedureInvoker] Release failed after query error: ${describeError(error)}`,
      );
    }
  }

  private async open(connection: string): Promise<SqlConnection> {
    try {
      return await this.connections.open(connection);
    } catch (error) {
      if (error instanceof ConnectionError) {
        throw error;
      }
      throw new ConnectionError(
        redactConnection(connection),
        describeError(error),
        error,
      );
    }
  }

  private traced<T>(
    name: string,
    fn: (span: SpanLike) => Promise<T>,
  ): Promise<T> {
    return this.config.tracer
      ? this.config.tracer.withSpan(name, fn)
      : fn(noopSpan);
  }

  private mapperFor(procedure: string): ObjectMapper {
    const { onFieldError, metrics } = this.config;
    return new ObjectMapper({
      logFieldErrors: this.config.logFieldErrors,
      onFieldError: (error) => {
        metrics?.recordFieldError(procedure, error.column);
        onFieldError?.(error, procedure);
      },
    });
  }
}

const noopSpan: SpanLike = {
  setAttribute: () => {},
  setStatus: () => {},
  recordException: () => {},
  end: () => {},
};
