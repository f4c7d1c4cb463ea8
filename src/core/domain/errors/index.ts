/**
 * Domain Errors
 */

export class DomainError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DomainError";
  }
}

/**
 * The connection could not be opened (or the descriptor could not be resolved).
 */
export class ConnectionError extends DomainError {
  constructor(
    readonly connection: string,
    reason: string,
    cause?: unknown,
  ) {
    super(`Connection ${connection} failed: ${reason}`, { cause });
    this.name = "ConnectionError";
  }
}

/**
 * The database rejected the procedure call.
 */
export class ProcedureError extends DomainError {
  /** SQLSTATE reported by the server, when there is one */
  readonly code?: string;

  constructor(
    readonly procedure: string,
    reason: string,
    cause?: unknown,
  ) {
    super(`Procedure ${procedure} failed: ${reason}`, { cause });
    this.name = "ProcedureError";
    this.code = sqlStateOf(cause);
  }
}

/**
 * A single field could not be populated from its column.
 * Contained by the object mapper; never thrown to callers.
 */
export class FieldMappingError extends DomainError {
  constructor(
    readonly record: string,
    readonly property: string,
    readonly column: string,
    readonly reason: string,
    readonly value: string | null,
  ) {
    super(
      `[${record}.${property}] ${reason}, got: ${value === null ? "null" : JSON.stringify(value)}`,
    );
    this.name = "FieldMappingError";
  }
}

function sqlStateOf(cause: unknown): string | undefined {
  if (typeof cause === "object" && cause !== null && "code" in cause) {
    const { code } = cause;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Mask the password of a URI descriptor; configured names pass through
 */
export function redactConnection(connection: string): string {
  if (!/^postgres(ql)?:\/\//i.test(connection)) {
    return connection;
  }
  try {
    const url = new URL(connection);
    if (url.password) {
      url.password = "***";
    }
    return url.toString();
  } catch {
    return "<invalid connection string>";
  }
}
