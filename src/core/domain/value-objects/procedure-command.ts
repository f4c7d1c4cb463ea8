/**
 * Procedure Command Value Object
 *
 * SQL text and positional values for one stored-procedure call, using
 * PostgreSQL named notation (`param => $n`).
 *
 * - NONE:  CALL proc(a => $1, b => $2)
 * - ONE:   SELECT * FROM proc(a => $1, b => $2) LIMIT 1
 * - MANY:  SELECT * FROM proc(a => $1, b => $2)
 *
 * Names are emitted unquoted, so the server folds them to lower case.
 */

import { ProcedureError } from "../errors/index.js";
import type { ExpectedRows } from "./expected-rows.js";

/** Caller record whose own fields become named parameters */
export type ParameterBag = object;

export interface BoundParameter {
  name: string;
  value: unknown;
}

export interface ProcedureCommand {
  procedure: string;
  parameters: BoundParameter[];
  text: string;
  values: unknown[];
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_$]*$/;

export function isSqlIdentifier(name: string): boolean {
  return IDENTIFIER.test(name);
}

/**
 * Apply a default schema and validate a (possibly qualified) procedure name
 */
export function qualifyProcedureName(
  procedure: string,
  defaultSchema?: string,
): string {
  const parts = procedure.split(".");
  if (parts.length > 2 || !parts.every(isSqlIdentifier)) {
    throw new ProcedureError(procedure, "invalid procedure name");
  }
  if (parts.length === 1 && defaultSchema) {
    if (!isSqlIdentifier(defaultSchema)) {
      throw new ProcedureError(procedure, `invalid schema name "${defaultSchema}"`);
    }
    return `${defaultSchema}.${procedure}`;
  }
  return procedure;
}

/**
 * One parameter per own enumerable field, named verbatim.
 * Functions are skipped and undefined binds as null.
 */
export function bindParameters(
  procedure: string,
  params?: ParameterBag | null,
): BoundParameter[] {
  if (params === undefined || params === null) {
    return [];
  }

  const bound: BoundParameter[] = [];
  for (const [name, value] of Object.entries(params)) {
    if (typeof value === "function") {
      continue;
    }
    if (!isSqlIdentifier(name)) {
      throw new ProcedureError(procedure, `invalid parameter name "${name}"`);
    }
    bound.push({ name, value: value === undefined ? null : value });
  }
  return bound;
}

export function buildProcedureCommand(
  procedure: string,
  parameters: BoundParameter[],
  expected: ExpectedRows,
): ProcedureCommand {
  const argumentList = parameters
    .map((parameter, index) => `${parameter.name} => $${index + 1}`)
    .join(", ");
  const invocation = `${procedure}(${argumentList})`;

  return {
    procedure,
    parameters,
    text: statementFor(invocation, expected),
    values: parameters.map((parameter) => parameter.value),
  };
}

function statementFor(invocation: string, expected: ExpectedRows): string {
  switch (expected) {
    case "NONE":
      return `CALL ${invocation}`;
    case "ONE":
      return `SELECT * FROM ${invocation} LIMIT 1`;
    case "MANY":
      return `SELECT * FROM ${invocation}`;
  }
}
