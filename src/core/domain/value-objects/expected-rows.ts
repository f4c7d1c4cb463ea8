/**
 * Expected Rows Value Object
 *
 * How many rows a procedure call is expected to produce.
 * Advisory only: the row count actually returned is never validated.
 */

export type ExpectedRows = "NONE" | "ONE" | "MANY";

export function expectsResultSet(expected: ExpectedRows): boolean {
  return expected !== "NONE";
}
