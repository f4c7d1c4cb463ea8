/**
 * Text Coercion
 *
 * Converts the textual rendering of a cell into a field's kind.
 * Failures are returned, not thrown, so callers can keep mapping.
 *
 * @example
 * ```typescript
 * coerceText("integer", "25");   // -> { ok: true, value: 25 }
 * coerceText("integer", "2.5");  // -> { ok: false, reason: "not an integer" }
 * coerceText("boolean", "T");    // -> { ok: true, value: true }
 * ```
 */

import type { FieldKind } from "./field.js";

export type CoercionResult =
  | { ok: true; value: unknown }
  | { ok: false; reason: string };

const TRUE_WORDS = new Set(["true", "t", "1", "yes"]);
const FALSE_WORDS = new Set(["false", "f", "0", "no"]);
const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

export function coerceText(kind: FieldKind, text: string): CoercionResult {
  switch (kind) {
    case "string":
      return { ok: true, value: text };
    case "number":
      return coerceNumber(text);
    case "integer":
      return coerceInteger(text);
    case "bigint":
      return coerceBigInt(text);
    case "boolean":
      return coerceBoolean(text);
    case "date":
      return coerceDate(text);
    case "buffer":
      return coerceBuffer(text);
    case "json":
      return coerceJson(text);
  }
}

function coerceNumber(text: string): CoercionResult {
  if (text.trim() === "") {
    return { ok: false, reason: "cannot coerce empty string to number" };
  }
  const value = Number(text);
  if (Number.isNaN(value)) {
    return { ok: false, reason: "not a number" };
  }
  return { ok: true, value };
}

function coerceInteger(text: string): CoercionResult {
  const result = coerceNumber(text);
  if (!result.ok) {
    return result;
  }
  if (!Number.isSafeInteger(result.value)) {
    return { ok: false, reason: "not an integer" };
  }
  return result;
}

function coerceBigInt(text: string): CoercionResult {
  const trimmed = text.trim();
  if (trimmed === "") {
    return { ok: false, reason: "cannot coerce empty string to bigint" };
  }
  try {
    return { ok: true, value: BigInt(trimmed) };
  } catch {
    return { ok: false, reason: "not an integer" };
  }
}

function coerceBoolean(text: string): CoercionResult {
  const word = text.trim().toLowerCase();
  if (TRUE_WORDS.has(word)) {
    return { ok: true, value: true };
  }
  if (FALSE_WORDS.has(word)) {
    return { ok: true, value: false };
  }
  return { ok: false, reason: "not a boolean" };
}

function coerceDate(text: string): CoercionResult {
  if (text.trim() === "") {
    return { ok: false, reason: "cannot coerce empty string to date" };
  }
  const value = new Date(text);
  if (Number.isNaN(value.getTime())) {
    return { ok: false, reason: "invalid date string" };
  }
  return { ok: true, value };
}

function coerceBuffer(text: string): CoercionResult {
  if (text.length % 4 !== 0 || !BASE64.test(text)) {
    return { ok: false, reason: "not base64" };
  }
  return { ok: true, value: Buffer.from(text, "base64") };
}

function coerceJson(text: string): CoercionResult {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    const message = error instanceof Error ? error.message : "invalid JSON";
    return { ok: false, reason: `JSON parse failed: ${message}` };
  }
}
