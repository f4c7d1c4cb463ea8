/**
 * Field Builders
 *
 * Fluent, immutable descriptors for the fields of a record schema.
 *
 * @example
 * ```typescript
 * const id = field.integer();
 * const email = field.string().optional();
 * const isActive = field.boolean().default(true);
 * const createdAt = field.date().column("created_at");
 * ```
 */

export type FieldKind =
  | "string"
  | "number"
  | "integer"
  | "bigint"
  | "boolean"
  | "date"
  | "buffer"
  | "json";

export class FieldBuilder<T> {
  constructor(
    readonly kind: FieldKind,
    private readonly makeDefault: () => T,
    readonly nullable: boolean = false,
    readonly columnName?: string,
  ) {}

  /**
   * Allow null cells; the field defaults to null
   */
  optional(): FieldBuilder<T | null> {
    return new FieldBuilder<T | null>(
      this.kind,
      () => null,
      true,
      this.columnName,
    );
  }

  /**
   * Value the field keeps when its column is missing or fails to coerce.
   * Pass a function for mutable values such as dates.
   */
  default(value: T | (() => T)): FieldBuilder<T> {
    const makeDefault = isFactory(value) ? value : () => value;
    return new FieldBuilder<T>(
      this.kind,
      makeDefault,
      this.nullable,
      this.columnName,
    );
  }

  /**
   * Read from a differently named column (matched case-insensitively)
   */
  column(name: string): FieldBuilder<T> {
    return new FieldBuilder<T>(
      this.kind,
      this.makeDefault,
      this.nullable,
      name,
    );
  }

  defaultValue(): T {
    return this.makeDefault();
  }
}

function isFactory<T>(value: T | (() => T)): value is () => T {
  return typeof value === "function";
}

export const field = {
  string: () => new FieldBuilder<string>("string", () => ""),
  number: () => new FieldBuilder<number>("number", () => 0),
  integer: () => new FieldBuilder<number>("integer", () => 0),
  bigint: () => new FieldBuilder<bigint>("bigint", () => BigInt(0)),
  boolean: () => new FieldBuilder<boolean>("boolean", () => false),
  date: () => new FieldBuilder<Date>("date", () => new Date(0)),
  buffer: () => new FieldBuilder<Buffer>("buffer", () => Buffer.alloc(0)),
  json: <T = unknown>() =>
    new FieldBuilder<T | null>("json", () => null, true),
};
