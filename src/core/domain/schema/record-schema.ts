/**
 * Record Schema
 *
 * Explicit field-to-column table for one target type, built once and reused
 * for every row mapped into that type.
 *
 * @example
 * ```typescript
 * const User = defineRecord("User", {
 *   id: field.integer(),
 *   userName: field.string(),
 *   email: field.string().optional(),
 *   createdAt: field.date().column("created_at"),
 * });
 *
 * type User = InferRecord<typeof User>;
 * ```
 */

import type { FieldBuilder } from "./field.js";

export type FieldShape = Record<string, FieldBuilder<unknown>>;

export type InferShape<S extends FieldShape> = {
  [K in keyof S]: S[K] extends FieldBuilder<infer T> ? T : never;
};

export interface SchemaField {
  /** Property on the mapped object */
  readonly property: string;
  /** Lower-cased column the property reads from */
  readonly column: string;
  readonly definition: FieldBuilder<unknown>;
}

export interface RecordSchema<T> {
  readonly name: string;
  readonly fields: readonly SchemaField[];
  /** Fresh property bag holding every field's default value */
  defaults(): Record<string, unknown>;
  /** Turn a fully populated property bag into the target object */
  build(values: Record<string, unknown>): T;
}

export type InferRecord<R> = R extends RecordSchema<infer T> ? T : never;

export function defineRecord<S extends FieldShape>(
  name: string,
  shape: S,
): RecordSchema<InferShape<S>>;
export function defineRecord<S extends FieldShape, T>(
  name: string,
  shape: S,
  create: (values: InferShape<S>) => T,
): RecordSchema<T>;
export function defineRecord<S extends FieldShape, T>(
  name: string,
  shape: S,
  create?: (values: InferShape<S>) => T,
): RecordSchema<InferShape<S> | T> {
  const fields: SchemaField[] = Object.entries(shape).map(
    ([property, definition]) => ({
      property,
      column: (definition.columnName ?? property).toLowerCase(),
      definition,
    }),
  );

  return {
    name,
    fields,
    defaults() {
      const values: Record<string, unknown> = {};
      for (const { property, definition } of fields) {
        values[property] = definition.defaultValue();
      }
      return values;
    },
    build(values) {
      // Every property was seeded by defaults() and only overwritten with a
      // value of its own kind, so the bag has the inferred shape.
      const record = values as InferShape<S>;
      return create ? create(record) : record;
    },
  };
}
