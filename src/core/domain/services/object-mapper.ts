/**
 * Object Mapper
 *
 * Maps raw rows onto a record schema. Fields are matched to columns by
 * lower-cased name; each matched cell is coerced to the field's kind.
 *
 * Mapping is best-effort per field: a field that cannot be populated keeps
 * its default, the failure is logged and reported, and the rest of the row
 * is still mapped.
 */

import { FieldMappingError } from "../errors/index.js";
import { coerceText } from "../schema/coercion.js";
import type { RecordSchema, SchemaField } from "../schema/record-schema.js";
import type { RawRow, RowSet } from "./row-materializer.js";

export interface RowMappingReport {
  /** Properties populated from the row */
  assigned: string[];
  failures: FieldMappingError[];
}

export interface RowMapping<T> {
  value: T;
  report: RowMappingReport;
}

export interface ObjectMapperConfig {
  /** Write field failures to the console (default: true) */
  logFieldErrors: boolean;
  /** Called once per contained field failure */
  onFieldError?: (error: FieldMappingError) => void;
}

const DEFAULT_CONFIG: ObjectMapperConfig = {
  logFieldErrors: true,
};

export class ObjectMapper {
  private readonly config: ObjectMapperConfig;

  constructor(config: Partial<ObjectMapperConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Schema fields whose column appears in the row
   */
  matchColumns<T>(schema: RecordSchema<T>, row: RawRow): SchemaField[] {
    return schema.fields.filter((schemaField) => row.has(schemaField.column));
  }

  /**
   * Map every row; the column intersection is computed once from the first row
   */
  mapRows<T>(rows: RowSet, schema: RecordSchema<T>): RowMapping<T>[] {
    const first = rows[0];
    if (!first) {
      return [];
    }

    const matched = this.matchColumns(schema, first);
    return rows.map((row) => this.mapRow(row, schema, matched));
  }

  mapRow<T>(
    row: RawRow,
    schema: RecordSchema<T>,
    matched: readonly SchemaField[] = this.matchColumns(schema, row),
  ): RowMapping<T> {
    const values = schema.defaults();
    const report: RowMappingReport = { assigned: [], failures: [] };

    for (const { property, column, definition } of matched) {
      const text = row.get(column) ?? null;

      if (text === null) {
        if (definition.nullable) {
          values[property] = null;
          report.assigned.push(property);
        } else {
          this.fail(
            report,
            new FieldMappingError(
              schema.name,
              property,
              column,
              "null value for non-optional field",
              null,
            ),
          );
        }
        continue;
      }

      const result = coerceText(definition.kind, text);
      if (result.ok) {
        values[property] = result.value;
        report.assigned.push(property);
      } else {
        this.fail(
          report,
          new FieldMappingError(
            schema.name,
            property,
            column,
            result.reason,
            text,
          ),
        );
      }
    }

    return { value: schema.build(values), report };
  }

  private fail(report: RowMappingReport, error: FieldMappingError): void {
    report.failures.push(error);

    if (this.config.logFieldErrors) {
      console.warn(`[ObjectMapper] Error parsing ${error.column}: ${error.message}`);
    }
    this.config.onFieldError?.(error);
  }
}
