/**
 * @module core/domain/schema
 * Record schemas describing mapping targets
 */

export * from "./field.js";
export * from "./record-schema.js";
export * from "./coercion.js";
