/**
 * @module core/domain
 * Errors, record schemas, value objects and mapping services
 */

export * from "./errors/index.js";
export * from "./schema/index.js";
export * from "./value-objects/index.js";
export * from "./services/index.js";
