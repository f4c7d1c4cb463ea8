/**
 * @module adapters/persistence
 * PostgreSQL persistence adapter
 */

export * from "./pg-executor.js";
export * from "./pg-connection-provider.js";
