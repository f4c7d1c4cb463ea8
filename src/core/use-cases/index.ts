/**
 * @module core/use-cases
 * Application use cases
 */

export * from "./invoke-procedure.use-case.js";
