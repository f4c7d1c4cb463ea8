/**
 * @module main
 * Composition root and package entry point
 */

export * from "../core/index.js";
export * from "../config/index.js";
export * from "../adapters/index.js";
export * from "./create-invoker.js";
