/**
 * @module core/domain/services
 * Row materialization and object mapping
 */

export * from "./row-materializer.js";
export * from "./object-mapper.js";
