/**
 * @module adapters/telemetry
 * OpenTelemetry tracing and metrics
 */

export * from "./tracer.js";
export * from "./metrics.js";
