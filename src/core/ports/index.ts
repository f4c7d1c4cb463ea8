/**
 * @module core/ports
 * Ports (interfaces) for hexagonal architecture
 */

export * from "./connection-provider.port.js";
export * from "./telemetry.port.js";
