/**
 * @module config
 * Environment-driven configuration
 */

export * from "./data-access-config.js";
