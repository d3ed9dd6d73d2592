/**
 * Configuration Module
 *
 * @module
 */

export * from "./settings.js";
export * from "./source-config.js";
