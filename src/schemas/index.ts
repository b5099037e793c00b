/**
 * Centralized schema exports for external interface validation
 */
export * from "./config.schemas.js";
export * from "./data.schemas.js";
export * from "./fragment.schemas.js";
