/**
 * Pure functions extracted for testability without mocks
 */
export * from "./datatypes.js";
export * from "./freeze.js";
export * from "./values.js";
