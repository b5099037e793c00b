/**
 * Library entry point: the engine without the CLI
 */
export * from "./fragments/index.js";
export * from "./model/index.js";
export * from "./pure/index.js";
export * from "./schemas/index.js";
export { parseDocument, readDocument } from "./utils/documents.js";
