export * from "./binding-table.service.js";
export * from "./composer.service.js";
export * from "./model-catalog.service.js";
export * from "./model.module.js";
export * from "./model.types.js";
export * from "./validator.service.js";
