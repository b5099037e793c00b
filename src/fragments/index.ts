export * from "./errors.js";
export * from "./fragment.types.js";
export * from "./fragment-loader.service.js";
export * from "./fragment-registry.service.js";
export * from "./fragments.module.js";
export * from "./reference-resolver.service.js";
