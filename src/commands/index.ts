// Barrel export for all CLI commands

export { BindingsCommand } from "./bindings.command.js";
export { ComposeCommand } from "./compose.command.js";
export { FragmentsCommand } from "./fragments.command.js";
export { ValidateCommand } from "./validate.command.js";
