export * from "./ansi.js";
export * from "./clipboard.js";
export * from "./config.js";
export * from "./errors.js";
export * from "./formDefinition.js";
export * from "./formEngine.js";
export * from "./formRegistry.js";
export * from "./formResult.js";
export * from "./formTypes.js";
export * from "./logger.js";
export * from "./navigation.js";
export * from "./questions/index.js";
export * from "./rawInput.js";
export * from "./terminalForm.js";
