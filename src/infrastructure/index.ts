/**
 * Infrastructure module - external dependencies and implementations.
 */

export * from "./llm/index.js";
export * from "./storage/index.js";
export * from "./queue/index.js";
export * from "./channels/index.js";
export * from "./config/index.js";
