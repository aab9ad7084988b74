/**
 * Core interface exports.
 */

export * from "./llm-provider.js";
export * from "./storage.js";
export * from "./message-bus.js";
export * from "./channel.js";
export * from "./scheduler.js";
export * from "./subagent.js";
