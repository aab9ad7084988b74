/**
 * Core type exports.
 */

export * from "./tool.js";
export * from "./message.js";
export * from "./scheduler.js";
export * from "./subagent.js";
export * from "./heartbeat.js";
export * from "./session.js";
export type { Config } from "./config.js";
