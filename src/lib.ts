/**
 * Library entry point.
 */

export * from "./core/errors.js";
export * from "./core/types/index.js";
export * from "./core/interfaces/index.js";
export * from "./infrastructure/index.js";
export * from "./tools/index.js";
export * from "./application/index.js";
export { systemClock, ManualClock, type Clock } from "./utils/clock.js";
