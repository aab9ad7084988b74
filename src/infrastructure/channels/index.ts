/**
 * Channels exports.
 */

export { BaseChannel, type ChannelOptions } from "./base.js";
export { ConsoleChannel, type ConsoleChannelOptions } from "./console.js";
export { ChannelManager } from "./manager.js";
