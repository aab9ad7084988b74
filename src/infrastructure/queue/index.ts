/**
 * Queue infrastructure exports.
 */

export { MessageBus } from "./message-bus.js";
export {
  DEFAULT_SESSION_KEY,
  createInboundMessage,
  createOutboundMessage,
  formatSessionKey,
  getSessionKey,
  parseSessionKey,
} from "./events.js";
