/**
 * LLM infrastructure exports.
 */

export { AIProvider } from "./ai-sdk-provider.js";
