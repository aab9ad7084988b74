/**
 * Tool types and interfaces.
 */

import type { z } from "zod";
import type { ErrorDetail } from "../errors.js";

/**
 * Tool call request from the LLM.
 */
export interface ToolCallRequest {
  /** Call identifier, echoed back in the result */
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

/**
 * Per-call execution context handed to a tool.
 */
export interface ToolContext {
  /** Fires when the call times out or its owner is cancelled */
  signal: AbortSignal;
  /** Session the call belongs to (channel:chat_id) */
  sessionKey: string;
}

/**
 * Tool definition interface.
 */
export interface ITool {
  /** Tool name used in function calls */
  readonly name: string;
  /** Description of what the tool does */
  readonly description: string;
  /** Zod schema for tool parameters */
  readonly parameters: z.ZodObject<z.ZodRawShape>;
  /** Per-call time limit; the dispatcher's ceiling applies when larger or unset */
  readonly timeoutMs?: number;
  /** Execute the tool with validated parameters */
  execute(params: Record<string, unknown>, context: ToolContext): Promise<string>;
  /** Return a warning when a call must not run automatically */
  checkSafety(params: Record<string, unknown>): string | null;
}

/**
 * Outcome of one dispatched tool call. Exactly one per request.
 */
export interface ToolResult {
  callId: string;
  output: string;
  error?: ErrorDetail;
}
