/**
 * LLM Provider interface.
 */

import type { CoreMessage, CoreTool } from "ai";
import type { ToolCallRequest } from "../types/tool.js";

/**
 * LLM response structure.
 */
export interface LLMResponse {
  content: string | null;
  toolCalls: ToolCallRequest[];
  finishReason: string;
  usage: {
    promptTokens: number;
    completionTokens: number;
  };
}

export interface ChatOptions {
  maxTokens?: number;
  temperature?: number;
  /** Aborts the request (sub-agent cancellation or timeout) */
  signal?: AbortSignal;
}

/**
 * Interface for LLM providers.
 */
export interface ILLMProvider {
  /**
   * Send a chat completion request. Tool calls are returned, never executed.
   */
  chat(
    messages: CoreMessage[],
    tools?: Record<string, CoreTool>,
    model?: string,
    options?: ChatOptions,
  ): Promise<LLMResponse>;

  /**
   * Get the default model.
   */
  getDefaultModel(): string;
}
