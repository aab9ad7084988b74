/**
 * The LLM/tool loop shared by the main agent and sub-agents.
 */

import type { CoreAssistantMessage, CoreMessage, CoreToolMessage } from "ai";
import type { ChatOptions, ILLMProvider } from "../core/interfaces/llm-provider.js";
import type { ToolResult } from "../core/types/tool.js";
import type { ToolDispatcher } from "./dispatcher.js";
import logger from "../utils/logger.js";

export interface ToolLoopOptions {
  provider: ILLMProvider;
  dispatcher: ToolDispatcher;
  /** Conversation so far; the loop appends to it */
  messages: CoreMessage[];
  sessionKey: string;
  maxIterations: number;
  model?: string;
  chatOptions?: Omit<ChatOptions, "signal">;
  /** Checked before every LLM call and every tool call */
  signal?: AbortSignal;
  /** Log bindings for this run */
  logContext?: Record<string, unknown>;
}

export interface ToolLoopResult {
  /** Final assistant text, or null when the iteration limit was hit */
  content: string | null;
  iterations: number;
  toolResults: ToolResult[];
}

/**
 * Call the model until it answers without tool calls.
 *
 * Tool calls run one at a time, each awaited before the next, through
 * the dispatcher. Aborting the signal throws its reason at the next
 * step; the in-flight LLM or tool call sees the same signal.
 */
export async function runToolLoop(options: ToolLoopOptions): Promise<ToolLoopResult> {
  const { provider, dispatcher, messages, signal } = options;
  const log = logger.child({ component: "agent-runner", ...options.logContext });
  const toolResults: ToolResult[] = [];

  let iteration = 0;
  while (iteration < options.maxIterations) {
    iteration++;
    signal?.throwIfAborted();

    const response = await provider.chat(
      messages,
      dispatcher.registry.getDefinitions(),
      options.model,
      { ...options.chatOptions, signal },
    );

    if (response.toolCalls.length === 0) {
      return { content: response.content, iterations: iteration, toolResults };
    }

    const assistant: CoreAssistantMessage = {
      role: "assistant",
      content: [
        ...(response.content ? [{ type: "text" as const, text: response.content }] : []),
        ...response.toolCalls.map((tc) => ({
          type: "tool-call" as const,
          toolCallId: tc.id,
          toolName: tc.name,
          args: tc.arguments,
        })),
      ],
    };
    messages.push(assistant);

    for (const toolCall of response.toolCalls) {
      signal?.throwIfAborted();
      log.debug({ tool: toolCall.name, callId: toolCall.id }, "Tool call");

      const result = await dispatcher.dispatch(toolCall, {
        sessionKey: options.sessionKey,
        signal,
      });
      toolResults.push(result);

      const toolMessage: CoreToolMessage = {
        role: "tool",
        content: [
          {
            type: "tool-result",
            toolCallId: toolCall.id,
            toolName: toolCall.name,
            result: result.output,
            isError: result.error !== undefined,
          },
        ],
      };
      messages.push(toolMessage);
    }
  }

  log.warn({ iterations: iteration }, "Tool loop hit the iteration limit");
  return { content: null, iterations: iteration, toolResults };
}
