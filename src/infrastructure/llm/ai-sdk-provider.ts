/**
 * LLM provider backed by the Vercel AI SDK.
 */

import { generateText, type CoreMessage, type CoreTool, type LanguageModel } from "ai";
import { createAnthropic } from "@ai-sdk/anthropic";
import { createOpenAI } from "@ai-sdk/openai";
import type { ChatOptions, ILLMProvider, LLMResponse } from "../../core/interfaces/llm-provider.js";
import type { Config } from "../../core/types/config.js";
import { getApiBase, getApiKey, getProviderName } from "../config/schema.js";

function toArguments(value: unknown): Record<string, unknown> {
  if (typeof value === "object" && value !== null && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}

/**
 * Chat completions through Anthropic or any OpenAI-compatible endpoint.
 *
 * Tools are passed without `execute`, so the SDK only reports tool calls;
 * running them is the dispatcher's job.
 */
export class AIProvider implements ILLMProvider {
  private config: Config;
  private defaultModel: string;

  constructor(options: { config: Config; defaultModel?: string }) {
    this.config = options.config;
    this.defaultModel = options.defaultModel || options.config.agents.defaults.model;
  }

  getDefaultModel(): string {
    return this.defaultModel;
  }

  async chat(
    messages: CoreMessage[],
    tools?: Record<string, CoreTool>,
    model?: string,
    options?: ChatOptions,
  ): Promise<LLMResponse> {
    const modelName = model || this.defaultModel;
    const defaults = this.config.agents.defaults;

    const result = await generateText({
      model: this.resolveModel(modelName),
      messages,
      tools: tools && Object.keys(tools).length > 0 ? tools : undefined,
      maxTokens: options?.maxTokens ?? defaults.maxTokens,
      temperature: options?.temperature ?? defaults.temperature,
      abortSignal: options?.signal,
    });

    return {
      content: result.text || null,
      toolCalls: result.toolCalls.map((tc) => ({
        id: tc.toolCallId,
        name: tc.toolName,
        arguments: toArguments(tc.args),
      })),
      finishReason: result.finishReason,
      usage: {
        promptTokens: result.usage.promptTokens,
        completionTokens: result.usage.completionTokens,
      },
    };
  }

  private resolveModel(model: string): LanguageModel {
    const apiKey = getApiKey(this.config, model);
    const baseURL = getApiBase(this.config, model);
    const modelId = model.includes("/") ? model.slice(model.indexOf("/") + 1) : model;

    if (getProviderName(model) === "anthropic") {
      return createAnthropic({ apiKey, baseURL })(modelId);
    }
    return createOpenAI({ apiKey, baseURL, compatibility: "compatible" })(modelId);
  }
}
