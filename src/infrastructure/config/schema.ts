/**
 * Configuration schema.
 */

import { z } from "zod";
import { expandUser } from "../../utils/paths.js";

/** Longest delay a Node timer accepts, in whole seconds */
export const MAX_TIMER_SECONDS = 2_147_483;

const timerSeconds = () => z.number().int().positive().max(MAX_TIMER_SECONDS);

export const AgentDefaultsSchema = z.object({
  workspace: z.string().default("~/.tendril/workspace"),
  model: z.string().default("anthropic/claude-sonnet-4-5"),
  maxTokens: z.number().int().positive().default(8192),
  temperature: z.number().min(0).max(2).default(0.7),
  maxToolIterations: z.number().int().positive().default(20),
});

export const AgentsConfigSchema = z.object({
  defaults: AgentDefaultsSchema.default({}),
});

export const ProviderConfigSchema = z.object({
  apiKey: z.string().default(""),
  apiBase: z.string().optional(),
});

export const ProvidersConfigSchema = z.object({
  anthropic: ProviderConfigSchema.default({}),
  openai: ProviderConfigSchema.default({}),
});

export const ExecToolConfigSchema = z.object({
  timeoutSeconds: timerSeconds().default(60),
});

export const WebSearchConfigSchema = z.object({
  apiKey: z.string().default(""),
  maxResults: z.number().int().min(1).max(10).default(5),
});

export const WebToolsConfigSchema = z.object({
  search: WebSearchConfigSchema.default({}),
});

export const ToolsConfigSchema = z.object({
  /** Ceiling for any single tool call */
  timeoutSeconds: timerSeconds().default(120),
  maxOutputChars: z.number().int().positive().default(16000),
  restrictToWorkspace: z.boolean().default(false),
  exec: ExecToolConfigSchema.default({}),
  web: WebToolsConfigSchema.default({}),
});

export const SubagentsConfigSchema = z.object({
  maxConcurrent: z.number().int().positive().default(3),
  /** What to do with a spawn request when all slots are busy */
  overflow: z.enum(["queue", "reject"]).default("queue"),
  maxIterations: z.number().int().positive().default(15),
  timeoutSeconds: timerSeconds().default(900),
});

export const SchedulerConfigSchema = z.object({
  enabled: z.boolean().default(true),
  /** Longest sleep between store checks */
  tickSeconds: timerSeconds().default(10),
});

export const HeartbeatConfigSchema = z.object({
  enabled: z.boolean().default(true),
  intervalSeconds: timerSeconds().default(30 * 60),
  file: z.string().default("HEARTBEAT.md"),
});

export const ConfigSchema = z.object({
  agents: AgentsConfigSchema.default({}),
  providers: ProvidersConfigSchema.default({}),
  tools: ToolsConfigSchema.default({}),
  subagents: SubagentsConfigSchema.default({}),
  scheduler: SchedulerConfigSchema.default({}),
  heartbeat: HeartbeatConfigSchema.default({}),
});

type ConfigShape = z.infer<typeof ConfigSchema>;

/**
 * Get the expanded workspace path.
 */
export function getWorkspacePath(config: ConfigShape): string {
  return expandUser(config.agents.defaults.workspace);
}

/**
 * Provider that serves a model name ("anthropic/..." or "claude-..." go to
 * Anthropic, everything else to the OpenAI-compatible endpoint).
 */
export function getProviderName(model: string): "anthropic" | "openai" {
  const lower = model.toLowerCase();
  return lower.startsWith("anthropic/") || lower.startsWith("claude") ? "anthropic" : "openai";
}

/**
 * Get the API key for a model's provider.
 */
export function getApiKey(config: ConfigShape, model?: string): string | undefined {
  const provider = getProviderName(model || config.agents.defaults.model);
  return config.providers[provider].apiKey || undefined;
}

/**
 * Get the API base URL for a model's provider.
 */
export function getApiBase(config: ConfigShape, model?: string): string | undefined {
  const provider = getProviderName(model || config.agents.defaults.model);
  return config.providers[provider].apiBase;
}
