/**
 * Config infrastructure exports.
 */

export {
  ConfigSchema,
  AgentDefaultsSchema,
  AgentsConfigSchema,
  ProviderConfigSchema,
  ProvidersConfigSchema,
  ExecToolConfigSchema,
  WebSearchConfigSchema,
  WebToolsConfigSchema,
  ToolsConfigSchema,
  SubagentsConfigSchema,
  SchedulerConfigSchema,
  HeartbeatConfigSchema,
  getWorkspacePath,
  getProviderName,
  getApiKey,
  getApiBase,
} from "./schema.js";

export {
  loadConfig,
  saveConfig,
  getConfigPath,
  getDataDir,
  getJobStorePath,
  applyEnvOverrides,
} from "./loader.js";
