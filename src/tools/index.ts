/**
 * Tools module - tool implementations and registry.
 */

export { Tool, zodToJsonSchema, type FunctionSchema } from "./base.js";
export { ToolRegistry } from "./registry.js";
export { ReadFileTool, WriteFileTool, EditFileTool, ListDirTool } from "./fs.js";
export { ExecTool } from "./exec.js";
export { WebSearchTool, WebFetchTool } from "./web.js";
export { MessageTool } from "./message.js";
export { SpawnTool, SubagentStatusTool, SubagentCancelTool } from "./spawn.js";
export { CronTool, buildSchedule, describeSchedule } from "./cron.js";
