/**
 * Application module - business logic layer.
 */

export { ToolDispatcher, isSuccess, type DispatcherOptions, type DispatchContext } from "./dispatcher.js";
export { runToolLoop, type ToolLoopOptions, type ToolLoopResult } from "./agent-runner.js";
export { AgentLoop, type AgentLoopOptions } from "./agent-loop.js";
export { ContextBuilder, BOOTSTRAP_FILES } from "./context-builder.js";
export { SkillsLoader, hasBinary, type SkillInfo, type SkillMetadata } from "./skills-loader.js";
export { SubagentManager, type SubagentManagerOptions } from "./subagent.js";
export { Scheduler, computeNextRun, validateSchedule, type SchedulerOptions } from "./scheduler.js";
export {
  HeartbeatRunner,
  parseChecklist,
  markItemDone,
  resolveItem,
  type HeartbeatRunnerOptions,
} from "./heartbeat.js";
export { createRuntime, createWorkerTools, type Runtime, type RuntimeOptions } from "./runtime.js";
