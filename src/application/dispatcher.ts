/**
 * Tool call dispatcher: the single entry point for executing tool calls.
 */

import type { ToolCallRequest, ToolContext, ToolResult } from "../core/types/tool.js";
import {
  ExecutionTimeoutError,
  SafetyViolationError,
  ValidationError,
  formatErrorDetail,
  toErrorDetail,
} from "../core/errors.js";
import { DEFAULT_SESSION_KEY } from "../infrastructure/queue/events.js";
import type { ToolRegistry } from "../tools/registry.js";
import logger from "../utils/logger.js";

const log = logger.child({ component: "dispatcher" });

export interface DispatcherOptions {
  /** Ceiling for any single call */
  timeoutMs?: number;
  /** Longer outputs are cut with a marker */
  maxOutputChars?: number;
}

export interface DispatchContext {
  sessionKey?: string;
  /** Owner's signal (a cancelled sub-agent); aborts the call too */
  signal?: AbortSignal;
}

function truncate(output: string, maxChars: number): string {
  if (output.length <= maxChars) {
    return output;
  }
  return output.slice(0, maxChars) + `\n... (truncated, ${output.length - maxChars} more chars)`;
}

/**
 * Validates and routes tool calls to registered tools.
 *
 * Every request yields exactly one {@link ToolResult}. Validation and
 * safety failures are reported before the tool runs; anything the tool
 * throws is mapped onto an error kind.
 */
export class ToolDispatcher {
  readonly registry: ToolRegistry;
  private timeoutMs: number;
  private maxOutputChars: number;

  constructor(registry: ToolRegistry, options?: DispatcherOptions) {
    this.registry = registry;
    this.timeoutMs = options?.timeoutMs ?? 120_000;
    this.maxOutputChars = options?.maxOutputChars ?? 16_000;
  }

  async dispatch(request: ToolCallRequest, context?: DispatchContext): Promise<ToolResult> {
    const tool = this.registry.get(request.name);
    if (!tool) {
      return this.failure(
        request,
        new ValidationError(`Unknown tool '${request.name}'`, "name"),
      );
    }

    const parsed = tool.parameters.safeParse(request.arguments ?? {});
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue && issue.path.length > 0 ? issue.path.join(".") : undefined;
      const message = issue ? issue.message : "Invalid arguments";
      return this.failure(
        request,
        new ValidationError(`Invalid arguments for '${request.name}': ${message}`, field),
      );
    }
    const params: Record<string, unknown> = parsed.data;

    const warning = tool.checkSafety(params);
    if (warning) {
      log.warn({ tool: tool.name, callId: request.id, warning }, "Tool call blocked");
      return this.failure(request, new SafetyViolationError(warning));
    }

    const timeoutMs = Math.min(tool.timeoutMs ?? this.timeoutMs, this.timeoutMs);
    const controller = new AbortController();
    const onOwnerAbort = () => controller.abort(context?.signal?.reason);
    context?.signal?.addEventListener("abort", onOwnerAbort, { once: true });
    if (context?.signal?.aborted) {
      controller.abort(context.signal.reason);
    }

    const toolContext: ToolContext = {
      signal: controller.signal,
      sessionKey: context?.sessionKey || DEFAULT_SESSION_KEY,
    };

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new ExecutionTimeoutError(timeoutMs);
        controller.abort(error);
        reject(error);
      }, timeoutMs);
    });

    try {
      log.debug({ tool: tool.name, callId: request.id }, "Executing tool");
      const output = await Promise.race([tool.execute(params, toolContext), timeout]);
      return { callId: request.id, output: truncate(output, this.maxOutputChars) };
    } catch (error) {
      if (error instanceof ExecutionTimeoutError) {
        log.warn({ tool: tool.name, callId: request.id, timeoutMs }, "Tool call timed out");
      } else {
        log.error({ error, tool: tool.name, callId: request.id }, "Tool call failed");
      }
      return this.failure(request, error);
    } finally {
      clearTimeout(timer);
      context?.signal?.removeEventListener("abort", onOwnerAbort);
    }
  }

  private failure(request: ToolCallRequest, error: unknown): ToolResult {
    const detail = toErrorDetail(error);
    return { callId: request.id, output: formatErrorDetail(detail), error: detail };
  }
}

/**
 * Whether a tool result reports success.
 */
export function isSuccess(result: ToolResult): boolean {
  return result.error === undefined;
}
