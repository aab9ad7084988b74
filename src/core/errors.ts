/**
 * Error taxonomy shared by tools, the dispatcher, the scheduler and sub-agents.
 */

export type ErrorKind =
  | "ValidationError"
  | "ExecutionTimeout"
  | "ExecutionError"
  | "SafetyViolation"
  | "JobNotFound"
  | "JobConflict"
  | "TaskNotFound"
  | "ResourceExhausted"
  | "InfrastructureError";

/**
 * Structured error carried by a tool result.
 */
export interface ErrorDetail {
  kind: ErrorKind;
  message: string;
  /** Offending field or argument, when one applies */
  field?: string;
}

/**
 * Base class for errors that map onto an {@link ErrorKind}.
 */
export abstract class RuntimeError extends Error {
  abstract readonly kind: ErrorKind;
  readonly field?: string;

  constructor(message: string, field?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.field = field;
  }

  toDetail(): ErrorDetail {
    return this.field
      ? { kind: this.kind, message: this.message, field: this.field }
      : { kind: this.kind, message: this.message };
  }
}

/** Unknown tool, bad arguments or an invalid schedule. No side effects happened. */
export class ValidationError extends RuntimeError {
  readonly kind = "ValidationError";
}

export class ExecutionTimeoutError extends RuntimeError {
  readonly kind = "ExecutionTimeout";

  constructor(
    readonly timeoutMs: number,
    message = `Timed out after ${timeoutMs / 1000} seconds`,
  ) {
    super(message);
  }
}

/** A tool ran and failed. */
export class ExecutionError extends RuntimeError {
  readonly kind = "ExecutionError";
}

/** A tool refused to run because the call breaks its safety contract. */
export class SafetyViolationError extends RuntimeError {
  readonly kind = "SafetyViolation";
}

export class JobNotFoundError extends RuntimeError {
  readonly kind = "JobNotFound";

  constructor(readonly jobId: string) {
    super(`Job not found: ${jobId}`, "job_id");
  }
}

export class JobConflictError extends RuntimeError {
  readonly kind = "JobConflict";

  constructor(readonly jobName: string) {
    super(`A job named '${jobName}' already exists`, "name");
  }
}

export class TaskNotFoundError extends RuntimeError {
  readonly kind = "TaskNotFound";

  constructor(readonly taskId: string) {
    super(`Sub-agent task not found: ${taskId}`, "task_id");
  }
}

export class ResourceExhaustedError extends RuntimeError {
  readonly kind = "ResourceExhausted";
}

/** Workspace unreachable, store corrupt and the like. Fatal for the operation. */
export class InfrastructureError extends RuntimeError {
  readonly kind = "InfrastructureError";
}

/**
 * Convert anything thrown into an {@link ErrorDetail}.
 */
export function toErrorDetail(error: unknown): ErrorDetail {
  if (error instanceof RuntimeError) {
    return error.toDetail();
  }
  const message = error instanceof Error ? error.message : String(error);
  return { kind: "ExecutionError", message };
}

/**
 * Render an error detail the way tool results and the CLI show it.
 */
export function formatErrorDetail(detail: ErrorDetail): string {
  const field = detail.field ? ` (${detail.field})` : "";
  return `Error [${detail.kind}]${field}: ${detail.message}`;
}
