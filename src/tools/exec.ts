/**
 * Shell execution tool.
 */

import { z } from "zod";
import { spawn, type ChildProcess } from "child_process";
import { Tool } from "./base.js";
import type { ToolContext } from "../core/types/tool.js";
import type { IWorkspaceState } from "../core/interfaces/storage.js";
import { ExecutionError } from "../core/errors.js";

/**
 * Commands that are never run automatically: recursive deletes, disk
 * formatting, raw device writes, power state changes, fork bombs and
 * process termination.
 */
const DENY_PATTERNS: Array<[RegExp, string]> = [
  [/\brm\s+(-[a-zA-Z]*[rR][a-zA-Z]*|--recursive)\b/, "recursive delete"],
  [/\b(del|erase)\s+\/[fsq]\b/i, "forced delete"],
  [/\brmdir\s+\/s\b/i, "recursive delete"],
  [/(?:^|[;&|]\s*)format\b/i, "disk format"],
  [/\b(mkfs(\.\w+)?|diskpart)\b/, "disk format"],
  [/\bdd\s+if=/, "raw disk write"],
  [/>\s*\/dev\/(sd|nvme|hd)/, "raw disk write"],
  [/\b(shutdown|reboot|poweroff|halt)\b/, "system power change"],
  [/:\(\)\s*\{.*\};\s*:/, "fork bomb"],
  [/\b(kill|pkill|killall|taskkill)\b/, "process termination"],
];

const MAX_OUTPUT_CHARS = 10000;

function terminate(child: ChildProcess): void {
  if (child.exitCode !== null || child.pid === undefined) {
    return;
  }
  try {
    if (process.platform === "win32") {
      child.kill("SIGKILL");
    } else {
      // Negative pid: the whole process group started by the shell
      process.kill(-child.pid, "SIGKILL");
    }
  } catch {
    child.kill("SIGKILL");
  }
}

/**
 * Tool to execute shell commands.
 */
export class ExecTool extends Tool {
  readonly name = "exec";
  readonly description =
    "Execute a shell command and return its output. Destructive commands are refused.";
  readonly parameters = z.object({
    command: z.string().min(1).describe("The shell command to execute"),
    working_dir: z.string().optional().describe("Optional working directory for the command"),
  });
  readonly timeoutMs: number;

  private workspace: IWorkspaceState;

  constructor(options: { workspace: IWorkspaceState; timeoutMs?: number }) {
    super();
    this.workspace = options.workspace;
    this.timeoutMs = options.timeoutMs || 60000;
  }

  checkSafety(params: Record<string, unknown>): string | null {
    const command = typeof params.command === "string" ? params.command : "";
    for (const [pattern, reason] of DENY_PATTERNS) {
      if (pattern.test(command)) {
        return `Command refused by safety guard (${reason}): ${command}`;
      }
    }
    return null;
  }

  async execute(
    params: { command: string; working_dir?: string },
    context: ToolContext,
  ): Promise<string> {
    const cwd = this.workspace.resolve(params.working_dir ?? ".");

    return new Promise((resolve, reject) => {
      const stdoutParts: string[] = [];
      const stderrParts: string[] = [];

      const child = spawn(params.command, {
        shell: true,
        cwd,
        env: process.env,
        detached: process.platform !== "win32",
      });

      const onAbort = () => terminate(child);
      context.signal.addEventListener("abort", onAbort, { once: true });
      if (context.signal.aborted) {
        terminate(child);
      }

      child.stdout?.on("data", (data: Buffer) => {
        stdoutParts.push(data.toString());
      });

      child.stderr?.on("data", (data: Buffer) => {
        stderrParts.push(data.toString());
      });

      child.on("close", (code) => {
        context.signal.removeEventListener("abort", onAbort);

        const result: string[] = [];
        if (stdoutParts.length > 0) {
          result.push(stdoutParts.join(""));
        }
        const stderr = stderrParts.join("").trim();
        if (stderr) {
          result.push(`STDERR:\n${stderr}`);
        }
        if (code !== 0) {
          result.push(`\nExit code: ${code}`);
        }

        let output = result.length > 0 ? result.join("\n") : "(no output)";
        if (output.length > MAX_OUTPUT_CHARS) {
          output =
            output.slice(0, MAX_OUTPUT_CHARS) +
            `\n... (truncated, ${output.length - MAX_OUTPUT_CHARS} more chars)`;
        }

        resolve(output);
      });

      child.on("error", (error) => {
        context.signal.removeEventListener("abort", onAbort);
        reject(new ExecutionError(`Error executing command: ${error.message}`, "command"));
      });
    });
  }
}
