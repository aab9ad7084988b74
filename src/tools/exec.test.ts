import { mkdtempSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { describe, expect, it } from "vitest";
import { WorkspaceState } from "../infrastructure/storage/workspace-state.js";
import { ExecTool } from "./exec.js";

describe("ExecTool.checkSafety", () => {
  const tool = new ExecTool({
    workspace: new WorkspaceState(mkdtempSync(join(tmpdir(), "exec-"))),
    timeoutMs: 5000,
  });

  it.each([
    ["rm -rf /", "recursive delete"],
    ["rm --recursive build", "recursive delete"],
    ["mkfs.ext4 /dev/sda1", "disk format"],
    ["dd if=/dev/zero of=/dev/sda", "raw disk write"],
    ["echo x > /dev/sda", "raw disk write"],
    ["sudo shutdown -h now", "system power change"],
    [":(){ :|:& };:", "fork bomb"],
    ["pkill node", "process termination"],
  ])("refuses %s", (command, reason) => {
    expect(tool.checkSafety({ command })).toBe(
      `Command refused by safety guard (${reason}): ${command}`,
    );
  });

  it.each(["ls -la", "rm notes.txt", "git status", "echo formatted"])("allows %s", (command) => {
    expect(tool.checkSafety({ command })).toBeNull();
  });

  it("takes its time limit from options", () => {
    expect(tool.timeoutMs).toBe(5000);
  });
});
