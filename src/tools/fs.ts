/**
 * File system tools: read, write, edit, list directory.
 *
 * All access goes through the workspace state manager, so edits from the
 * main session, sub-agents and the heartbeat runner never tear a file.
 */

import { z } from "zod";
import { Tool } from "./base.js";
import type { IWorkspaceState } from "../core/interfaces/storage.js";
import { ExecutionError } from "../core/errors.js";

/**
 * Tool to read file contents.
 */
export class ReadFileTool extends Tool {
  readonly name = "read_file";
  readonly description = "Read the contents of a file at the given path.";
  readonly parameters = z.object({
    path: z.string().min(1).describe("The file path to read"),
  });

  constructor(private workspace: IWorkspaceState) {
    super();
  }

  async execute(params: { path: string }): Promise<string> {
    const stats = await this.workspace.stat(params.path);
    if (!stats) {
      throw new ExecutionError(`File not found: ${params.path}`, "path");
    }
    if (!stats.isFile) {
      throw new ExecutionError(`Not a file: ${params.path}`, "path");
    }
    return this.workspace.read(params.path);
  }
}

/**
 * Tool to write content to a file.
 */
export class WriteFileTool extends Tool {
  readonly name = "write_file";
  readonly description =
    "Write content to a file at the given path. Creates parent directories if needed.";
  readonly parameters = z.object({
    path: z.string().min(1).describe("The file path to write to"),
    content: z.string().describe("The content to write"),
  });

  constructor(private workspace: IWorkspaceState) {
    super();
  }

  async execute(params: { path: string; content: string }): Promise<string> {
    await this.workspace.write(params.path, params.content);
    return `Successfully wrote ${Buffer.byteLength(params.content, "utf-8")} bytes to ${params.path}`;
  }
}

/**
 * Tool to edit a file by replacing text.
 */
export class EditFileTool extends Tool {
  readonly name = "edit_file";
  readonly description =
    "Edit a file by replacing old_text with new_text. The old_text must exist exactly once in the file.";
  readonly parameters = z.object({
    path: z.string().min(1).describe("The file path to edit"),
    old_text: z.string().min(1).describe("The exact text to find and replace"),
    new_text: z.string().describe("The text to replace with"),
  });

  constructor(private workspace: IWorkspaceState) {
    super();
  }

  async execute(params: { path: string; old_text: string; new_text: string }): Promise<string> {
    if (!(await this.workspace.exists(params.path))) {
      throw new ExecutionError(`File not found: ${params.path}`, "path");
    }

    await this.workspace.readModifyWrite(params.path, (content) => {
      const count = content.split(params.old_text).length - 1;
      if (count === 0) {
        throw new ExecutionError("old_text not found in file. Make sure it matches exactly.", "old_text");
      }
      if (count > 1) {
        throw new ExecutionError(
          `old_text appears ${count} times. Provide more context to make it unique.`,
          "old_text",
        );
      }
      // Function replacement keeps "$&"-style patterns in new_text literal
      return content.replace(params.old_text, () => params.new_text);
    });

    return `Successfully edited ${params.path}`;
  }
}

/**
 * Tool to list directory contents.
 */
export class ListDirTool extends Tool {
  readonly name = "list_dir";
  readonly description = "List the contents of a directory.";
  readonly parameters = z.object({
    path: z.string().default(".").describe("The directory path to list"),
  });

  constructor(private workspace: IWorkspaceState) {
    super();
  }

  async execute(params: { path: string }): Promise<string> {
    const stats = await this.workspace.stat(params.path);
    if (!stats) {
      throw new ExecutionError(`Directory not found: ${params.path}`, "path");
    }
    if (!stats.isDirectory) {
      throw new ExecutionError(`Not a directory: ${params.path}`, "path");
    }

    const items = await this.workspace.list(params.path);
    if (items.length === 0) {
      return `Directory ${params.path} is empty`;
    }

    return items.map((item) => `${item.isDirectory ? "[DIR] " : "      "}${item.name}`).join("\n");
  }
}
