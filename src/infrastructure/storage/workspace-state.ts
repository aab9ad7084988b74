/**
 * Workspace state manager: every read and write of workspace files goes
 * through here.
 */

import { appendFile, mkdir, readFile, readdir, stat } from "fs/promises";
import { dirname, isAbsolute, relative, resolve as resolvePath } from "path";
import type { IWorkspaceState, WorkspaceEntry } from "../../core/interfaces/storage.js";
import { InfrastructureError, ValidationError } from "../../core/errors.js";
import { KeyedMutex } from "../../utils/mutex.js";
import { atomicWriteFile, expandUser } from "../../utils/paths.js";

function isErrno(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

/**
 * Atomic file primitives over one workspace root.
 *
 * Appends, writes and read-modify-write cycles on the same file are
 * serialized by a per-path lock. Writes land through a temp file and
 * rename, so readers see either the old or the new content.
 */
export class WorkspaceState implements IWorkspaceState {
  readonly root: string;
  private restrictToWorkspace: boolean;
  private locks = new KeyedMutex();

  constructor(root: string, options?: { restrictToWorkspace?: boolean }) {
    this.root = resolvePath(expandUser(root));
    this.restrictToWorkspace = options?.restrictToWorkspace ?? false;
  }

  resolve(path: string): string {
    const expanded = expandUser(path);
    const full = isAbsolute(expanded) ? resolvePath(expanded) : resolvePath(this.root, expanded);

    if (this.restrictToWorkspace) {
      const rel = relative(this.root, full);
      if (rel.startsWith("..") || isAbsolute(rel)) {
        throw new ValidationError(`Path is outside the workspace: ${path}`, "path");
      }
    }

    return full;
  }

  async read(path: string): Promise<string> {
    const full = this.resolve(path);
    try {
      return await readFile(full, "utf-8");
    } catch (error) {
      if (isErrno(error, "ENOENT")) {
        return "";
      }
      throw this.wrap(error, "read", path);
    }
  }

  async append(path: string, text: string): Promise<void> {
    const full = this.resolve(path);
    await this.locks.runExclusive(full, async () => {
      try {
        await mkdir(dirname(full), { recursive: true });
        // One write call with O_APPEND, so other processes cannot split it either
        await appendFile(full, text, { encoding: "utf-8", flag: "a" });
      } catch (error) {
        throw this.wrap(error, "append to", path);
      }
    });
  }

  async write(path: string, content: string): Promise<void> {
    const full = this.resolve(path);
    await this.locks.runExclusive(full, async () => {
      try {
        await atomicWriteFile(full, content);
      } catch (error) {
        throw this.wrap(error, "write", path);
      }
    });
  }

  async readModifyWrite(
    path: string,
    fn: (current: string) => string | Promise<string>,
  ): Promise<string> {
    const full = this.resolve(path);
    return this.locks.runExclusive(full, async () => {
      const current = await this.read(full);
      const next = await fn(current);
      if (next !== current) {
        try {
          await atomicWriteFile(full, next);
        } catch (error) {
          throw this.wrap(error, "write", path);
        }
      }
      return next;
    });
  }

  async exists(path: string): Promise<boolean> {
    return (await this.stat(path)) !== null;
  }

  async stat(path: string): Promise<{ isFile: boolean; isDirectory: boolean } | null> {
    const full = this.resolve(path);
    try {
      const stats = await stat(full);
      return { isFile: stats.isFile(), isDirectory: stats.isDirectory() };
    } catch (error) {
      if (isErrno(error, "ENOENT")) {
        return null;
      }
      throw this.wrap(error, "stat", path);
    }
  }

  async list(path: string): Promise<WorkspaceEntry[]> {
    const full = this.resolve(path);
    try {
      const entries = await readdir(full, { withFileTypes: true });
      return entries
        .map((entry) => ({ name: entry.name, isDirectory: entry.isDirectory() }))
        .sort((a, b) => a.name.localeCompare(b.name));
    } catch (error) {
      throw this.wrap(error, "list", path);
    }
  }

  private wrap(error: unknown, action: string, path: string): Error {
    if (isErrno(error, "EACCES")) {
      return new InfrastructureError(`Permission denied: cannot ${action} ${path}`, "path", {
        cause: error,
      });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new InfrastructureError(`Cannot ${action} ${path}: ${message}`, "path", {
      cause: error,
    });
  }
}
