/**
 * Path and file helpers.
 */

import { existsSync, mkdirSync, renameSync, writeFileSync } from "fs";
import { rename, writeFile, mkdir } from "fs/promises";
import { homedir } from "os";
import { dirname, join } from "path";
import { randomUUID } from "crypto";

/**
 * Expand a leading ~ to the user's home directory.
 */
export function expandUser(path: string): string {
  if (path === "~") {
    return homedir();
  }
  if (path.startsWith("~/")) {
    return join(homedir(), path.slice(2));
  }
  return path;
}

/**
 * Create a directory (and parents) if missing, returning the path.
 */
export function ensureDir(path: string): string {
  if (!existsSync(path)) {
    mkdirSync(path, { recursive: true });
  }
  return path;
}

function tempPathFor(path: string): string {
  return `${path}.${process.pid}.${randomUUID().slice(0, 8)}.tmp`;
}

/**
 * Replace a file's content atomically (write a sibling temp file, then rename).
 */
export function atomicWriteFileSync(path: string, content: string): void {
  ensureDir(dirname(path));
  const tmp = tempPathFor(path);
  writeFileSync(tmp, content, "utf-8");
  renameSync(tmp, path);
}

/**
 * Async variant of {@link atomicWriteFileSync}.
 */
export async function atomicWriteFile(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = tempPathFor(path);
  await writeFile(tmp, content, "utf-8");
  await rename(tmp, path);
}

/**
 * Format a timestamp as "YYYY-MM-DD HH:MM" in local time.
 */
export function formatMinute(ms: number): string {
  const d = new Date(ms);
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}`;
}
