/**
 * Configuration loading and saving.
 */

import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import { ConfigSchema } from "./schema.js";
import type { Config } from "../../core/types/config.js";
import { ValidationError } from "../../core/errors.js";
import { atomicWriteFileSync, expandUser } from "../../utils/paths.js";
import logger from "../../utils/logger.js";

const ENV_PREFIX = "TENDRIL_";

/**
 * Data directory (~/.tendril, or $TENDRIL_HOME).
 */
export function getDataDir(): string {
  const override = process.env.TENDRIL_HOME;
  return override ? expandUser(override) : join(homedir(), ".tendril");
}

export function getConfigPath(): string {
  return join(getDataDir(), "config.json");
}

/**
 * Path of the cron job store.
 */
export function getJobStorePath(): string {
  return join(getDataDir(), "cron", "jobs.json");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseEnvValue(raw: string): unknown {
  if (raw === "true") return true;
  if (raw === "false") return false;
  if (raw.trim() !== "" && !Number.isNaN(Number(raw))) return Number(raw);
  return raw;
}

function toCamel(segment: string): string {
  return segment.toLowerCase().replace(/_([a-z])/g, (_, c: string) => c.toUpperCase());
}

/**
 * Apply environment overrides onto raw config data.
 *
 * `TENDRIL_AGENTS__DEFAULTS__MODEL=x` sets `agents.defaults.model`.
 * Provider keys fall back to ANTHROPIC_API_KEY, OPENAI_API_KEY and BRAVE_API_KEY.
 */
export function applyEnvOverrides(
  data: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const result: Record<string, unknown> = structuredClone(data);

  for (const [name, raw] of Object.entries(env)) {
    if (!name.startsWith(ENV_PREFIX) || raw === undefined || name === "TENDRIL_HOME") {
      continue;
    }
    const path = name.slice(ENV_PREFIX.length).split("__").map(toCamel);
    let target = result;
    for (const key of path.slice(0, -1)) {
      const next = target[key];
      if (!isRecord(next)) {
        target[key] = {};
      }
      const child = target[key];
      if (!isRecord(child)) break;
      target = child;
    }
    const leaf = path[path.length - 1];
    if (leaf) {
      target[leaf] = parseEnvValue(raw);
    }
  }

  const fallbacks: Array<[string[], string | undefined]> = [
    [["providers", "anthropic", "apiKey"], env.ANTHROPIC_API_KEY],
    [["providers", "openai", "apiKey"], env.OPENAI_API_KEY],
    [["tools", "web", "search", "apiKey"], env.BRAVE_API_KEY],
  ];
  for (const [path, value] of fallbacks) {
    if (!value) continue;
    let target = result;
    for (const key of path.slice(0, -1)) {
      if (!isRecord(target[key])) {
        target[key] = {};
      }
      const child = target[key];
      if (!isRecord(child)) break;
      target = child;
    }
    const leaf = path[path.length - 1];
    if (leaf && !target[leaf]) {
      target[leaf] = value;
    }
  }

  return result;
}

/**
 * Load config from disk, apply environment overrides and fill defaults.
 */
export function loadConfig(path: string = getConfigPath()): Config {
  let data: Record<string, unknown> = {};

  if (existsSync(path)) {
    const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
    if (!isRecord(parsed)) {
      throw new ValidationError(`Config at ${path} must be a JSON object`, "config");
    }
    data = parsed;
  } else {
    logger.debug({ path }, "No config file, using defaults");
  }

  return ConfigSchema.parse(applyEnvOverrides(data));
}

/**
 * Save config to disk.
 */
export function saveConfig(config: Config, path: string = getConfigPath()): void {
  atomicWriteFileSync(path, JSON.stringify(config, null, 2) + "\n");
}
