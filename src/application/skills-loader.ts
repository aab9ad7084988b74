/**
 * Skills loader for agent capabilities.
 */

import { existsSync } from "fs";
import { delimiter, dirname, join } from "path";
import { fileURLToPath } from "url";
import matter from "gray-matter";
import { z } from "zod";
import type { IWorkspaceState } from "../core/interfaces/storage.js";
import { WorkspaceState } from "../infrastructure/storage/workspace-state.js";
import logger from "../utils/logger.js";

const log = logger.child({ component: "skills" });

// Default builtin skills directory (relative to this file)
const BUILTIN_SKILLS_DIR = join(dirname(fileURLToPath(import.meta.url)), "..", "..", "skills");

const SKILL_FILE = "SKILL.md";

/**
 * Skill info.
 */
export interface SkillInfo {
  name: string;
  path: string;
  source: "workspace" | "builtin";
}

const SkillFrontmatterSchema = z.object({
  name: z.string().optional(),
  description: z.string().optional(),
  always: z.boolean().default(false),
  requires: z
    .object({
      bins: z.array(z.string()).default([]),
      env: z.array(z.string()).default([]),
    })
    .default({}),
});

/**
 * Skill metadata from frontmatter.
 */
export type SkillMetadata = z.infer<typeof SkillFrontmatterSchema>;

/**
 * Whether an executable of this name is on PATH.
 */
export function hasBinary(command: string, pathVar: string = process.env.PATH || ""): boolean {
  return pathVar
    .split(delimiter)
    .filter(Boolean)
    .some((dir) => existsSync(join(dir, command)));
}

/**
 * Loader for agent skills.
 *
 * Skills are markdown files (skills/<name>/SKILL.md) that teach the agent
 * how to use specific tools or perform certain tasks. A workspace skill
 * hides a builtin one of the same name.
 */
export class SkillsLoader {
  private workspace: IWorkspaceState;
  private builtin: IWorkspaceState;
  private env: NodeJS.ProcessEnv;

  constructor(
    workspace: IWorkspaceState,
    options?: { builtinSkillsDir?: string; env?: NodeJS.ProcessEnv },
  ) {
    this.workspace = workspace;
    this.builtin = new WorkspaceState(options?.builtinSkillsDir || BUILTIN_SKILLS_DIR);
    this.env = options?.env ?? process.env;
  }

  private async scan(
    state: IWorkspaceState,
    dir: string,
    source: SkillInfo["source"],
  ): Promise<SkillInfo[]> {
    if (!(await state.exists(dir))) {
      return [];
    }
    const skills: SkillInfo[] = [];
    for (const entry of await state.list(dir)) {
      const file = join(dir, entry.name, SKILL_FILE);
      if (entry.isDirectory && (await state.exists(file))) {
        skills.push({ name: entry.name, path: state.resolve(file), source });
      }
    }
    return skills;
  }

  /**
   * List all available skills.
   */
  async listSkills(filterUnavailable: boolean = true): Promise<SkillInfo[]> {
    const skills = await this.scan(this.workspace, "skills", "workspace");
    for (const skill of await this.scan(this.builtin, ".", "builtin")) {
      if (!skills.some((s) => s.name === skill.name)) {
        skills.push(skill);
      }
    }

    if (!filterUnavailable) {
      return skills;
    }
    const available: SkillInfo[] = [];
    for (const skill of skills) {
      if (this.getMissingRequirements(await this.getSkillMetadata(skill.name)).length === 0) {
        available.push(skill);
      }
    }
    return available;
  }

  /**
   * Load a skill by name.
   */
  async loadSkill(name: string): Promise<string | null> {
    const workspaceSkill = join("skills", name, SKILL_FILE);
    if (await this.workspace.exists(workspaceSkill)) {
      return this.workspace.read(workspaceSkill);
    }

    const builtinSkill = join(name, SKILL_FILE);
    if (await this.builtin.exists(builtinSkill)) {
      return this.builtin.read(builtinSkill);
    }

    return null;
  }

  /**
   * Load specific skills for inclusion in agent context.
   */
  async loadSkillsForContext(skillNames: string[]): Promise<string> {
    const parts: string[] = [];

    for (const name of skillNames) {
      const content = await this.loadSkill(name);
      if (content) {
        parts.push(`### Skill: ${name}\n\n${stripFrontmatter(content)}`);
      }
    }

    return parts.join("\n\n---\n\n");
  }

  /**
   * Build a summary of all skills (name, description, path, availability).
   */
  async buildSkillsSummary(): Promise<string> {
    const allSkills = await this.listSkills(false);
    if (allSkills.length === 0) {
      return "";
    }

    const escapeXml = (s: string) =>
      s.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");

    const lines = ["<skills>"];

    for (const skill of allSkills) {
      const metadata = await this.getSkillMetadata(skill.name);
      const missing = this.getMissingRequirements(metadata);

      lines.push(`  <skill available="${missing.length === 0}">`);
      lines.push(`    <name>${escapeXml(skill.name)}</name>`);
      lines.push(`    <description>${escapeXml(metadata.description || skill.name)}</description>`);
      lines.push(`    <location>${skill.path}</location>`);
      if (missing.length > 0) {
        lines.push(`    <requires>${escapeXml(missing.join(", "))}</requires>`);
      }
      lines.push(`  </skill>`);
    }

    lines.push("</skills>");
    return lines.join("\n");
  }

  /**
   * Get skills marked as always=true that meet requirements.
   */
  async getAlwaysSkills(): Promise<string[]> {
    const result: string[] = [];
    for (const skill of await this.listSkills(true)) {
      if ((await this.getSkillMetadata(skill.name)).always) {
        result.push(skill.name);
      }
    }
    return result;
  }

  /**
   * Get metadata from a skill's frontmatter. Unreadable frontmatter
   * yields the defaults.
   */
  async getSkillMetadata(name: string): Promise<SkillMetadata> {
    const content = await this.loadSkill(name);
    let data: unknown = {};
    if (content) {
      try {
        data = matter(content).data;
      } catch (error) {
        log.warn({ skill: name, error }, "Invalid skill frontmatter");
      }
    }
    const parsed = SkillFrontmatterSchema.safeParse(data);
    return parsed.success ? parsed.data : SkillFrontmatterSchema.parse({});
  }

  /**
   * Requirements a skill declares that this machine lacks.
   */
  getMissingRequirements(metadata: SkillMetadata): string[] {
    const missing: string[] = [];
    for (const bin of metadata.requires.bins) {
      if (!hasBinary(bin, this.env.PATH || "")) {
        missing.push(`CLI: ${bin}`);
      }
    }
    for (const env of metadata.requires.env) {
      if (!this.env[env]) {
        missing.push(`ENV: ${env}`);
      }
    }
    return missing;
  }
}

/**
 * Remove YAML frontmatter from markdown content.
 */
function stripFrontmatter(content: string): string {
  try {
    return matter(content).content.trim();
  } catch (error) {
    log.warn({ error }, "Could not strip skill frontmatter");
    return content.trim();
  }
}
