/**
 * Tool registry for dynamic tool management.
 */

import type { CoreTool } from "ai";
import type { FunctionSchema, Tool } from "./base.js";

/**
 * Registry for agent tools. Routing and execution live in the dispatcher.
 */
export class ToolRegistry {
  private tools: Map<string, Tool> = new Map();

  /**
   * Register a tool. A tool with the same name is replaced.
   */
  register(tool: Tool): void {
    this.tools.set(tool.name, tool);
  }

  unregister(name: string): void {
    this.tools.delete(name);
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * Get all tool definitions as CoreTool record for AI SDK.
   */
  getDefinitions(): Record<string, CoreTool> {
    const definitions: Record<string, CoreTool> = {};
    for (const [name, tool] of this.tools) {
      definitions[name] = tool.toCoreTool();
    }
    return definitions;
  }

  /**
   * Get all tool definitions as JSON-schema function specs.
   */
  getSchemas(): FunctionSchema[] {
    return Array.from(this.tools.values()).map((tool) => tool.toSchema());
  }

  get toolNames(): string[] {
    return Array.from(this.tools.keys());
  }

  get size(): number {
    return this.tools.size;
  }
}
