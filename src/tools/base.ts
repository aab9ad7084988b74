/**
 * Base class for agent tools.
 */

import { z } from "zod";
import type { CoreTool } from "ai";
import type { ITool, ToolContext } from "../core/types/tool.js";

/**
 * OpenAI-style function definition of a tool.
 */
export interface FunctionSchema {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

/**
 * Abstract base class for agent tools.
 *
 * Subclasses declare a zod schema and receive parameters that already
 * passed it; the dispatcher owns validation, timeouts and error mapping.
 * Failures are thrown, never returned as text.
 */
export abstract class Tool implements ITool {
  abstract readonly name: string;

  abstract readonly description: string;

  abstract readonly parameters: z.ZodObject<z.ZodRawShape>;

  readonly timeoutMs?: number;

  abstract execute(params: Record<string, unknown>, context: ToolContext): Promise<string>;

  /**
   * Return a warning when the call breaks this tool's safety contract.
   */
  checkSafety(_params: Record<string, unknown>): string | null {
    return null;
  }

  /**
   * Convert tool to a Vercel AI SDK definition. No `execute`: the SDK
   * reports calls and the dispatcher runs them.
   */
  toCoreTool(): CoreTool {
    return {
      description: this.description,
      parameters: this.parameters,
    };
  }

  /**
   * Convert tool to OpenAI function schema format.
   */
  toSchema(): FunctionSchema {
    return {
      type: "function",
      function: {
        name: this.name,
        description: this.description,
        parameters: zodToJsonSchema(this.parameters),
      },
    };
  }
}

/**
 * Convert a Zod object schema to JSON Schema format.
 */
export function zodToJsonSchema(schema: z.ZodObject<z.ZodRawShape>): Record<string, unknown> {
  const properties: Record<string, unknown> = {};
  const required: string[] = [];

  for (const [key, value] of Object.entries(schema.shape)) {
    properties[key] = zodFieldToJsonSchema(value);
    if (!value.isOptional()) {
      required.push(key);
    }
  }

  return { type: "object", properties, required };
}

function withDescription(
  result: Record<string, unknown>,
  field: z.ZodTypeAny,
): Record<string, unknown> {
  if (field.description) {
    result.description = field.description;
  }
  return result;
}

/**
 * Convert a Zod field to JSON Schema format.
 */
function zodFieldToJsonSchema(field: z.ZodTypeAny): Record<string, unknown> {
  if (field instanceof z.ZodOptional || field instanceof z.ZodNullable) {
    return withDescription(zodFieldToJsonSchema(field.unwrap()), field);
  }

  if (field instanceof z.ZodDefault) {
    const inner = zodFieldToJsonSchema(field.removeDefault());
    inner.default = field._def.defaultValue();
    return withDescription(inner, field);
  }

  if (field instanceof z.ZodString) {
    return withDescription({ type: "string" }, field);
  }

  if (field instanceof z.ZodNumber) {
    return withDescription({ type: field.isInt ? "integer" : "number" }, field);
  }

  if (field instanceof z.ZodBoolean) {
    return withDescription({ type: "boolean" }, field);
  }

  if (field instanceof z.ZodEnum) {
    return withDescription({ type: "string", enum: field.options }, field);
  }

  if (field instanceof z.ZodArray) {
    return withDescription({ type: "array", items: zodFieldToJsonSchema(field.element) }, field);
  }

  if (field instanceof z.ZodRecord || field instanceof z.ZodObject) {
    return withDescription({ type: "object" }, field);
  }

  return withDescription({}, field);
}
