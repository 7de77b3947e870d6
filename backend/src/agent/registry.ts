/**
 * registry.ts
 *
 * Purpose:
 * - Hold every tool the model may call, keyed by exact name.
 * - Derive the model-facing schema from each tool's zod input shape, so the schema and
 *   the validation that the router applies can never drift apart.
 * - Route {name, arguments} to the right operation: unknown name → Failure, invalid
 *   arguments → Failure naming the field (the operation is not invoked), otherwise the
 *   operation's Envelope is passed through untouched.
 */

import type OpenAI from "openai";
import { z } from "zod";
import { InternalError, ValidationError, describeError, toFailure } from "../errors";
import { logEvent } from "../logger";
import { fail, type Envelope } from "../types";

export type ParameterType = "string" | "number" | "boolean";

export type ToolParameter = {
  name: string;
  type: ParameterType;
  required: boolean;
  description: string;
  /** Closed set of accepted values, when the parameter is an enumeration. */
  enum?: readonly string[];
};

export type ToolSchemaEntry = {
  name: string;
  description: string;
  parameters: ToolParameter[];
};

type Invocation = { valid: true; invoke: () => Promise<Envelope<unknown>> } | { valid: false; error: ValidationError };

export interface ToolDefinition {
  readonly name: string;
  readonly description: string;
  readonly parameters: readonly ToolParameter[];
  /** Validate raw arguments and bind them to the operation. Never calls it. */
  prepare(args: unknown): Invocation;
}

function unwrap(schema: z.ZodTypeAny): z.ZodTypeAny {
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) return unwrap(schema.unwrap());
  if (schema instanceof z.ZodDefault) return unwrap(schema.removeDefault());
  return schema;
}

function describeParameter(name: string, schema: z.ZodTypeAny): ToolParameter {
  const inner = unwrap(schema);
  const required = !schema.isOptional();
  const description = schema.description ?? inner.description ?? "";

  if (inner instanceof z.ZodString) return { name, type: "string", required, description };
  if (inner instanceof z.ZodNumber) return { name, type: "number", required, description };
  if (inner instanceof z.ZodBoolean) return { name, type: "boolean", required, description };
  if (inner instanceof z.ZodEnum) {
    const values: string[] = [...inner.options];
    return {
      name,
      type: "string",
      required,
      description: `${description} One of: ${values.join(", ")}.`.trim(),
      enum: values,
    };
  }
  throw new Error(`Tool parameter "${name}" must be a string, number, boolean or enum`);
}

export function issueToError(issue: z.ZodIssue): ValidationError {
  const field = issue.path.length ? issue.path.join(".") : "arguments";
  switch (issue.code) {
    case z.ZodIssueCode.invalid_type:
      return issue.received === "undefined"
        ? new ValidationError(field, "required parameter is missing")
        : new ValidationError(field, `expected ${issue.expected}, received ${issue.received}`);
    case z.ZodIssueCode.invalid_enum_value:
      return new ValidationError(field, `must be one of ${issue.options.join(", ")} (got '${String(issue.received)}')`);
    default:
      return new ValidationError(field, issue.message);
  }
}

/** Declare a tool from a zod shape; `run` receives arguments already parsed and typed. */
export function defineTool<S extends z.ZodRawShape>(tool: {
  name: string;
  description: string;
  input: S;
  run: (args: z.output<z.ZodObject<S>>) => Promise<Envelope<unknown>>;
}): ToolDefinition {
  const schema = z.object(tool.input);
  const parameters = Object.entries(tool.input).map(([name, field]) => describeParameter(name, field));

  return {
    name: tool.name,
    description: tool.description,
    parameters,
    prepare(args) {
      const parsed = schema.safeParse(args === undefined ? {} : args);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        return {
          valid: false,
          error: issue ? issueToError(issue) : new ValidationError("arguments", "could not be parsed"),
        };
      }
      return { valid: true, invoke: () => tool.run(parsed.data) };
    },
  };
}

export class ToolRegistry {
  private readonly tools = new Map<string, ToolDefinition>();

  constructor(definitions: readonly ToolDefinition[]) {
    for (const def of definitions) {
      if (this.tools.has(def.name)) throw new Error(`Duplicate tool name: ${def.name}`);
      this.tools.set(def.name, def);
    }
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /** Ordered tool schema, in registration order. */
  schema(): ToolSchemaEntry[] {
    return [...this.tools.values()].map((t) => ({
      name: t.name,
      description: t.description,
      parameters: t.parameters.map((p) => ({ ...p })),
    }));
  }

  /** The same schema as OpenAI function tools. */
  toOpenAITools(): OpenAI.Chat.ChatCompletionTool[] {
    return this.schema().map((entry) => ({
      type: "function" as const,
      function: {
        name: entry.name,
        description: entry.description,
        parameters: {
          type: "object",
          properties: Object.fromEntries(
            entry.parameters.map((p) => [
              p.name,
              { type: p.type, description: p.description, ...(p.enum ? { enum: [...p.enum] } : {}) },
            ])
          ),
          required: entry.parameters.filter((p) => p.required).map((p) => p.name),
          additionalProperties: false,
        },
      },
    }));
  }

  /** Validate and dispatch one tool call. Never throws. */
  async executeTool(name: string, args: unknown): Promise<Envelope<unknown>> {
    const tool = this.tools.get(name);
    if (!tool) {
      logEvent("warn", "tool_unknown", { tool: name });
      return fail(`unknown tool: ${name}`);
    }

    const started = Date.now();
    try {
      const call = tool.prepare(args);
      if (!call.valid) {
        logEvent("info", "tool_rejected", { tool: name, error: call.error.message });
        return fail(call.error.message);
      }
      const result = await call.invoke();
      logEvent("info", "tool_call", { tool: name, success: result.success, ms: Date.now() - started });
      return result;
    } catch (err) {
      return toFailure(new InternalError(describeError(err), err), name);
    }
  }
}
