/**
 * SimpleTool: one invocable tool behind a uniform shape, whether it wraps a local
 * function or a tool living on a remote MCP server.
 */
import type { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { isRecord } from '@toolrelay/shared';

/** JSON schema of a tool's argument object */
export interface JsonObjectSchema {
  type: 'object';
  properties?: Record<string, unknown>;
  required?: string[];
  [key: string]: unknown;
}

/** Non-text output of a tool (images, embedded resources) */
export interface ToolArtifact {
  type: string;
  [key: string]: unknown;
}

export interface ToolResultParts {
  content: string | string[];
  artifacts?: ToolArtifact[];
}

export type ToolResult = string | ToolResultParts;

export type ToolFunction = (args: Record<string, unknown>) => Promise<ToolResult>;

/** OpenAI function-tool declaration */
export interface FunctionToolSpec {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: JsonObjectSchema;
  };
}

/** Serializable view of a tool, without its invocation closure */
export interface ToolDescription {
  name: string;
  description: string;
  parameters: JsonObjectSchema;
  metadata?: Record<string, unknown>;
}

export interface SimpleToolOptions {
  name: string;
  description: string;
  parameters?: JsonObjectSchema;
  invoke: ToolFunction;
  metadata?: Record<string, unknown>;
}

const EMPTY_SCHEMA: JsonObjectSchema = { type: 'object', properties: {} };

function objectSchemaFromZod(schema: z.ZodTypeAny): JsonObjectSchema {
  const json: unknown = zodToJsonSchema(schema, { $refStrategy: 'none' });
  if (!isRecord(json) || json.type !== 'object') {
    throw new Error('tool argument schema must describe an object');
  }

  const result: JsonObjectSchema = {
    type: 'object',
    properties: isRecord(json.properties) ? json.properties : {},
  };
  if (Array.isArray(json.required)) {
    const required = json.required.filter((key): key is string => typeof key === 'string');
    if (required.length > 0) result.required = required;
  }
  if (json.additionalProperties === false) {
    result.additionalProperties = false;
  }
  return result;
}

export class SimpleTool {
  readonly name: string;
  readonly description: string;
  readonly parameters: JsonObjectSchema;
  readonly metadata?: Record<string, unknown>;
  private readonly invoke: ToolFunction;

  constructor(options: SimpleToolOptions) {
    if (!options.name) throw new Error('tool name must not be empty');
    this.name = options.name;
    this.description = options.description;
    this.parameters = options.parameters ?? EMPTY_SCHEMA;
    this.metadata = options.metadata;
    this.invoke = options.invoke;
  }

  /**
   * Build a tool from a zod object schema. Arguments are validated by the schema
   * before `fn` runs, so `fn` receives typed input.
   */
  static fromZod<S extends z.ZodObject<z.ZodRawShape>>(
    name: string,
    description: string,
    schema: S,
    fn: (args: z.infer<S>) => ToolResult | Promise<ToolResult>,
    metadata?: Record<string, unknown>,
  ): SimpleTool {
    return new SimpleTool({
      name,
      description,
      parameters: objectSchemaFromZod(schema),
      metadata,
      invoke: async (args) => fn(schema.parse(args)),
    });
  }

  async call(args: Record<string, unknown>): Promise<ToolResult> {
    return this.invoke(args);
  }

  /** Call with a raw JSON argument string; anything other than a JSON object becomes `{}` */
  async callWithStringArgs(raw: string): Promise<ToolResult> {
    return this.call(parseArguments(raw));
  }

  toFunctionSpec(): FunctionToolSpec {
    return {
      type: 'function',
      function: {
        name: this.name,
        description: this.description,
        parameters: this.parameters,
      },
    };
  }

  describe(): ToolDescription {
    const description: ToolDescription = {
      name: this.name,
      description: this.description,
      parameters: this.parameters,
    };
    if (this.metadata) description.metadata = this.metadata;
    return description;
  }
}

/** Parse a JSON argument string into an object; invalid or non-object input yields `{}` */
export function parseArguments(raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

/** Text carried into a tool message; lists of text are joined line by line */
export function toolResultText(result: ToolResult): string {
  if (typeof result === 'string') return result;
  return Array.isArray(result.content) ? result.content.join('\n') : result.content;
}
