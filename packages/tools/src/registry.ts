/**
 * ToolRegistry: the catalog offered to the model. Lookup is by exact name;
 * the first tool registered under a name wins.
 */
import { logger } from '@toolrelay/shared';
import type { FunctionToolSpec, SimpleTool, ToolDescription } from './simple-tool.js';

const log = logger.child({ module: 'tool-registry' });

/** Make a remote name valid as an OpenAI function name (^[a-zA-Z0-9_-]{1,64}$) */
export function sanitizeToolName(name: string): string {
  return name.replace(/[^a-zA-Z0-9_-]/g, '_').slice(0, 64);
}

export class ToolRegistry {
  private readonly tools = new Map<string, SimpleTool>();

  constructor(tools: Iterable<SimpleTool> = []) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  /** Returns false when the name is already taken */
  register(tool: SimpleTool): boolean {
    if (this.tools.has(tool.name)) {
      log.warn({ tool: tool.name }, 'tool name conflict, skipping duplicate');
      return false;
    }
    this.tools.set(tool.name, tool);
    return true;
  }

  get(name: string): SimpleTool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get size(): number {
    return this.tools.size;
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  list(): SimpleTool[] {
    return [...this.tools.values()];
  }

  toFunctionSpecs(): FunctionToolSpec[] {
    return this.list().map((tool) => tool.toFunctionSpec());
  }

  describe(): ToolDescription[] {
    return this.list().map((tool) => tool.describe());
  }
}
