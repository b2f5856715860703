/**
 * ToolOrchestrationLoop: the ask-model / run-tools / ask-again cycle.
 *
 * One run handles one user utterance. Each iteration streams a model turn,
 * rebuilds any tool calls from their fragments, runs them in call order and feeds
 * the results back, until the model answers with text or the iteration ceiling is hit.
 */
import {
  logger,
  withSpan,
  errorMessage,
  type AssistantMessage,
  type ToolCall,
  type ToolMessage,
} from '@toolrelay/shared';
import { parseArguments, toolResultText, type ToolRegistry } from '@toolrelay/tools';
import type { CompletionClient } from './completion-client.js';
import type { LoopEvent } from './events.js';
import { ToolCallAccumulator } from './tool-call-accumulator.js';

const log = logger.child({ module: 'orchestration-loop' });

export const DEFAULT_MAX_ITERATIONS = 15;

export const TURN_IN_PROGRESS = 'a turn is already in progress for this conversation';

export interface OrchestrationLoopOptions {
  maxIterations?: number;
  /** Also emit every provider-native chunk as a raw_chunk event */
  includeRawChunks?: boolean;
}

interface ToolExecution {
  message: ToolMessage;
  event: LoopEvent;
}

export function iterationLimitMessage(maxIterations: number): string {
  return `Recursion limit reached without a final answer. Max iterations: ${maxIterations}. Please refine your prompt or tools.`;
}

export class ToolOrchestrationLoop {
  private readonly maxIterations: number;
  private readonly includeRawChunks: boolean;

  constructor(
    private readonly client: CompletionClient,
    options: OrchestrationLoopOptions = {},
  ) {
    this.maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    this.includeRawChunks = options.includeRawChunks ?? false;
    if (!Number.isInteger(this.maxIterations) || this.maxIterations < 1) {
      throw new Error(`maxIterations must be a positive integer, got ${this.maxIterations}`);
    }
  }

  async *run(userText: string): AsyncGenerator<LoopEvent> {
    if (!this.client.beginTurn()) {
      yield { type: 'error', message: TURN_IN_PROGRESS };
      return;
    }
    try {
      yield* this.drive(userText);
    } finally {
      this.client.endTurn();
    }
  }

  private async *drive(userText: string): AsyncGenerator<LoopEvent> {
    const client = this.client;

    let catalog: ToolRegistry;
    try {
      catalog = await client.loadTools();
    } catch (err) {
      log.error({ err }, 'failed to load tool catalog');
      yield { type: 'error', message: errorMessage(err), cause: err };
      return;
    }

    client.ensureSystemPrompt();
    client.appendUserMessage(userText);

    for (let iteration = 1; iteration <= this.maxIterations; iteration++) {
      const accumulator = new ToolCallAccumulator();
      let content = '';
      let reasoning = '';

      try {
        for await (const delta of client.stream()) {
          if (this.includeRawChunks) {
            yield { type: 'raw_chunk', chunk: delta.raw };
          }
          if (delta.content) {
            content += delta.content;
            yield { type: 'content_delta', text: delta.content };
          }
          if (delta.reasoning) {
            reasoning += delta.reasoning;
            yield { type: 'reasoning_delta', text: delta.reasoning };
          }
          for (const fragment of delta.toolCalls ?? []) {
            accumulator.apply(fragment);
          }
        }
      } catch (err) {
        log.error({ err, iteration, model: client.model }, 'completion stream failed');
        yield { type: 'error', message: errorMessage(err), cause: err };
        return;
      }

      const toolCalls = accumulator.finalize();
      const assistant: AssistantMessage = { role: 'assistant', content: content || null };
      if (toolCalls.length > 0) assistant.tool_calls = toolCalls;
      client.append(assistant);

      log.debug(
        { iteration, contentLength: content.length, reasoningLength: reasoning.length, toolCalls: toolCalls.length },
        'model turn complete',
      );

      if (toolCalls.length > 0) {
        const messages: ToolMessage[] = [];
        for (const call of toolCalls) {
          const { message, event } = await this.executeToolCall(call, catalog);
          messages.push(message);
          yield event;
        }
        client.append(...messages);
        continue;
      }

      if (content) {
        yield { type: 'final', history: [...client.history] };
        return;
      }

      log.warn({ iteration }, 'model turn had neither content nor tool calls, asking again');
    }

    log.warn({ maxIterations: this.maxIterations }, 'iteration limit reached');
    yield { type: 'error', message: iterationLimitMessage(this.maxIterations) };
  }

  private async executeToolCall(call: ToolCall, catalog: ToolRegistry): Promise<ToolExecution> {
    const name = call.function.name;
    const tool = catalog.get(name);

    if (!tool) {
      const content = `Error: Tool '${name}' not found. Available tools: ${catalog.names().join(', ') || '(none)'}`;
      log.warn({ tool: name }, 'model requested an unknown tool');
      return {
        message: { role: 'tool', tool_call_id: call.id, content },
        event: { type: 'tool_output_error', name, content },
      };
    }

    const args = parseArguments(call.function.arguments);
    const start = Date.now();
    try {
      const server = tool.metadata?.server;
      const result = await withSpan(
        'tool.execute',
        { tool: name, server: typeof server === 'string' ? server : undefined },
        () => tool.call(args),
      );
      const content = toolResultText(result);
      log.info({ tool: name, durationMs: Date.now() - start }, 'tool executed');
      return {
        message: { role: 'tool', tool_call_id: call.id, content },
        event: { type: 'tool_output', name, content },
      };
    } catch (err) {
      const content = `Error executing tool '${name}': ${errorMessage(err)}`;
      log.error({ err, tool: name, durationMs: Date.now() - start }, 'tool execution failed');
      return {
        message: { role: 'tool', tool_call_id: call.id, content },
        event: { type: 'tool_output_error', name, content },
      };
    }
  }
}
