/**
 * AgentExecutor: accepts a caller's message list in loose or typed form, runs the
 * orchestration loop on its last user message and re-tags the loop's events.
 */
import { z } from 'zod';
import {
  logger,
  assertNever,
  contentText,
  errorMessage,
  AIMessage,
  HumanMessage,
  type AssistantMessage,
  type ContentPart,
  type Message,
} from '@toolrelay/shared';
import type { SimpleTool } from '@toolrelay/tools';
import type { CompletionClient } from './completion-client.js';
import type { AgentEvent, LoopEvent } from './events.js';
import { ToolOrchestrationLoop, TURN_IN_PROGRESS } from './orchestration-loop.js';

const log = logger.child({ module: 'agent-executor' });

export const NO_USER_MESSAGE = 'No user message found in input';

export type InputMessage = Message | HumanMessage | AIMessage | Record<string, unknown>;

const ContentSchema = z.union([z.string(), z.array(z.object({ type: z.string() }).passthrough())]);

const ToolCallSchema = z.object({
  id: z.string(),
  type: z.literal('function').default('function'),
  function: z.object({ name: z.string(), arguments: z.string() }),
});

const InputMessageSchema = z.discriminatedUnion('role', [
  z.object({ role: z.literal('system'), content: ContentSchema }),
  z.object({ role: z.literal('user'), content: ContentSchema }),
  z.object({
    role: z.literal('assistant'),
    content: ContentSchema.nullable().default(null),
    tool_calls: z.array(ToolCallSchema).nullish(),
  }),
  z.object({ role: z.literal('tool'), tool_call_id: z.string(), content: ContentSchema }),
]);

type ParsedMessage = z.infer<typeof InputMessageSchema>;

function toMessage(parsed: ParsedMessage): Message {
  switch (parsed.role) {
    case 'system':
      return { role: 'system', content: contentText(parsed.content) };
    case 'user': {
      const content: string | ContentPart[] = parsed.content;
      return { role: 'user', content };
    }
    case 'assistant': {
      const message: AssistantMessage = {
        role: 'assistant',
        content: parsed.content === null ? null : contentText(parsed.content),
      };
      if (parsed.tool_calls && parsed.tool_calls.length > 0) message.tool_calls = parsed.tool_calls;
      return message;
    }
    case 'tool':
      return { role: 'tool', tool_call_id: parsed.tool_call_id, content: contentText(parsed.content) };
    default:
      return assertNever(parsed, 'message role');
  }
}

export interface NormalizedInput {
  /** Messages before the last user message */
  history: Message[];
  /** Text of the last user message; undefined when there is none */
  utterance?: string;
}

/**
 * Split input into prior history and the new utterance. Unrecognized entries are
 * skipped; anything after the last user message is dropped.
 */
export function normalizeMessages(input: readonly InputMessage[]): NormalizedInput {
  const messages: Message[] = [];

  input.forEach((item, index) => {
    if (item instanceof HumanMessage || item instanceof AIMessage) {
      messages.push(item.toMessage());
      return;
    }
    const parsed = InputMessageSchema.safeParse(item);
    if (!parsed.success) {
      log.warn({ index, issues: parsed.error.issues.map((issue) => issue.message) }, 'skipping unrecognized input message');
      return;
    }
    messages.push(toMessage(parsed.data));
  });

  let lastUser = -1;
  messages.forEach((message, index) => {
    if (message.role === 'user') lastUser = index;
  });
  if (lastUser === -1) return { history: messages };

  const trailing = messages.length - lastUser - 1;
  if (trailing > 0) {
    log.warn({ dropped: trailing }, 'dropping messages that follow the last user message');
  }

  const last = messages[lastUser];
  return {
    history: messages.slice(0, lastUser),
    utterance: last.role === 'user' ? contentText(last.content) : undefined,
  };
}

export interface AgentExecutorOptions {
  /** Used when the client has no system prompt of its own */
  systemPrompt?: string;
  maxIterations?: number;
  /** Pass provider-native chunks through as `raw` events */
  includeRawChunks?: boolean;
  /** Emit the final history as a `values` event (default true) */
  emitValues?: boolean;
}

export class AgentExecutor {
  private readonly options: AgentExecutorOptions;

  constructor(
    readonly client: CompletionClient,
    options: AgentExecutorOptions = {},
  ) {
    this.options = options;
    if (options.systemPrompt && !client.systemPrompt) {
      client.systemPrompt = options.systemPrompt;
    }
  }

  async *run(messages: readonly InputMessage[]): AsyncGenerator<AgentEvent> {
    const { history, utterance } = normalizeMessages(messages);
    if (utterance === undefined) {
      log.warn({ count: messages.length }, 'no user message in input');
      yield { type: 'error', message: NO_USER_MESSAGE };
      return;
    }

    // Another turn owns the history
    if (this.client.busy) {
      yield { type: 'error', message: TURN_IN_PROGRESS };
      return;
    }

    this.client.setHistory(history);
    const loop = new ToolOrchestrationLoop(this.client, {
      maxIterations: this.options.maxIterations,
      includeRawChunks: this.options.includeRawChunks,
    });

    try {
      for await (const event of loop.run(utterance)) {
        const tagged = this.retag(event);
        if (tagged) yield tagged;
      }
    } catch (err) {
      log.error({ err }, 'agent run failed');
      yield { type: 'error', message: errorMessage(err), cause: err };
    }
  }

  private retag(event: LoopEvent): AgentEvent | undefined {
    switch (event.type) {
      case 'content_delta':
        return { type: 'content', text: event.text };
      case 'reasoning_delta':
        return { type: 'reasoning', text: event.text };
      case 'tool_output':
        return { type: 'tool_output', name: event.name, content: event.content };
      case 'tool_output_error':
        return { type: 'tool_output_error', name: event.name, content: event.content };
      case 'raw_chunk':
        return this.options.includeRawChunks ? { type: 'raw', chunk: event.chunk } : undefined;
      case 'final':
        return this.options.emitValues === false ? undefined : { type: 'values', messages: event.history };
      case 'error':
        return { type: 'error', message: event.message, cause: event.cause };
      default:
        return assertNever(event, 'loop event');
    }
  }
}

export interface CreateAgentOptions extends AgentExecutorOptions {
  client: CompletionClient;
  tools?: SimpleTool[];
}

/** Build an executor, registering extra local tools on the client first */
export function createAgent(options: CreateAgentOptions): AgentExecutor {
  const { client, tools, ...executorOptions } = options;
  if (tools && tools.length > 0) client.addTools(tools);
  return new AgentExecutor(client, executorOptions);
}
