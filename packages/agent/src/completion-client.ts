/**
 * CompletionClient: holds one conversation (history, system prompt, tool catalog)
 * and streams completions for it through a CompletionTransport.
 *
 * The bundled transport speaks the OpenAI chat completions API, so any
 * OpenAI-compatible provider works given its base URL.
 */
import OpenAI from 'openai';
import {
  logger,
  assertNever,
  contentText,
  type Message,
  type UserMessage,
} from '@toolrelay/shared';
import { ToolRegistry, type FunctionToolSpec, type SimpleTool } from '@toolrelay/tools';
import { resolveBaseUrl } from './providers.js';
import type { ToolCallDelta } from './tool-call-accumulator.js';

const log = logger.child({ module: 'completion-client' });

export const DEFAULT_TEMPERATURE = 0.1;

export interface CompletionRequest {
  model: string;
  messages: Message[];
  tools: FunctionToolSpec[] | 'none';
  temperature: number;
}

/** One normalized stream delta; `raw` is the provider-native chunk */
export interface CompletionDelta {
  content?: string;
  reasoning?: string;
  toolCalls?: ToolCallDelta[];
  raw: unknown;
}

export interface CompletionTransport {
  stream(request: CompletionRequest): AsyncIterable<CompletionDelta>;
}

/** Anything that can supply remote tools; RemoteToolClient is the usual one */
export interface ToolSource {
  getTools(serverName?: string): Promise<SimpleTool[]>;
}

// ---------------------------------------------------------------------------
// OpenAI-compatible transport
// ---------------------------------------------------------------------------

export interface OpenAITransportOptions {
  apiKey?: string;
  /** Provider name used to look up a base URL when `baseURL` is not given */
  provider?: string;
  baseURL?: string;
}

export function toOpenAIMessages(messages: readonly Message[]): OpenAI.ChatCompletionMessageParam[] {
  return messages.map((message): OpenAI.ChatCompletionMessageParam => {
    switch (message.role) {
      case 'system':
        return { role: 'system', content: message.content };
      case 'user':
        return { role: 'user', content: contentText(message.content) };
      case 'assistant': {
        const out: OpenAI.ChatCompletionAssistantMessageParam = {
          role: 'assistant',
          content: message.content,
        };
        if (message.tool_calls && message.tool_calls.length > 0) {
          out.tool_calls = message.tool_calls.map((call) => ({
            id: call.id,
            type: 'function',
            function: { name: call.function.name, arguments: call.function.arguments },
          }));
        }
        return out;
      }
      case 'tool':
        return { role: 'tool', tool_call_id: message.tool_call_id, content: message.content };
      default:
        return assertNever(message, 'message role');
    }
  });
}

const REASONING_FIELDS = ['reasoning', 'reasoning_content'] as const;

/** Flatten a provider chunk into content / reasoning / tool call fragments */
export function normalizeChunk(chunk: OpenAI.ChatCompletionChunk): CompletionDelta {
  const out: CompletionDelta = { raw: chunk };
  const delta = chunk.choices[0]?.delta;
  if (!delta) return out;

  if (delta.content) out.content = delta.content;

  // Reasoning text is not part of the OpenAI schema; providers add it under varying names
  const fields: Record<string, unknown> = { ...delta };
  for (const field of REASONING_FIELDS) {
    const value = fields[field];
    if (typeof value === 'string' && value.length > 0) {
      out.reasoning = value;
      break;
    }
  }

  if (delta.tool_calls && delta.tool_calls.length > 0) {
    out.toolCalls = delta.tool_calls.map((call) => ({
      index: call.index,
      id: call.id,
      type: call.type,
      name: call.function?.name,
      arguments: call.function?.arguments,
    }));
  }
  return out;
}

export function createOpenAITransport(options: OpenAITransportOptions = {}): CompletionTransport {
  const provider = options.provider ?? 'openai';
  const baseURL = resolveBaseUrl(provider, options.baseURL);
  const client = new OpenAI({ apiKey: options.apiKey ?? 'not-needed', baseURL });

  log.info({ baseURL, provider }, 'openai-compatible transport: initialized');

  return {
    async *stream(request) {
      const params: OpenAI.ChatCompletionCreateParamsStreaming = {
        model: request.model,
        messages: toOpenAIMessages(request.messages),
        temperature: request.temperature,
        stream: true,
      };
      if (request.tools !== 'none' && request.tools.length > 0) {
        params.tools = request.tools;
        params.tool_choice = 'auto';
      }

      const stream = await client.chat.completions.create(params);
      for await (const chunk of stream) {
        yield normalizeChunk(chunk);
      }
    },
  };
}

// ---------------------------------------------------------------------------
// CompletionClient
// ---------------------------------------------------------------------------

export interface CompletionClientOptions {
  model: string;
  transport: CompletionTransport;
  temperature?: number;
  systemPrompt?: string;
  /** Local tools, offered ahead of remote ones */
  tools?: SimpleTool[];
  remoteTools?: ToolSource;
  /** Restrict remote tools to one server */
  remoteServer?: string;
  history?: Message[];
}

export class CompletionClient {
  readonly model: string;
  readonly temperature: number;
  systemPrompt?: string;
  history: Message[];

  private readonly transport: CompletionTransport;
  private readonly localTools: SimpleTool[];
  private readonly remoteTools?: ToolSource;
  private readonly remoteServer?: string;
  private catalog?: ToolRegistry;
  private turnInFlight = false;

  constructor(options: CompletionClientOptions) {
    this.model = options.model;
    this.transport = options.transport;
    this.temperature = options.temperature ?? DEFAULT_TEMPERATURE;
    this.systemPrompt = options.systemPrompt;
    this.localTools = [...(options.tools ?? [])];
    this.remoteTools = options.remoteTools;
    this.remoteServer = options.remoteServer;
    this.history = [...(options.history ?? [])];
  }

  /** Catalog snapshot, or undefined before the first load */
  get tools(): ToolRegistry | undefined {
    return this.catalog;
  }

  get hasCatalog(): boolean {
    return this.catalog !== undefined;
  }

  /** Build the catalog once; later calls reuse it unless `forceRefresh` is set */
  async loadTools(forceRefresh = false): Promise<ToolRegistry> {
    if (this.catalog && !forceRefresh) return this.catalog;

    const remote = this.remoteTools ? await this.remoteTools.getTools(this.remoteServer) : [];
    const catalog = new ToolRegistry([...this.localTools, ...remote]);
    log.info(
      { local: this.localTools.length, remote: remote.length, total: catalog.size },
      'tool catalog loaded',
    );
    this.catalog = catalog;
    return catalog;
  }

  /** A turn is running against this conversation */
  get busy(): boolean {
    return this.turnInFlight;
  }

  /** Claim the conversation for one turn. Returns false while another turn holds it. */
  beginTurn(): boolean {
    if (this.turnInFlight) return false;
    this.turnInFlight = true;
    return true;
  }

  endTurn(): void {
    this.turnInFlight = false;
  }

  invalidateTools(): void {
    this.catalog = undefined;
  }

  /** Add local tools; the catalog is rebuilt on next use */
  addTools(tools: SimpleTool[]): void {
    this.localTools.push(...tools);
    this.invalidateTools();
  }

  setHistory(messages: Message[]): void {
    this.history = [...messages];
  }

  append(...messages: Message[]): void {
    this.history.push(...messages);
  }

  /** Put the configured system prompt first when the history has no system message. */
  ensureSystemPrompt(): boolean {
    if (!this.systemPrompt) return false;
    if (this.history.some((message) => message.role === 'system')) return false;
    this.history.unshift({ role: 'system', content: this.systemPrompt });
    return true;
  }

  /** Append a user turn unless the history already ends with the same one. */
  appendUserMessage(text: string): boolean {
    const last = this.history[this.history.length - 1];
    if (last && last.role === 'user' && contentText(last.content) === text) {
      return false;
    }
    const message: UserMessage = { role: 'user', content: text };
    this.history.push(message);
    return true;
  }

  /** Stream a completion for the current history and catalog */
  stream(): AsyncIterable<CompletionDelta> {
    const tools = this.catalog && this.catalog.size > 0 ? this.catalog.toFunctionSpecs() : 'none';
    return this.transport.stream({
      model: this.model,
      messages: [...this.history],
      tools,
      temperature: this.temperature,
    });
  }
}
