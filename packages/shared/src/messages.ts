import { assertNever } from './util.js';

/**
 * Conversation messages in the OpenAI chat wire shape.
 *
 * History is ordered: an optional system message first, then user / assistant / tool turns.
 * A tool message answers a call id carried by the assistant message directly before its batch.
 */

export interface TextPart {
  type: 'text';
  text: string;
}

/** Parts other than text are carried along but ignored when reading content */
export interface OtherPart {
  type: string;
  [key: string]: unknown;
}

export type ContentPart = TextPart | OtherPart;

export type MessageContent = string | ContentPart[];

export interface ToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    /** Raw JSON text of an object */
    arguments: string;
  };
}

export interface SystemMessage {
  role: 'system';
  content: string;
}

export interface UserMessage {
  role: 'user';
  content: MessageContent;
}

export interface AssistantMessage {
  role: 'assistant';
  content: string | null;
  tool_calls?: ToolCall[];
}

export interface ToolMessage {
  role: 'tool';
  tool_call_id: string;
  content: string;
}

export type Message = SystemMessage | UserMessage | AssistantMessage | ToolMessage;

export type Role = Message['role'];

/** Typed user message, accepted wherever plain message objects are */
export class HumanMessage {
  readonly role = 'user' as const;

  constructor(readonly content: MessageContent) {}

  toMessage(): UserMessage {
    return { role: 'user', content: this.content };
  }
}

/** Typed assistant message */
export class AIMessage {
  readonly role = 'assistant' as const;

  constructor(
    readonly content: string | null,
    readonly toolCalls: ToolCall[] = [],
  ) {}

  toMessage(): AssistantMessage {
    const message: AssistantMessage = { role: 'assistant', content: this.content };
    if (this.toolCalls.length > 0) message.tool_calls = [...this.toolCalls];
    return message;
  }
}

function isTextPart(part: ContentPart): part is TextPart {
  return part.type === 'text' && typeof part.text === 'string';
}

/** Text of a message body. Non-text parts are skipped; several text parts are joined by newlines. */
export function contentText(content: MessageContent | null): string {
  if (content === null) return '';
  if (typeof content === 'string') return content;
  return content.filter(isTextPart).map((part) => part.text).join('\n');
}

/**
 * Check the ordering rules of a history. Returns one line per violation;
 * an empty array means the history is well formed.
 */
export function validateHistory(messages: readonly Message[]): string[] {
  const problems: string[] = [];
  let openCalls = new Set<string>();

  messages.forEach((message, index) => {
    switch (message.role) {
      case 'system':
        if (index !== 0) problems.push(`system message at position ${index}`);
        openCalls = new Set();
        break;
      case 'assistant':
        openCalls = new Set((message.tool_calls ?? []).map((call) => call.id));
        break;
      case 'tool':
        if (!openCalls.has(message.tool_call_id)) {
          problems.push(`tool message at position ${index} answers unknown call '${message.tool_call_id}'`);
        }
        break;
      case 'user':
        openCalls = new Set();
        break;
      default:
        assertNever(message, 'message role');
    }
  });

  return problems;
}
