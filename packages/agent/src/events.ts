import type { Message } from '@toolrelay/shared';

/** Everything the orchestration loop emits */
export type LoopEvent =
  | { type: 'content_delta'; text: string }
  | { type: 'reasoning_delta'; text: string }
  | { type: 'tool_output'; name: string; content: string }
  | { type: 'tool_output_error'; name: string; content: string }
  | { type: 'raw_chunk'; chunk: unknown }
  | { type: 'final'; history: Message[] }
  /** `cause` is the thrown value, when the failure came from one */
  | { type: 'error'; message: string; cause?: unknown };

/** Events handed to callers of AgentExecutor */
export type AgentEvent =
  | { type: 'content'; text: string }
  | { type: 'reasoning'; text: string }
  | { type: 'tool_output'; name: string; content: string }
  | { type: 'tool_output_error'; name: string; content: string }
  | { type: 'raw'; chunk: unknown }
  | { type: 'values'; messages: Message[] }
  | { type: 'error'; message: string; cause?: unknown };
