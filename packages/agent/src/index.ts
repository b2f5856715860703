export { PROVIDER_BASE_URLS, GOOGLE_BASE_URL, resolveBaseUrl } from './providers.js';
export {
  CompletionClient,
  createOpenAITransport,
  normalizeChunk,
  toOpenAIMessages,
  DEFAULT_TEMPERATURE,
  type CompletionClientOptions,
  type CompletionDelta,
  type CompletionRequest,
  type CompletionTransport,
  type OpenAITransportOptions,
  type ToolSource,
} from './completion-client.js';
export {
  ToolCallAccumulator,
  generateToolCallId,
  type ToolCallDelta,
} from './tool-call-accumulator.js';
export type { AgentEvent, LoopEvent } from './events.js';
export {
  ToolOrchestrationLoop,
  DEFAULT_MAX_ITERATIONS,
  iterationLimitMessage,
  TURN_IN_PROGRESS,
  type OrchestrationLoopOptions,
} from './orchestration-loop.js';
export {
  AgentExecutor,
  createAgent,
  normalizeMessages,
  NO_USER_MESSAGE,
  type AgentExecutorOptions,
  type CreateAgentOptions,
  type InputMessage,
  type NormalizedInput,
} from './agent-executor.js';
export {
  StreamContentFilter,
  filterContentStream,
  scanObjectEnd,
  DEFAULT_MAX_BUFFER_SIZE,
  type FilterResult,
  type StreamContentFilterOptions,
} from './content-filter.js';
export {
  HeuristicToolCallClassifier,
  SchemaToolCallClassifier,
  NOT_A_TOOL_CALL,
  type ClassifyContext,
  type ToolCallClassifier,
  type ToolCallVerdict,
} from './tool-call-classifier.js';
