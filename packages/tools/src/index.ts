export {
  SimpleTool,
  parseArguments,
  toolResultText,
  type FunctionToolSpec,
  type JsonObjectSchema,
  type SimpleToolOptions,
  type ToolArtifact,
  type ToolDescription,
  type ToolFunction,
  type ToolResult,
  type ToolResultParts,
} from './simple-tool.js';
export { ToolRegistry, sanitizeToolName } from './registry.js';
export { MemoryToolCache, type ToolCache } from './cache.js';
export {
  ConnectionSchema,
  parseConnections,
  loadConnectionsFile,
  canonicalJson,
  connectionIdentity,
  connectionHash,
  connectionsHash,
  type Connection,
  type ConnectionInput,
  type StdioConnection,
  type SseConnection,
  type StreamableHttpConnection,
  type WebsocketConnection,
  type TransportKind,
} from './connections.js';
export {
  openSession,
  withSession,
  createTransport,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_SSE_CONNECT_TIMEOUT_MS,
  type SessionFactory,
  type ToolSession,
} from './sessions.js';
export { HeaderWebSocketTransport } from './ws-transport.js';
export { convertCallToolResult } from './tool-result.js';
export {
  RemoteToolClient,
  listAllTools,
  DEFAULT_TOOL_CACHE_TTL_SECONDS,
  MAX_PAGINATION_ITERATIONS,
  type PromptMessage,
  type RemoteToolClientOptions,
  type ResourceBlob,
} from './remote-tool-client.js';
