/**
 * MCP sessions: opens one SDK client per use over the connection's transport.
 *
 * Sessions are short lived: one for a catalog fetch, one per tool call.
 */
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport, getDefaultEnvironment } from '@modelcontextprotocol/sdk/client/stdio.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolResultSchema,
  type CallToolResult,
  type GetPromptResult,
  type ListResourcesResult,
  type ListToolsResult,
  type ReadResourceResult,
} from '@modelcontextprotocol/sdk/types.js';
import { logger, assertNever } from '@toolrelay/shared';
import type { Connection } from './connections.js';
import { HeaderWebSocketTransport } from './ws-transport.js';

const log = logger.child({ module: 'mcp-sessions' });

export const DEFAULT_CONNECT_TIMEOUT_MS = 30_000;
export const DEFAULT_SSE_CONNECT_TIMEOUT_MS = 5_000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 300_000;

/** The subset of an MCP client session the tool client relies on */
export interface ToolSession {
  listTools(cursor?: string): Promise<ListToolsResult>;
  callTool(name: string, args: Record<string, unknown>): Promise<CallToolResult>;
  getPrompt(name: string, args?: Record<string, string>): Promise<GetPromptResult>;
  listResources(cursor?: string): Promise<ListResourcesResult>;
  readResource(uri: string): Promise<ReadResourceResult>;
  close(): Promise<void>;
}

export type SessionFactory = (name: string, connection: Connection) => Promise<ToolSession>;

interface Timeouts {
  connect: number;
  request: number;
}

function timeoutsFor(connection: Connection): Timeouts {
  switch (connection.transport) {
    case 'sse':
      return {
        connect: connection.timeoutMs ?? DEFAULT_SSE_CONNECT_TIMEOUT_MS,
        request: connection.readTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
      };
    case 'streamable-http':
      return {
        connect: connection.timeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
        request: connection.readTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
      };
    case 'stdio':
    case 'websocket':
      return { connect: DEFAULT_CONNECT_TIMEOUT_MS, request: DEFAULT_REQUEST_TIMEOUT_MS };
    default:
      return assertNever(connection, 'transport');
  }
}

export function createTransport(connection: Connection): Transport {
  switch (connection.transport) {
    case 'stdio':
      return new StdioClientTransport({
        command: connection.command,
        args: connection.args,
        env: { ...getDefaultEnvironment(), ...connection.env },
        cwd: connection.cwd,
        stderr: 'inherit',
      });
    case 'sse':
      return new SSEClientTransport(new URL(connection.url), {
        requestInit: connection.headers ? { headers: connection.headers } : undefined,
      });
    case 'streamable-http':
      return new StreamableHTTPClientTransport(new URL(connection.url), {
        requestInit: connection.headers ? { headers: connection.headers } : undefined,
      });
    case 'websocket':
      return new HeaderWebSocketTransport(new URL(connection.url), connection.headers);
    default:
      return assertNever(connection, 'transport');
  }
}

/** Open and initialize an MCP session. Connect and every request are bounded by timeouts. */
export const openSession: SessionFactory = async (name, connection) => {
  const timeouts = timeoutsFor(connection);
  const transport = createTransport(connection);
  const client = new Client({ name: `toolrelay-${name}`, version: '0.1.0' }, { capabilities: {} });

  client.onerror = (err) => {
    log.warn({ err, connection: name }, 'MCP client error');
  };

  try {
    await client.connect(transport, { timeout: timeouts.connect });
  } catch (err) {
    log.error({ err, connection: name, transport: connection.transport }, 'failed to open MCP session');
    await transport.close().catch((closeErr: unknown) => {
      log.warn({ err: closeErr, connection: name }, 'error closing transport after failed connect');
    });
    throw err;
  }
  log.debug({ connection: name, transport: connection.transport }, 'MCP session opened');

  const options = { timeout: timeouts.request };
  const terminate = connection.transport === 'streamable-http' && connection.terminateOnClose;

  return {
    listTools: (cursor) => client.listTools(cursor ? { cursor } : undefined, options),
    callTool: (toolName, args) =>
      client.request(
        { method: 'tools/call', params: { name: toolName, arguments: args } },
        CallToolResultSchema,
        options,
      ),
    getPrompt: (promptName, args) => client.getPrompt({ name: promptName, arguments: args }, options),
    listResources: (cursor) => client.listResources(cursor ? { cursor } : undefined, options),
    readResource: (uri) => client.readResource({ uri }, options),
    async close() {
      if (terminate && transport instanceof StreamableHTTPClientTransport) {
        try {
          await transport.terminateSession();
        } catch (err) {
          log.warn({ err, connection: name }, 'failed to terminate MCP session');
        }
      }
      await client.close();
      log.debug({ connection: name }, 'MCP session closed');
    },
  };
};

/** Run `fn` inside a fresh session, closing it afterwards whatever happens */
export async function withSession<T>(
  factory: SessionFactory,
  name: string,
  connection: Connection,
  fn: (session: ToolSession) => Promise<T>,
): Promise<T> {
  const session = await factory(name, connection);
  try {
    return await fn(session);
  } finally {
    await session.close().catch((err: unknown) => {
      log.warn({ err, connection: name }, 'error closing MCP session');
    });
  }
}
