/**
 * RemoteToolClient: named connections to MCP servers, their tool catalogs,
 * prompts and resources.
 *
 * Catalogs are cached by a hash of the connection definitions. Only the raw tool
 * descriptors are cached; every lookup re-binds them to live connections, and every
 * tool call runs in its own session.
 */
import { ToolSchema, type Tool } from '@modelcontextprotocol/sdk/types.js';
import {
  logger,
  withSpan,
  CatalogFetchError,
  ConnectionConfigError,
  isRecord,
} from '@toolrelay/shared';
import type { ToolCache } from './cache.js';
import { connectionHash, connectionsHash, type Connection } from './connections.js';
import { sanitizeToolName } from './registry.js';
import { openSession, withSession, type SessionFactory, type ToolSession } from './sessions.js';
import { SimpleTool } from './simple-tool.js';
import { convertCallToolResult } from './tool-result.js';

const log = logger.child({ module: 'remote-tool-client' });

export const DEFAULT_TOOL_CACHE_TTL_SECONDS = 300;
/** Upper bound on list pages per connection, against servers that never stop paginating */
export const MAX_PAGINATION_ITERATIONS = 1000;

export interface RemoteToolClientOptions {
  connections: Record<string, Connection>;
  cache?: ToolCache;
  cacheTtlSeconds?: number;
  sessionFactory?: SessionFactory;
}

export interface PromptMessage {
  role: 'user' | 'assistant';
  content: string;
}

export type ResourceBlob =
  | { kind: 'text'; uri: string; mimeType?: string; text: string }
  | { kind: 'binary'; uri: string; mimeType?: string; data: Buffer };

type CatalogByConnection = Record<string, Tool[]>;

export async function listAllTools(session: ToolSession): Promise<Tool[]> {
  const tools: Tool[] = [];
  let cursor: string | undefined;

  for (let page = 0; page < MAX_PAGINATION_ITERATIONS; page++) {
    const result = await session.listTools(cursor);
    tools.push(...result.tools);
    cursor = result.nextCursor;
    if (!cursor) return tools;
  }

  log.warn({ pages: MAX_PAGINATION_ITERATIONS }, 'tool listing hit the pagination cap, returning partial list');
  return tools;
}

export class RemoteToolClient {
  private readonly connections: Record<string, Connection>;
  private readonly cache?: ToolCache;
  private readonly cacheTtlSeconds: number;
  private readonly sessionFactory: SessionFactory;

  constructor(options: RemoteToolClientOptions) {
    this.connections = { ...options.connections };
    this.cache = options.cache;
    this.cacheTtlSeconds = options.cacheTtlSeconds ?? DEFAULT_TOOL_CACHE_TTL_SECONDS;
    this.sessionFactory = options.sessionFactory ?? openSession;
  }

  get connectionNames(): string[] {
    return Object.keys(this.connections);
  }

  /** Run `fn` in a fresh session on the named server */
  session<T>(serverName: string, fn: (session: ToolSession) => Promise<T>): Promise<T> {
    return withSession(this.sessionFactory, serverName, this.connection(serverName), fn);
  }

  /**
   * Tools from one named server, or from every configured server. A failure on any
   * server fails the whole call with CatalogFetchError.
   */
  async getTools(serverName?: string): Promise<SimpleTool[]> {
    const targets = serverName
      ? { [serverName]: this.connection(serverName) }
      : this.connections;
    const key = this.cacheKey(serverName);

    const cached = await this.readCache(key, targets);
    if (cached) {
      log.info({ key, servers: Object.keys(cached) }, 'tool catalog cache hit');
      return this.bindCatalog(cached);
    }

    log.info({ servers: Object.keys(targets) }, 'fetching tool catalogs');
    const entries = await Promise.all(
      Object.entries(targets).map(async ([name, connection]) => {
        try {
          const tools = await withSpan('mcp.list_tools', { server: name }, () =>
            withSession(this.sessionFactory, name, connection, listAllTools),
          );
          return [name, tools] as const;
        } catch (err) {
          throw new CatalogFetchError(name, err);
        }
      }),
    );
    const catalog: CatalogByConnection = Object.fromEntries(entries);

    if (this.cache) {
      try {
        await this.cache.set(key, catalog, this.cacheTtlSeconds);
      } catch (err) {
        log.error({ err, key }, 'failed to write tool catalog to cache');
      }
    }

    return this.bindCatalog(catalog);
  }

  /** Drop the cached catalog for one server, or for the whole connection set */
  async invalidate(serverName?: string): Promise<void> {
    if (!this.cache) return;
    await this.cache.delete(this.cacheKey(serverName));
  }

  async getPrompt(
    serverName: string,
    promptName: string,
    args?: Record<string, string>,
  ): Promise<PromptMessage[]> {
    const result = await this.session(serverName, (session) => session.getPrompt(promptName, args));
    const messages: PromptMessage[] = [];
    for (const message of result.messages) {
      if (message.content.type !== 'text') {
        log.debug({ server: serverName, prompt: promptName, type: message.content.type }, 'skipping non-text prompt content');
        continue;
      }
      messages.push({ role: message.role, content: message.content.text });
    }
    return messages;
  }

  /** Read the given resources, or every resource the server lists */
  async getResources(serverName: string, uris?: string[]): Promise<ResourceBlob[]> {
    return this.session(serverName, async (session) => {
      const targets = uris ?? (await listAllResourceUris(session));
      const blobs: ResourceBlob[] = [];
      for (const uri of targets) {
        const result = await session.readResource(uri);
        for (const item of result.contents) {
          if ('text' in item && typeof item.text === 'string') {
            blobs.push({ kind: 'text', uri: item.uri, mimeType: item.mimeType, text: item.text });
          } else if ('blob' in item && typeof item.blob === 'string') {
            blobs.push({ kind: 'binary', uri: item.uri, mimeType: item.mimeType, data: Buffer.from(item.blob, 'base64') });
          }
        }
      }
      return blobs;
    });
  }

  private connection(serverName: string): Connection {
    const connection = this.connections[serverName];
    if (!connection) {
      throw new ConnectionConfigError(
        `unknown MCP server '${serverName}'; configured: ${this.connectionNames.join(', ') || '(none)'}`,
        serverName,
      );
    }
    return connection;
  }

  private cacheKey(serverName?: string): string {
    return serverName
      ? `mcp_tools:${serverName}:${connectionHash(this.connection(serverName))}`
      : `mcp_tools:all_connections:${connectionsHash(this.connections)}`;
  }

  private async readCache(
    key: string,
    targets: Record<string, Connection>,
  ): Promise<CatalogByConnection | undefined> {
    if (!this.cache) return undefined;

    try {
      if (await this.cache.isExpired(key, this.cacheTtlSeconds)) {
        log.debug({ key }, 'tool catalog cache miss');
        return undefined;
      }
      const raw = await this.cache.get(key);
      if (raw === undefined) return undefined;
      return parseCachedCatalog(raw, targets);
    } catch (err) {
      log.error({ err, key }, 'unusable cached tool catalog, refetching');
      await this.cache.delete(key).catch((deleteErr: unknown) => {
        log.warn({ err: deleteErr, key }, 'failed to drop cached tool catalog');
      });
      return undefined;
    }
  }

  private bindCatalog(catalog: CatalogByConnection): SimpleTool[] {
    return Object.entries(catalog).flatMap(([name, tools]) =>
      tools.map((tool) => this.bindTool(name, tool)),
    );
  }

  private bindTool(serverName: string, tool: Tool): SimpleTool {
    const connection = this.connection(serverName);
    const metadata: Record<string, unknown> = { server: serverName, remoteName: tool.name };
    if (tool.annotations) metadata.annotations = { ...tool.annotations };

    return new SimpleTool({
      name: sanitizeToolName(tool.name),
      description: tool.description ?? '',
      parameters: { ...tool.inputSchema, type: 'object' },
      metadata,
      invoke: (args) =>
        withSpan('mcp.call_tool', { server: serverName, tool: tool.name }, () =>
          withSession(this.sessionFactory, serverName, connection, async (session) =>
            convertCallToolResult(tool.name, await session.callTool(tool.name, args)),
          ),
        ),
    });
  }
}

async function listAllResourceUris(session: ToolSession): Promise<string[]> {
  const uris: string[] = [];
  let cursor: string | undefined;
  for (let page = 0; page < MAX_PAGINATION_ITERATIONS; page++) {
    const result = await session.listResources(cursor);
    uris.push(...result.resources.map((resource) => resource.uri));
    cursor = result.nextCursor;
    if (!cursor) break;
  }
  return uris;
}

/** Validate a cached payload; servers no longer configured are dropped */
function parseCachedCatalog(
  raw: unknown,
  targets: Record<string, Connection>,
): CatalogByConnection {
  if (!isRecord(raw)) throw new Error('cached catalog is not an object');

  const catalog: CatalogByConnection = {};
  for (const [name, tools] of Object.entries(raw)) {
    if (!(name in targets)) {
      log.warn({ server: name }, 'cached catalog names an unconfigured server, skipping');
      continue;
    }
    if (!Array.isArray(tools)) throw new Error(`cached tools for '${name}' are not a list`);
    catalog[name] = tools.map((tool: unknown) => ToolSchema.parse(tool));
  }
  return catalog;
}
