/**
 * Connection definitions for MCP tool servers, their validation, and the stable
 * hashes used as catalog cache keys.
 */
import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConnectionConfigError, assertNever, isRecord } from '@toolrelay/shared';

const HeadersSchema = z.record(z.string(), z.string());

export const StdioConnectionSchema = z.object({
  transport: z.literal('stdio'),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  env: z.record(z.string(), z.string()).optional(),
  cwd: z.string().optional(),
});

export const SseConnectionSchema = z.object({
  transport: z.literal('sse'),
  url: z.string().url(),
  headers: HeadersSchema.optional(),
  /** Session establishment timeout */
  timeoutMs: z.number().int().positive().optional(),
  /** Per-request timeout once connected */
  readTimeoutMs: z.number().int().positive().optional(),
});

export const StreamableHttpConnectionSchema = z.object({
  transport: z.literal('streamable-http'),
  url: z.string().url(),
  headers: HeadersSchema.optional(),
  timeoutMs: z.number().int().positive().optional(),
  readTimeoutMs: z.number().int().positive().optional(),
  terminateOnClose: z.boolean().default(true),
});

export const WebsocketConnectionSchema = z.object({
  transport: z.literal('websocket'),
  url: z.string().url(),
  headers: HeadersSchema.optional(),
});

export const ConnectionSchema = z.discriminatedUnion('transport', [
  StdioConnectionSchema,
  SseConnectionSchema,
  StreamableHttpConnectionSchema,
  WebsocketConnectionSchema,
]);

export type Connection = z.infer<typeof ConnectionSchema>;
export type ConnectionInput = z.input<typeof ConnectionSchema>;
export type StdioConnection = z.infer<typeof StdioConnectionSchema>;
export type SseConnection = z.infer<typeof SseConnectionSchema>;
export type StreamableHttpConnection = z.infer<typeof StreamableHttpConnectionSchema>;
export type WebsocketConnection = z.infer<typeof WebsocketConnectionSchema>;
export type TransportKind = Connection['transport'];

/** Validate a map of named connections. Throws ConnectionConfigError naming the first bad entry. */
export function parseConnections(raw: unknown): Record<string, Connection> {
  if (!isRecord(raw)) {
    throw new ConnectionConfigError('connections must be an object keyed by server name');
  }

  const connections: Record<string, Connection> = {};
  for (const [name, value] of Object.entries(raw)) {
    const result = ConnectionSchema.safeParse(value);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConnectionConfigError(`invalid connection '${name}': ${issues}`, name);
    }
    connections[name] = result.data;
  }
  return connections;
}

/**
 * Read a JSON file of the form `{ "servers": { "<name>": { "transport": ..., ... } } }`.
 */
export async function loadConnectionsFile(path: string): Promise<Record<string, Connection>> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'));
  } catch (err) {
    throw new ConnectionConfigError(
      `cannot read connections file ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  if (!isRecord(raw) || !('servers' in raw)) {
    throw new ConnectionConfigError(`connections file ${path} has no "servers" object`);
  }
  return parseConnections(raw.servers);
}

/** JSON with object keys sorted at every depth */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (isRecord(value)) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(value[key]);
    }
    return sorted;
  }
  return value;
}

function sortedHeaders(headers: Record<string, string> | undefined): Array<[string, string]> {
  return Object.entries(headers ?? {}).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

/** Fields that identify the server behind a connection. Timeouts and env do not take part. */
export function connectionIdentity(connection: Connection): Record<string, unknown> {
  switch (connection.transport) {
    case 'stdio':
      return {
        transport: connection.transport,
        command: connection.command,
        args: connection.args,
      };
    case 'sse':
    case 'streamable-http':
    case 'websocket':
      return {
        transport: connection.transport,
        url: connection.url,
        headers: sortedHeaders(connection.headers),
      };
    default:
      return assertNever(connection, 'transport');
  }
}

function sha256(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

export function connectionHash(connection: Connection): string {
  return sha256(canonicalJson(connectionIdentity(connection)));
}

/** Hash of a whole connection set, independent of insertion order */
export function connectionsHash(connections: Record<string, Connection>): string {
  const parts = Object.keys(connections)
    .sort()
    .map((name) => `${name}:${connectionHash(connections[name])}`);
  return sha256(parts.join('|'));
}
