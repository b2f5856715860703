import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { IncomingMessage } from 'node:http';
import { WebSocketServer, type WebSocket } from 'ws';
import type { JSONRPCMessage } from '@modelcontextprotocol/sdk/types.js';
import { HeaderWebSocketTransport } from '../ws-transport.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface ServerSide {
  socket: WebSocket;
  request: IncomingMessage;
}

function nextConnection(server: WebSocketServer): Promise<ServerSide> {
  return new Promise((resolve) => {
    server.once('connection', (socket, request) => resolve({ socket, request }));
  });
}

const ping: JSONRPCMessage = { jsonrpc: '2.0', id: 1, method: 'ping' };

let server: WebSocketServer;
let url: URL;
let transport: HeaderWebSocketTransport | undefined;

function open(headers?: Record<string, string>): HeaderWebSocketTransport {
  const created = new HeaderWebSocketTransport(url, headers);
  transport = created;
  return created;
}

beforeEach(async () => {
  server = new WebSocketServer({
    host: '127.0.0.1',
    port: 0,
    handleProtocols: (protocols) => (protocols.has('mcp') ? 'mcp' : false),
  });
  await new Promise<void>((resolve) => server.once('listening', () => resolve()));
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error(`unexpected server address ${address}`);
  url = new URL(`ws://127.0.0.1:${address.port}`);
});

afterEach(async () => {
  await transport?.close();
  transport = undefined;
  for (const client of server.clients) client.terminate();
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

// ---------------------------------------------------------------------------
// HeaderWebSocketTransport
// ---------------------------------------------------------------------------

describe('HeaderWebSocketTransport', () => {
  it('rejects send before start', async () => {
    await expect(open().send(ping)).rejects.toThrow('WebSocket is not connected');
  });

  it('connects with the mcp subprotocol and the configured headers', async () => {
    const connected = nextConnection(server);
    await open({ 'X-Api-Key': 'test-secret' }).start();
    const { socket, request } = await connected;

    expect(socket.protocol).toBe('mcp');
    expect(request.headers['x-api-key']).toBe('test-secret');
  });

  it('refuses to start twice', async () => {
    const client = open();
    await client.start();

    await expect(client.start()).rejects.toThrow('HeaderWebSocketTransport already started');
  });

  it('round-trips JSON-RPC messages', async () => {
    const connected = nextConnection(server);
    const client = open();
    const reply = new Promise<JSONRPCMessage>((resolve) => {
      client.onmessage = resolve;
    });

    await client.start();
    const { socket } = await connected;
    const request = new Promise<string>((resolve) => socket.once('message', (data) => resolve(data.toString())));
    await client.send(ping);

    expect(JSON.parse(await request)).toEqual(ping);
    socket.send(JSON.stringify({ jsonrpc: '2.0', id: 1, result: {} }));
    expect(await reply).toEqual({ jsonrpc: '2.0', id: 1, result: {} });
  });

  it('reports malformed frames through onerror without delivering them', async () => {
    const connected = nextConnection(server);
    const client = open();
    const delivered: JSONRPCMessage[] = [];
    client.onmessage = (message) => delivered.push(message);
    const failure = new Promise<Error>((resolve) => {
      client.onerror = resolve;
    });

    await client.start();
    const { socket } = await connected;
    socket.send('not json');

    expect(await failure).toBeInstanceOf(SyntaxError);
    expect(delivered).toEqual([]);
  });

  it('calls onclose when the server hangs up', async () => {
    const connected = nextConnection(server);
    const client = open();
    const closed = new Promise<void>((resolve) => {
      client.onclose = () => resolve();
    });

    await client.start();
    (await connected).socket.close();

    await expect(closed).resolves.toBeUndefined();
  });
});
