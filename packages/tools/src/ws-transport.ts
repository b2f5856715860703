/**
 * MCP client transport over a WebSocket, using the `mcp` subprotocol.
 *
 * The SDK's own websocket transport takes no request headers and needs a global
 * `WebSocket`, which Node 20 lacks. This one runs on `ws` and sends the connection's headers.
 */
import WebSocket from 'ws';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { JSONRPCMessageSchema, type JSONRPCMessage } from '@modelcontextprotocol/sdk/types.js';

const SUBPROTOCOL = 'mcp';

function decode(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf-8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  return Buffer.from(data).toString('utf-8');
}

export class HeaderWebSocketTransport implements Transport {
  private socket?: WebSocket;

  onclose?: () => void;
  onerror?: (error: Error) => void;
  onmessage?: (message: JSONRPCMessage) => void;

  constructor(
    private readonly url: URL,
    private readonly headers?: Record<string, string>,
  ) {}

  start(): Promise<void> {
    if (this.socket) {
      return Promise.reject(new Error('HeaderWebSocketTransport already started'));
    }

    return new Promise((resolve, reject) => {
      const socket = new WebSocket(this.url, SUBPROTOCOL, { headers: this.headers });
      this.socket = socket;

      socket.once('open', () => resolve());
      socket.on('error', (err) => {
        reject(err);
        this.onerror?.(err);
      });
      socket.on('close', () => this.onclose?.());
      socket.on('message', (data) => {
        let message: JSONRPCMessage;
        try {
          message = JSONRPCMessageSchema.parse(JSON.parse(decode(data)));
        } catch (err) {
          this.onerror?.(err instanceof Error ? err : new Error(String(err)));
          return;
        }
        this.onmessage?.(message);
      });
    });
  }

  send(message: JSONRPCMessage): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.socket || this.socket.readyState !== WebSocket.OPEN) {
        reject(new Error('WebSocket is not connected'));
        return;
      }
      this.socket.send(JSON.stringify(message), (err) => (err ? reject(err) : resolve()));
    });
  }

  async close(): Promise<void> {
    this.socket?.close();
  }
}
