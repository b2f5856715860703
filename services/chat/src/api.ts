import express from 'express';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { timingSafeEqual } from 'node:crypto';
import { z } from 'zod';
import { currentTraceId, logger } from '@toolrelay/shared';
import type { ToolDescription } from '@toolrelay/tools';
import { StreamContentFilter, type AgentEvent, type InputMessage } from '@toolrelay/agent';
import { describeUserError, formatErrorForUser, type ErrorCategory, type UserError } from './error-format.js';
import { CODE_ASSISTANT_TOOL_NAME } from './tools/code-assistant.js';

const log = logger.child({ module: 'api' });

export type ChatMode = 'chat' | 'code';

/** One conversation turn; AgentExecutor is the usual implementation */
export interface ChatRunner {
  run(messages: readonly InputMessage[]): AsyncIterable<AgentEvent>;
}

export interface ApiDeps {
  createRunner(mode: ChatMode): ChatRunner;
  listTools(): Promise<ToolDescription[]>;
  /** Drop cached catalogs so the next request fetches them again */
  refreshTools?(): Promise<void>;
  filterToolJson: boolean;
  authToken?: string;
  corsOrigins?: string[];
  /** Masked settings for GET /config */
  displayConfig?: Record<string, string>;
}

/** Events written to the SSE stream */
export type StreamEvent =
  | { type: 'content'; text: string }
  | { type: 'reasoning'; text: string }
  | { type: 'tool_output'; name: string; content: string }
  | { type: 'tool_output_error'; name: string; content: string }
  | { type: 'done' }
  | { type: 'error'; message: string; category: ErrorCategory; retry: boolean };

const ChatRequestSchema = z.object({
  messages: z.array(z.record(z.string(), z.unknown())).min(1),
  mode: z.enum(['chat', 'code']).default('chat'),
});

function safeCompare(a: string, b: string): boolean {
  if (a.length !== b.length) return false;
  return timingSafeEqual(Buffer.from(a), Buffer.from(b));
}

function authMiddleware(token: string | undefined): RequestHandler {
  if (!token) {
    log.warn('AUTH_TOKEN not configured - running without authentication');
  }

  return (req: Request, res: Response, next: NextFunction): void => {
    // Health checks bypass auth
    if (!token || req.path === '/ping') {
      next();
      return;
    }

    const authHeader = req.headers.authorization;
    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      res.status(401).json({ error: 'unauthorized' });
      return;
    }
    if (!safeCompare(authHeader.slice(7), token)) {
      res.status(401).json({ error: 'unauthorized' });
      return;
    }
    next();
  };
}

function errorEvent(error: UserError): StreamEvent {
  return { type: 'error', message: describeUserError(error), category: error.category, retry: error.retry };
}

export function createApi(deps: ApiDeps) {
  const app = express();
  app.use(express.json());

  // CORS: configured origins only, or anything when none are configured
  const allowedOrigins = deps.corsOrigins;
  app.use((req, res, next) => {
    const origin = req.headers.origin;
    if (!allowedOrigins || (origin && allowedOrigins.includes(origin))) {
      res.setHeader('Access-Control-Allow-Origin', origin ?? '*');
    }
    res.setHeader('Vary', 'Origin');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
    if (req.method === 'OPTIONS') {
      res.status(204).end();
      return;
    }
    next();
  });

  app.use((_req, res, next) => {
    const traceId = currentTraceId();
    if (traceId) {
      res.setHeader('X-Trace-Id', traceId);
    }
    next();
  });

  app.use(authMiddleware(deps.authToken));

  app.get('/ping', (_req, res) => {
    res.json({ status: 'ok', service: 'chat', timestamp: new Date().toISOString() });
  });

  app.get('/config', (_req, res) => {
    res.json(deps.displayConfig ?? {});
  });

  app.get('/tools', async (_req, res) => {
    try {
      const tools = await deps.listTools();
      res.json({ tools });
    } catch (err) {
      log.error({ err }, 'tool listing failed');
      res.status(502).json({ error: describeUserError(formatErrorForUser(err, 'generic')) });
    }
  });

  app.post('/tools/refresh', async (_req, res) => {
    try {
      await deps.refreshTools?.();
      res.json({ refreshed: true });
    } catch (err) {
      log.error({ err }, 'tool refresh failed');
      res.status(500).json({ error: 'internal server error' });
    }
  });

  app.post('/chat/stream', async (req, res) => {
    const parsed = ChatRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'messages must be a non-empty array of message objects' });
      return;
    }
    const { messages, mode } = parsed.data;
    log.info({ mode, messages: messages.length }, 'chat stream request');

    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.flushHeaders();

    const send = (event: StreamEvent) => {
      res.write(`data: ${JSON.stringify(event)}\n\n`);
    };
    const filter = deps.filterToolJson
      ? new StreamContentFilter({ knownToolNames: mode === 'code' ? [CODE_ASSISTANT_TOOL_NAME] : [] })
      : undefined;
    const flush = () => {
      const rest = filter?.flush();
      if (rest) send({ type: 'content', text: rest });
    };

    try {
      let failed = false;
      for await (const event of deps.createRunner(mode).run(messages)) {
        switch (event.type) {
          case 'content': {
            const text = filter ? filter.consume(event.text).emit : event.text;
            if (text) send({ type: 'content', text });
            break;
          }
          case 'reasoning':
            send({ type: 'reasoning', text: event.text });
            break;
          case 'tool_output':
          case 'tool_output_error':
            send({ type: event.type, name: event.name, content: event.content });
            break;
          case 'error':
            flush();
            send(errorEvent(formatErrorForUser(event.cause ?? event.message, 'llm')));
            failed = true;
            break;
          case 'raw':
          case 'values':
            break;
        }
      }
      if (!failed) {
        flush();
        send({ type: 'done' });
      }
    } catch (err) {
      log.error({ err }, 'chat stream error');
      send(errorEvent(formatErrorForUser(err, 'streaming')));
    }
    res.end();
  });

  return app;
}
