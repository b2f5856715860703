import pino from 'pino';
import { trace } from '@opentelemetry/api';

/** Log paths that may carry credentials */
const REDACT_PATHS = [
  'apiKey',
  '*.apiKey',
  'authToken',
  '*.authToken',
  'headers.authorization',
  '*.headers.authorization',
  'connection.headers',
  'env',
  '*.env',
];

export const logger = pino({
  name: 'toolrelay',
  level: process.env.LOG_LEVEL ?? 'info',
  redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
  mixin() {
    const span = trace.getActiveSpan();
    if (!span) return {};
    const ctx = span.spanContext();
    return {
      traceId: ctx.traceId,
      spanId: ctx.spanId,
    };
  },
});
