export { logger } from './logger.js';
export { getTracer, withSpan, currentTraceId, type SpanAttributes } from './tracing.js';
export * from './messages.js';
export * from './errors.js';
export { assertNever, errorMessage, isRecord } from './util.js';
