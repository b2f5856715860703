import { CatalogFetchError, ConfigurationError, errorMessage, logger } from '@toolrelay/shared';

const log = logger.child({ module: 'error-format' });

/** Patterns matching keys, tokens and passwords that must not reach a user */
const SENSITIVE_PATTERNS = [
  /sk-[a-zA-Z0-9_-]{20,}/g,               // OpenAI-style API keys
  /api[_-]?key['"\s:=]+[a-zA-Z0-9_-]+/gi,
  /token['"\s:=]+[a-zA-Z0-9_.-]+/gi,
  /password['"\s:=]+\w+/gi,
  /secret['"\s:=]+\w+/gi,
  /\b[a-f0-9]{64}\b/gi,                     // 64-char hex tokens
];

export function redactSecrets(text: string): string {
  let sanitized = text;
  for (const pattern of SENSITIVE_PATTERNS) {
    sanitized = sanitized.replace(pattern, '[REDACTED]');
  }
  return sanitized;
}

/** Where the failure happened; decides which messages apply */
export type ErrorKind = 'llm' | 'configuration' | 'streaming' | 'generic';

export type ErrorCategory =
  | 'connection'
  | 'authentication'
  | 'rate_limit'
  | 'iteration_limit'
  | 'llm_error'
  | 'tool_server'
  | 'configuration'
  | 'streaming'
  | 'generic';

export interface UserError {
  category: ErrorCategory;
  message: string;
  retry: boolean;
}

const CONNECTION_WORDS = ['connection', 'refused', 'timeout', 'timed out', 'unreachable'];
const AUTH_WORDS = ['authentication', 'unauthorized', 'invalid api key', '401'];
const RATE_LIMIT_WORDS = ['rate limit', 'quota', 'too many requests', '429'];

function mentions(text: string, words: readonly string[]): boolean {
  return words.some((word) => text.includes(word));
}

function classifyLlmError(text: string): UserError {
  const lower = text.toLowerCase();
  if (lower.startsWith('recursion limit reached')) {
    return { category: 'iteration_limit', message: redactSecrets(text), retry: false };
  }
  if (mentions(lower, CONNECTION_WORDS)) {
    return {
      category: 'connection',
      message: 'Cannot connect to LLM service. Please check your configuration.',
      retry: true,
    };
  }
  if (mentions(lower, AUTH_WORDS)) {
    return {
      category: 'authentication',
      message: 'Authentication failed. Please check your API key configuration.',
      retry: false,
    };
  }
  if (mentions(lower, RATE_LIMIT_WORDS)) {
    return { category: 'rate_limit', message: 'Rate limit exceeded. Please try again later.', retry: true };
  }
  return { category: 'llm_error', message: 'LLM service encountered an error. Please try again.', retry: true };
}

/**
 * Turn an error into a message fit for a user. Raw error text is only shown for
 * configuration errors, and then with secrets redacted.
 */
export function formatErrorForUser(err: unknown, kind: ErrorKind = 'llm'): UserError {
  const text = errorMessage(err);
  if (err instanceof CatalogFetchError) {
    log.error({ error: redactSecrets(text), server: err.connection }, 'tool server error');
    return {
      category: 'tool_server',
      message: `Cannot reach tool server '${err.connection}'. Please check the MCP server configuration.`,
      retry: true,
    };
  }
  const effectiveKind: ErrorKind = err instanceof ConfigurationError ? 'configuration' : kind;

  switch (effectiveKind) {
    case 'configuration':
      if (text.toLowerCase().includes('temperature')) {
        return {
          category: 'configuration',
          message: 'Invalid temperature configuration. Please check your settings.',
          retry: false,
        };
      }
      return { category: 'configuration', message: `Configuration error: ${redactSecrets(text)}`, retry: false };
    case 'llm':
      log.error({ error: redactSecrets(text) }, 'llm error');
      return classifyLlmError(text);
    case 'streaming':
      log.error({ error: redactSecrets(text) }, 'streaming error');
      return { category: 'streaming', message: 'Streaming was interrupted. Please try again.', retry: true };
    case 'generic':
      log.error({ error: redactSecrets(text) }, 'unexpected error');
      return { category: 'generic', message: 'An unexpected error occurred. Please try again.', retry: false };
  }
}

/** One line for a terminal or chat bubble */
export function describeUserError(error: UserError): string {
  return error.retry ? `${error.message} You can try again.` : error.message;
}
