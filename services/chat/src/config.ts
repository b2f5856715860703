import { logger } from '@toolrelay/shared';
import { DEFAULT_MAX_ITERATIONS, DEFAULT_TEMPERATURE } from '@toolrelay/agent';
import { DEFAULT_TOOL_CACHE_TTL_SECONDS } from '@toolrelay/tools';

const log = logger.child({ module: 'config' });

export const REQUIRED_VARS = ['OPENAI_API_BASE', 'OPENAI_API_KEY', 'TOOLRELAY_MODEL'] as const;

export interface ChatConfig {
  apiBase?: string;
  apiKey?: string;
  model?: string;
  provider: string;
  temperature: number;
  maxIterations: number;
  systemPrompt?: string;
  mcpServersPath?: string;
  toolCacheTtlSeconds: number;
  filterToolJson: boolean;
  port: number;
  authToken?: string;
  /** Allowed CORS origins; undefined allows any origin */
  corsOrigins?: string[];
  /** Required variables that were not set */
  missing: string[];
}

type Env = Record<string, string | undefined>;

function optional(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function parseTemperature(raw: string | undefined): number {
  if (raw === undefined) return DEFAULT_TEMPERATURE;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 2) {
    log.warn({ value: raw, fallback: DEFAULT_TEMPERATURE }, 'invalid TOOLRELAY_TEMPERATURE, using default');
    return DEFAULT_TEMPERATURE;
  }
  return value;
}

function parsePositiveInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    log.warn({ name, value: raw, fallback }, 'invalid integer setting, using default');
    return fallback;
  }
  return value;
}

function parseBoolean(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined) return fallback;
  return !['0', 'false', 'no', 'off'].includes(raw.toLowerCase());
}

/** Read the chat service settings. Missing required variables are logged, never thrown. */
export function loadConfig(env: Env = process.env): ChatConfig {
  const missing = REQUIRED_VARS.filter((name) => optional(env, name) === undefined);
  for (const name of missing) {
    log.warn({ name }, 'required environment variable not set');
  }

  const corsOrigins = optional(env, 'CORS_ORIGINS')
    ?.split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);

  return {
    apiBase: optional(env, 'OPENAI_API_BASE'),
    apiKey: optional(env, 'OPENAI_API_KEY'),
    model: optional(env, 'TOOLRELAY_MODEL'),
    provider: optional(env, 'TOOLRELAY_PROVIDER') ?? 'openai',
    temperature: parseTemperature(optional(env, 'TOOLRELAY_TEMPERATURE')),
    maxIterations: parsePositiveInt('TOOLRELAY_MAX_ITERATIONS', optional(env, 'TOOLRELAY_MAX_ITERATIONS'), DEFAULT_MAX_ITERATIONS),
    systemPrompt: optional(env, 'TOOLRELAY_SYSTEM_PROMPT'),
    mcpServersPath: optional(env, 'MCP_SERVERS_PATH'),
    toolCacheTtlSeconds: parsePositiveInt(
      'TOOL_CACHE_TTL_SECONDS',
      optional(env, 'TOOL_CACHE_TTL_SECONDS'),
      DEFAULT_TOOL_CACHE_TTL_SECONDS,
    ),
    filterToolJson: parseBoolean(optional(env, 'TOOLRELAY_FILTER_TOOL_JSON'), true),
    port: parsePositiveInt('PORT', optional(env, 'PORT'), 3000),
    authToken: optional(env, 'AUTH_TOKEN'),
    corsOrigins: corsOrigins && corsOrigins.length > 0 ? corsOrigins : undefined,
    missing: [...missing],
  };
}

/** Settings safe to show a user; the API key is masked */
export function displayConfig(config: ChatConfig): Record<string, string> {
  return {
    OPENAI_API_BASE: config.apiBase ?? 'Not set',
    OPENAI_API_KEY: config.apiKey ? '***' : 'Not set',
    TOOLRELAY_MODEL: config.model ?? 'Not set',
    TOOLRELAY_PROVIDER: config.provider,
    TOOLRELAY_TEMPERATURE: String(config.temperature),
  };
}
