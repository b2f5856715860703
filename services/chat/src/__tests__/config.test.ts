import { describe, it, expect, afterEach, beforeEach } from 'vitest';
import { displayConfig, loadConfig } from '../config.js';

// ---------------------------------------------------------------------------
// Environment helpers
// ---------------------------------------------------------------------------

const VARS = [
  'OPENAI_API_BASE',
  'OPENAI_API_KEY',
  'TOOLRELAY_MODEL',
  'TOOLRELAY_PROVIDER',
  'TOOLRELAY_TEMPERATURE',
  'TOOLRELAY_MAX_ITERATIONS',
  'TOOLRELAY_SYSTEM_PROMPT',
  'MCP_SERVERS_PATH',
  'TOOL_CACHE_TTL_SECONDS',
  'TOOLRELAY_FILTER_TOOL_JSON',
  'PORT',
  'AUTH_TOKEN',
  'CORS_ORIGINS',
];

const savedEnv: Record<string, string | undefined> = {};

function setEnv(key: string, value: string | undefined) {
  if (!(key in savedEnv)) {
    savedEnv[key] = process.env[key];
  }
  if (value === undefined) {
    delete process.env[key];
  } else {
    process.env[key] = value;
  }
}

function restoreEnv() {
  for (const [key, value] of Object.entries(savedEnv)) {
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
  for (const key of Object.keys(savedEnv)) {
    delete savedEnv[key];
  }
}

beforeEach(() => {
  for (const name of VARS) setEnv(name, undefined);
});

afterEach(() => {
  restoreEnv();
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('loadConfig', () => {
  it('applies defaults and reports every missing required variable', () => {
    const config = loadConfig();

    expect(config).toEqual({
      apiBase: undefined,
      apiKey: undefined,
      model: undefined,
      provider: 'openai',
      temperature: 0.1,
      maxIterations: 15,
      systemPrompt: undefined,
      mcpServersPath: undefined,
      toolCacheTtlSeconds: 300,
      filterToolJson: true,
      port: 3000,
      authToken: undefined,
      corsOrigins: undefined,
      missing: ['OPENAI_API_BASE', 'OPENAI_API_KEY', 'TOOLRELAY_MODEL'],
    });
  });

  it('reads every setting from the environment', () => {
    setEnv('OPENAI_API_BASE', 'http://localhost:11434/v1');
    setEnv('OPENAI_API_KEY', 'test-secret');
    setEnv('TOOLRELAY_MODEL', 'test-model');
    setEnv('TOOLRELAY_PROVIDER', 'ollama');
    setEnv('TOOLRELAY_TEMPERATURE', '0.7');
    setEnv('TOOLRELAY_MAX_ITERATIONS', '4');
    setEnv('TOOLRELAY_SYSTEM_PROMPT', 'be brief');
    setEnv('MCP_SERVERS_PATH', '/etc/servers.json');
    setEnv('TOOL_CACHE_TTL_SECONDS', '60');
    setEnv('TOOLRELAY_FILTER_TOOL_JSON', 'false');
    setEnv('PORT', '8080');
    setEnv('AUTH_TOKEN', 'test-token');
    setEnv('CORS_ORIGINS', 'http://a.test, http://b.test');

    expect(loadConfig()).toEqual({
      apiBase: 'http://localhost:11434/v1',
      apiKey: 'test-secret',
      model: 'test-model',
      provider: 'ollama',
      temperature: 0.7,
      maxIterations: 4,
      systemPrompt: 'be brief',
      mcpServersPath: '/etc/servers.json',
      toolCacheTtlSeconds: 60,
      filterToolJson: false,
      port: 8080,
      authToken: 'test-token',
      corsOrigins: ['http://a.test', 'http://b.test'],
      missing: [],
    });
  });

  it.each(['warm', '-1', '2.5', 'NaN'])('falls back to the default temperature for %s', (value) => {
    setEnv('TOOLRELAY_TEMPERATURE', value);

    expect(loadConfig().temperature).toBe(0.1);
  });

  it('accepts the temperature bounds', () => {
    setEnv('TOOLRELAY_TEMPERATURE', '0');
    expect(loadConfig().temperature).toBe(0);
    setEnv('TOOLRELAY_TEMPERATURE', '2');
    expect(loadConfig().temperature).toBe(2);
  });

  it('falls back for invalid integers', () => {
    setEnv('TOOLRELAY_MAX_ITERATIONS', '0');
    setEnv('PORT', 'eighty');

    const config = loadConfig();
    expect(config.maxIterations).toBe(15);
    expect(config.port).toBe(3000);
  });

  it('treats blank values as unset', () => {
    setEnv('TOOLRELAY_MODEL', '   ');

    expect(loadConfig().missing).toContain('TOOLRELAY_MODEL');
  });

  it('reads from an explicit env object', () => {
    const config = loadConfig({ OPENAI_API_BASE: 'http://x', OPENAI_API_KEY: 'test-secret', TOOLRELAY_MODEL: 'm' });

    expect(config.missing).toEqual([]);
    expect(config.model).toBe('m');
  });
});

describe('displayConfig', () => {
  it('masks the API key', () => {
    const config = loadConfig({ OPENAI_API_KEY: 'test-secret', TOOLRELAY_MODEL: 'm' });

    expect(displayConfig(config)).toEqual({
      OPENAI_API_BASE: 'Not set',
      OPENAI_API_KEY: '***',
      TOOLRELAY_MODEL: 'm',
      TOOLRELAY_PROVIDER: 'openai',
      TOOLRELAY_TEMPERATURE: '0.1',
    });
  });
});
