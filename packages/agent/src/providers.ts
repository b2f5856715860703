/**
 * Base URLs of OpenAI-compatible providers. Resolved once and handed to the
 * transport constructor; nothing here is mutated at run time.
 */

export const PROVIDER_BASE_URLS: Readonly<Record<string, string>> = Object.freeze({
  openrouter: 'https://openrouter.ai/api/v1',
  anthropic: 'https://api.anthropic.com/v1/',
  cerebras: 'https://api.cerebras.ai/v1',
  groq: 'https://api.groq.com/openai/v1',
  requesty: 'https://router.requesty.ai/v1',
  ollama: 'http://localhost:11434/v1',
});

export const GOOGLE_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta/openai/';

/**
 * An explicit URL always wins. Unknown providers resolve to undefined, which leaves
 * the SDK on its own default endpoint.
 */
export function resolveBaseUrl(provider: string, explicit?: string): string | undefined {
  if (explicit) return explicit;
  if (Object.hasOwn(PROVIDER_BASE_URLS, provider)) return PROVIDER_BASE_URLS[provider];
  if (provider.toLowerCase().includes('google')) return GOOGLE_BASE_URL;
  return undefined;
}
