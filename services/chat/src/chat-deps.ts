import { ConfigurationError } from '@toolrelay/shared';
import { AgentExecutor, CompletionClient, type CompletionTransport, type ToolSource } from '@toolrelay/agent';
import type { ApiDeps, ChatMode } from './api.js';
import { displayConfig, type ChatConfig } from './config.js';
import { CODE_ASSISTANT_SYSTEM_PROMPT, createCodeAssistantTool } from './tools/code-assistant.js';

export const DEFAULT_CHAT_SYSTEM_PROMPT = 'You are a helpful AI assistant.';

/** The part of RemoteToolClient the chat service uses */
export interface RemoteCatalog extends ToolSource {
  invalidate(serverName?: string): Promise<void>;
}

export interface ChatDepsOptions {
  config: ChatConfig;
  transport: CompletionTransport;
  remote?: RemoteCatalog;
}

/**
 * Wire the API to the agent. Every request gets its own client and executor, so
 * conversations never share history; the remote catalog cache is shared.
 */
export function buildChatDeps({ config, transport, remote }: ChatDepsOptions): ApiDeps {
  const codeTool = createCodeAssistantTool();

  const createClient = (mode: ChatMode) =>
    new CompletionClient({
      model: config.model ?? 'default',
      transport,
      temperature: config.temperature,
      systemPrompt:
        mode === 'code' ? CODE_ASSISTANT_SYSTEM_PROMPT : (config.systemPrompt ?? DEFAULT_CHAT_SYSTEM_PROMPT),
      tools: mode === 'code' ? [codeTool] : [],
      remoteTools: remote,
    });

  return {
    createRunner: (mode) => {
      if (config.missing.length > 0) {
        throw new ConfigurationError(`missing required settings: ${config.missing.join(', ')}`);
      }
      return new AgentExecutor(createClient(mode), { maxIterations: config.maxIterations });
    },
    listTools: async () => (await createClient('code').loadTools()).describe(),
    refreshTools: async () => {
      await remote?.invalidate();
    },
    filterToolJson: config.filterToolJson,
    authToken: config.authToken,
    corsOrigins: config.corsOrigins,
    displayConfig: displayConfig(config),
  };
}
