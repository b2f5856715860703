import { logger } from '@toolrelay/shared';
import { createOpenAITransport } from '@toolrelay/agent';
import { MemoryToolCache, RemoteToolClient, loadConnectionsFile } from '@toolrelay/tools';
import { createApi } from './api.js';
import { buildChatDeps } from './chat-deps.js';
import { loadConfig } from './config.js';

const log = logger.child({ module: 'chat' });

async function main() {
  log.info('starting chat service');

  const config = loadConfig();
  if (config.missing.length > 0) {
    log.warn({ missing: config.missing }, 'starting with incomplete model configuration');
  }

  let remote: RemoteToolClient | undefined;
  if (config.mcpServersPath) {
    const connections = await loadConnectionsFile(config.mcpServersPath);
    remote = new RemoteToolClient({
      connections,
      cache: new MemoryToolCache(),
      cacheTtlSeconds: config.toolCacheTtlSeconds,
    });
    log.info({ servers: remote.connectionNames }, 'MCP connections loaded');
  }

  const transport = createOpenAITransport({
    apiKey: config.apiKey,
    provider: config.provider,
    baseURL: config.apiBase,
  });

  const app = createApi(buildChatDeps({ config, transport, remote }));
  const server = app.listen(config.port, () => {
    log.info({ port: config.port, model: config.model }, 'chat API listening');
  });

  const shutdown = () => {
    log.info('shutting down');
    server.close((err) => {
      if (err) {
        log.error({ err }, 'server close failed');
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err) => {
  log.fatal({ err }, 'chat service failed to start');
  process.exit(1);
});
