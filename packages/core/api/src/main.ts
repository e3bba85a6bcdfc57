/**
 * API Service Entry Point
 */
import { loadAndValidateConfig, resolveDeploymentMode } from '@agentchat/config';
import { OpenAIExecutionBackend } from '@agentchat/engine';
import { ConsoleLogger } from '@agentchat/utils';
import { createCredentialVerifier } from './auth/verifier.js';
import { createServer } from './server.js';
import { createStore } from './store/index.js';

async function start(): Promise<void> {
  const config = loadAndValidateConfig({ configPath: process.env.AGENTCHAT_CONFIG });
  const logger = new ConsoleLogger('api', config.runtime.log_level);

  const mode = resolveDeploymentMode(config);
  const store = createStore(config.database, logger.child('store'));
  const verifier = createCredentialVerifier(mode, { logger: logger.child('auth') });
  const backend = new OpenAIExecutionBackend({
    store,
    model: config.llm.model,
    apiKey: config.llm.api_key,
    baseUrl: config.llm.base_url,
    maxTokens: config.llm.max_tokens,
    temperature: config.llm.temperature,
    historyLimit: config.llm.history_limit,
    logger: logger.child('engine'),
  });

  const app = createServer({
    service: { name: config.service.name, release: config.service.release },
    store,
    verifier,
    backend,
    logger,
  });

  const shutdown = async (signal: string) => {
    logger.info(`${signal} received, shutting down...`);
    try {
      await app.close();
    } finally {
      await store.close();
    }
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await app.listen({ host: config.server.host, port: config.server.port });
  logger.info(
    `${config.service.name} ${config.service.release} (${config.service.env}) listening on ` +
      `${config.server.host}:${config.server.port} with ${mode.kind} authentication`
  );
}

start().catch((error) => {
  console.error('[api] Fatal error', error);
  process.exit(1);
});
