#!/usr/bin/env node

import 'dotenv/config';
import { ConfigurationError, loadConfig, type EnvConfig } from './config.js';
import { describeError } from './errors.js';
import { TaigaGateway } from './gateway.js';
import { IdempotencyStore } from './idempotency.js';
import { logger } from './logging/index.js';
import { createApp } from './server.js';
import { withTaigaClient, type TaigaApi, type TaigaClientSettings } from './taiga-client.js';
import { SERVER_VERSION, tools } from './tools.js';

function readConfig(): EnvConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

async function main() {
  const config = readConfig();
  logger.setSecrets([config.TAIGA_PASSWORD, config.ACTION_PROXY_API_KEY]);

  const settings: TaigaClientSettings = {
    baseUrl: config.TAIGA_BASE_URL,
    username: config.TAIGA_USERNAME,
    password: config.TAIGA_PASSWORD,
    timeoutMs: config.TAIGA_REQUEST_TIMEOUT_MS,
  };

  const gateway = new TaigaGateway({
    withClient: <T>(action: (client: TaigaApi) => Promise<T>) => withTaigaClient(settings, action),
    idempotency: new IdempotencyStore({
      ttlSeconds: config.IDEMPOTENCY_TTL_SECONDS,
      maxEntries: config.IDEMPOTENCY_MAX_ENTRIES,
    }),
  });

  if (!config.TAIGA_BASE_URL || !config.TAIGA_USERNAME || !config.TAIGA_PASSWORD) {
    logger.warning('Taiga credentials are incomplete; remote calls will fail', {}, 'main');
  }
  if (!config.ACTION_PROXY_API_KEY) {
    logger.warning('ACTION_PROXY_API_KEY is not set; /actions will answer 503', {}, 'main');
  }

  const app = createApp({
    gateway,
    apiKey: config.ACTION_PROXY_API_KEY,
    allowedHosts: config.ALLOWED_HOSTS,
  });

  const server = app.listen(config.PORT, config.HOST, () => {
    logger.info('Taiga MCP gateway started', {
      version: SERVER_VERSION,
      host: config.HOST,
      port: config.PORT,
      tools: tools.length,
      dns_rebinding_protection: config.ALLOWED_HOSTS.length > 0,
    }, 'main');
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal }, 'main');
    server.close((error) => {
      if (error) {
        logger.error('Error while closing HTTP server', { error: describeError(error) }, 'main');
      }
      logger.flush();
      process.exit(error ? 1 : 0);
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  logger.critical('Fatal error', { error: describeError(error) }, 'main');
  logger.flush();
  process.exit(1);
});
