#!/usr/bin/env node
import 'dotenv/config';
import { CredentialManager } from './auth-manager.js';
import { type GatewayConfig, loadConfig, validateConfig } from './config.js';
import {
  type CredentialStore,
  EnvCredentialStore,
  FileCredentialStore,
  KvCredentialStore,
  type OAuthClientConfig,
} from './credentials.js';
import { discoverTenant } from './discover.js';
import { toError } from './errors.js';
import { configureLogging, structuredLog } from './logger.js';
import { DEFAULT_MODEL, getModels } from './models.js';
import { createGateway } from './server.js';
import { CodeAssistClient } from './upstream.js';

function createCredentialStore(config: GatewayConfig): CredentialStore {
  const oauth: OAuthClientConfig = { ...config.oauth };
  switch (config.credentialStore) {
    case 'env':
      return new EnvCredentialStore(config.credsJson, oauth);
    case 'kv':
      return new KvCredentialStore(config.kv, oauth);
    case 'file':
      return new FileCredentialStore(config.credsPath, oauth, config.credsJson);
  }
}

async function startServer(): Promise<void> {
  const config = loadConfig();
  configureLogging({ debug: config.debug });
  for (const warning of validateConfig(config)) {
    structuredLog('warn', 'Config', warning);
  }

  const credentials = new CredentialManager(createCredentialStore(config));
  try {
    await credentials.load();
  } catch (err) {
    structuredLog(
      'warn',
      'Startup',
      `Starting without credentials (${toError(err).message}); upload them via POST /admin/credentials`
    );
  }
  credentials.startBackgroundRefresh(config.refreshIntervalMs);

  const client = new CodeAssistClient({
    endpoint: config.upstreamEndpoint,
    apiVersion: config.upstreamApiVersion,
    credentials,
  });

  let tenantId = '';
  const discover = async (): Promise<void> => {
    try {
      tenantId = await discoverTenant(client, config.projectIdOverride);
    } catch (err) {
      structuredLog('warn', 'Discovery', `Project discovery failed: ${toError(err).message}`);
    }
  };
  if (credentials.current || config.projectIdOverride) await discover();

  const gateway = createGateway({
    config,
    credentials,
    client,
    getTenantId: () => tenantId,
    onCredentialsReplaced: async () => {
      if (!tenantId) await discover();
    },
  });

  const stop = (signal: string) => {
    void gateway.shutdown(signal).then(() => process.exit(0));
  };
  process.on('SIGTERM', () => stop('SIGTERM'));
  process.on('SIGINT', () => stop('SIGINT'));

  process.on('uncaughtException', (error) => {
    structuredLog('error', 'Process', 'Uncaught exception', { data: error.message });
    stop('uncaughtException');
  });
  process.on('unhandledRejection', (reason) => {
    structuredLog('error', 'Process', 'Unhandled rejection', { data: reason });
  });

  gateway.server.listen(config.port, config.host, () => {
    structuredLog('info', 'Startup', `Server started on ${config.host}:${String(config.port)}`);
    console.log(`
Code Assist Gateway - OpenAI-compatible proxy
  Server:        http://localhost:${String(config.port)}
  Default model: ${DEFAULT_MODEL}
  Project:       ${tenantId || '(not discovered)'}
  Credentials:   ${credentials.storeName}
  Models:
${getModels()
  .map((m) => `    - ${m.id}`)
  .join('\n')}
  Endpoints:
    POST /v1/chat/completions                Chat completions
    POST /v1beta/models/{model}:{action}     Gemini-style passthrough
    GET  /v1/models                          List models
    GET  /health                             Detailed health check
    GET  /version                            Server version info
    GET  /metrics                            Request metrics
`);
  });
}

startServer().catch((err: unknown) => {
  structuredLog('error', 'Startup', 'Failed to start server', { data: toError(err).message });
  process.exit(1);
});
