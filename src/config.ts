import nodePath from 'path';
import os from 'os';

export type CredentialStoreKind = 'file' | 'env' | 'kv';

export interface KvConfig {
  accountId: string;
  namespaceId: string;
  apiToken: string;
  key: string;
}

export interface GatewayConfig {
  port: number;
  host: string;
  upstreamEndpoint: string;
  upstreamApiVersion: string;
  oauth: {
    tokenUrl: string;
    clientId: string;
    clientSecret: string;
  };
  credentialStore: CredentialStoreKind;
  credsPath: string;
  credsJson: string | undefined;
  kv: KvConfig;
  projectIdOverride: string | undefined;
  queueDepth: number;
  refreshIntervalMs: number;
  keepaliveIntervalMs: number;
  requestTimeoutMs: number;
  shutdownTimeoutMs: number;
  debug: boolean;
  debugSse: boolean;
  adminApiKey: string | undefined;
}

export const DEFAULTS = {
  port: 9877,
  host: '0.0.0.0',
  upstreamEndpoint: 'https://cloudcode-pa.googleapis.com',
  upstreamApiVersion: 'v1internal',
  tokenUrl: 'https://oauth2.googleapis.com/token',
  kvKey: 'gemini_cli_oauth_credentials',
  queueDepth: 3,
  refreshIntervalMs: 5 * 60 * 1000,
  keepaliveIntervalMs: 10_000,
  requestTimeoutMs: 300_000,
  shutdownTimeoutMs: 30_000,
} as const;

type Env = Record<string, string | undefined>;

function flag(value: string | undefined): boolean {
  return value === 'true' || value === '1';
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function positiveInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function storeKind(value: string | undefined): CredentialStoreKind {
  return value === 'env' || value === 'kv' ? value : 'file';
}

export function defaultCredsPath(): string {
  return nodePath.join(os.homedir(), '.gemini', 'oauth_creds.json');
}

export function loadConfig(env: Env = process.env): GatewayConfig {
  return {
    port: positiveInt(env['PORT'], DEFAULTS.port),
    host: nonEmpty(env['HOST']) ?? DEFAULTS.host,
    upstreamEndpoint: (nonEmpty(env['UPSTREAM_ENDPOINT']) ?? DEFAULTS.upstreamEndpoint).replace(/\/+$/, ''),
    upstreamApiVersion: nonEmpty(env['UPSTREAM_API_VERSION']) ?? DEFAULTS.upstreamApiVersion,
    oauth: {
      tokenUrl: nonEmpty(env['OAUTH_TOKEN_URL']) ?? DEFAULTS.tokenUrl,
      clientId: env['OAUTH_CLIENT_ID'] ?? '',
      clientSecret: env['OAUTH_CLIENT_SECRET'] ?? '',
    },
    credentialStore: storeKind(nonEmpty(env['CREDENTIAL_STORE'])),
    credsPath: nonEmpty(env['CLOUDCODE_OAUTH_CREDS_PATH']) ?? defaultCredsPath(),
    credsJson: nonEmpty(env['CLOUDCODE_OAUTH_CREDS']),
    kv: {
      accountId: env['KV_ACCOUNT_ID'] ?? '',
      namespaceId: env['KV_NAMESPACE_ID'] ?? '',
      apiToken: env['KV_API_TOKEN'] ?? '',
      key: nonEmpty(env['KV_KEY']) ?? DEFAULTS.kvKey,
    },
    projectIdOverride: nonEmpty(env['CLOUDCODE_GCP_PROJECT_ID']),
    queueDepth: positiveInt(env['SSE_BUFFER_SIZE'], DEFAULTS.queueDepth),
    refreshIntervalMs: positiveInt(env['TOKEN_REFRESH_INTERVAL_MS'], DEFAULTS.refreshIntervalMs),
    keepaliveIntervalMs: positiveInt(env['KEEPALIVE_INTERVAL_MS'], DEFAULTS.keepaliveIntervalMs),
    requestTimeoutMs: positiveInt(env['REQUEST_TIMEOUT_MS'], DEFAULTS.requestTimeoutMs),
    shutdownTimeoutMs: positiveInt(env['SHUTDOWN_TIMEOUT_MS'], DEFAULTS.shutdownTimeoutMs),
    debug: flag(env['DEBUG']),
    debugSse: flag(env['DEBUG_SSE']),
    adminApiKey: nonEmpty(env['ADMIN_API_KEY']),
  };
}

const NUMERIC_KEYS = [
  'PORT',
  'SSE_BUFFER_SIZE',
  'TOKEN_REFRESH_INTERVAL_MS',
  'KEEPALIVE_INTERVAL_MS',
  'REQUEST_TIMEOUT_MS',
  'SHUTDOWN_TIMEOUT_MS',
] as const;

/** Returns human-readable warnings for settings that were ignored or are incomplete. */
export function validateConfig(config: GatewayConfig, env: Env = process.env): string[] {
  const warnings: string[] = [];

  for (const key of NUMERIC_KEYS) {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') continue;
    const parsed = parseInt(raw, 10);
    if (!Number.isFinite(parsed) || parsed <= 0) {
      warnings.push(`${key}="${raw}" is not a positive integer, using the default`);
    }
  }

  const rawStore = nonEmpty(env['CREDENTIAL_STORE']);
  if (rawStore !== undefined && rawStore !== config.credentialStore) {
    warnings.push(`CREDENTIAL_STORE="${rawStore}" is not one of file, env, kv; using file`);
  }

  if (config.credentialStore === 'env' && !config.credsJson) {
    warnings.push('CREDENTIAL_STORE=env requires CLOUDCODE_OAUTH_CREDS');
  }

  if (
    config.credentialStore === 'kv' &&
    (!config.kv.accountId || !config.kv.namespaceId || !config.kv.apiToken)
  ) {
    warnings.push('CREDENTIAL_STORE=kv requires KV_ACCOUNT_ID, KV_NAMESPACE_ID and KV_API_TOKEN');
  }

  if (!config.oauth.clientId || !config.oauth.clientSecret) {
    warnings.push('OAUTH_CLIENT_ID / OAUTH_CLIENT_SECRET are not set; token refresh will fail');
  }

  return warnings;
}
