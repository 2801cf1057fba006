import fs from 'fs/promises';
import nodePath from 'path';
import { parseJsonObject } from './envelope.js';
import { AuthError, toError } from './errors.js';
import { structuredLog } from './logger.js';
import { isRecord } from './utils.js';

export type FetchLike = typeof fetch;

export interface Credential {
  accessToken: string;
  refreshToken: string;
  /** Milliseconds since epoch; 0 means unknown and is treated as non-expiring. */
  expiryTimestampMillis: number;
  tokenType: string;
  scope?: string;
  idToken?: string;
}

/** The oauth_creds.json record written by the Gemini CLI. */
export interface OAuthCredentialsRecord {
  access_token: string;
  refresh_token?: string;
  expiry_date?: number;
  token_type?: string;
  scope?: string;
  id_token?: string;
}

export interface CredentialStore {
  get(): Promise<Credential>;
  save(credential: Credential): Promise<void>;
  /** Exchanges the refresh token for a new access token and persists the result. */
  refresh(): Promise<Credential>;
  name(): string;
}

export interface OAuthClientConfig {
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
  fetch?: FetchLike;
  now?: () => number;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function expiryMillis(value: unknown): number {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && /^\d+$/.test(value)) return Number(value);
  return 0;
}

export function parseCredentialRecord(value: unknown): Credential {
  if (!isRecord(value)) throw new AuthError('credential record must be a JSON object');
  const accessToken = optionalString(value['access_token']);
  if (!accessToken) throw new AuthError('credential record has no access_token');

  const credential: Credential = {
    accessToken,
    refreshToken: optionalString(value['refresh_token']) ?? '',
    expiryTimestampMillis: expiryMillis(value['expiry_date']),
    tokenType: optionalString(value['token_type']) ?? 'Bearer',
  };
  const scope = optionalString(value['scope']);
  if (scope) credential.scope = scope;
  const idToken = optionalString(value['id_token']);
  if (idToken) credential.idToken = idToken;
  return credential;
}

export function parseCredentialJson(text: string): Credential {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new AuthError('credential record is not valid JSON');
  }
  return parseCredentialRecord(parsed);
}

export function serializeCredential(credential: Credential): OAuthCredentialsRecord {
  const record: OAuthCredentialsRecord = {
    access_token: credential.accessToken,
    token_type: credential.tokenType,
  };
  if (credential.refreshToken) record.refresh_token = credential.refreshToken;
  if (credential.expiryTimestampMillis > 0) record.expiry_date = credential.expiryTimestampMillis;
  if (credential.scope) record.scope = credential.scope;
  if (credential.idToken) record.id_token = credential.idToken;
  return record;
}

export function isExpiring(credential: Credential, now: number, bufferMs: number): boolean {
  if (credential.expiryTimestampMillis <= 0) return false;
  return credential.expiryTimestampMillis - now <= bufferMs;
}

/**
 * Refresh-token grant against the OAuth token endpoint. The old refresh token
 * is kept unless the endpoint issues a new one.
 */
export async function refreshOAuthToken(
  credential: Credential,
  oauth: OAuthClientConfig
): Promise<Credential> {
  if (!credential.refreshToken) throw new AuthError('no refresh token available');

  const fetchImpl = oauth.fetch ?? fetch;
  const now = oauth.now ?? Date.now;
  const form = new URLSearchParams({
    client_id: oauth.clientId,
    client_secret: oauth.clientSecret,
    refresh_token: credential.refreshToken,
    grant_type: 'refresh_token',
  });

  let response: Response;
  try {
    response = await fetchImpl(oauth.tokenUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: form.toString(),
    });
  } catch (err) {
    throw new AuthError(`token refresh request failed: ${toError(err).message}`, { cause: err });
  }

  const text = await response.text();
  if (!response.ok) {
    throw new AuthError(`token refresh failed with status ${String(response.status)}: ${text}`);
  }

  const body = parseJsonObject(text);
  const accessToken = body ? optionalString(body['access_token']) : undefined;
  if (!body || !accessToken) throw new AuthError('token refresh response has no access_token');

  const expiresIn = body['expires_in'];
  const refreshed: Credential = {
    accessToken,
    refreshToken: optionalString(body['refresh_token']) ?? credential.refreshToken,
    expiryTimestampMillis:
      typeof expiresIn === 'number' && expiresIn > 0 ? now() + expiresIn * 1000 : 0,
    tokenType: optionalString(body['token_type']) ?? credential.tokenType,
  };
  const scope = optionalString(body['scope']) ?? credential.scope;
  if (scope) refreshed.scope = scope;
  const idToken = optionalString(body['id_token']) ?? credential.idToken;
  if (idToken) refreshed.idToken = idToken;
  return refreshed;
}

abstract class OAuthCredentialStore implements CredentialStore {
  constructor(protected readonly oauth: OAuthClientConfig) {}

  abstract get(): Promise<Credential>;
  abstract save(credential: Credential): Promise<void>;
  abstract name(): string;

  async refresh(): Promise<Credential> {
    const current = await this.get();
    const refreshed = await refreshOAuthToken(current, this.oauth);
    try {
      await this.save(refreshed);
    } catch (err) {
      structuredLog('warn', 'Auth', `Refreshed token could not be persisted to ${this.name()}: ${toError(err).message}`);
    }
    structuredLog('info', 'Auth', `Access token refreshed via ${this.name()}`);
    return refreshed;
  }
}

function isNotFound(err: unknown): boolean {
  return isRecord(err) && err['code'] === 'ENOENT';
}

/**
 * Reads and writes the credential record on disk. When the file is missing
 * and a fallback JSON document is configured, the store serves that instead
 * and keeps refreshed tokens in memory only.
 */
export class FileCredentialStore extends OAuthCredentialStore {
  private fallbackActive = false;
  private memory: Credential | null = null;

  constructor(
    private readonly path: string,
    oauth: OAuthClientConfig,
    private readonly fallbackJson?: string
  ) {
    super(oauth);
  }

  async get(): Promise<Credential> {
    let text: string;
    try {
      text = await fs.readFile(this.path, 'utf-8');
    } catch (err) {
      if (!isNotFound(err)) {
        throw new AuthError(`failed to read ${this.path}: ${toError(err).message}`, { cause: err });
      }
      if (!this.fallbackJson) throw new AuthError('credentials not found');
      this.fallbackActive = true;
      return this.memory ?? parseCredentialJson(this.fallbackJson);
    }
    this.fallbackActive = false;
    return parseCredentialJson(text);
  }

  async save(credential: Credential): Promise<void> {
    if (this.fallbackActive) {
      this.memory = credential;
      structuredLog('warn', 'Auth', 'Credentials came from the environment; keeping the update in memory only');
      return;
    }
    await fs.mkdir(nodePath.dirname(this.path), { recursive: true, mode: 0o700 });
    await fs.writeFile(this.path, `${JSON.stringify(serializeCredential(credential), null, 2)}\n`, {
      mode: 0o600,
    });
  }

  name(): string {
    return this.fallbackActive ? 'FileCredentialStore(env)' : `FileCredentialStore(${this.path})`;
  }
}

/** Read-only source backed by a JSON document from the environment. */
export class EnvCredentialStore extends OAuthCredentialStore {
  private memory: Credential | null = null;

  constructor(
    private readonly json: string | undefined,
    oauth: OAuthClientConfig
  ) {
    super(oauth);
  }

  get(): Promise<Credential> {
    if (this.memory) return Promise.resolve(this.memory);
    if (!this.json) return Promise.reject(new AuthError('credentials not found'));
    try {
      return Promise.resolve(parseCredentialJson(this.json));
    } catch (err) {
      return Promise.reject(toError(err));
    }
  }

  save(credential: Credential): Promise<void> {
    this.memory = credential;
    return Promise.resolve();
  }

  name(): string {
    return 'EnvCredentialStore';
  }
}

export interface KvStoreOptions {
  accountId: string;
  namespaceId: string;
  apiToken: string;
  key: string;
  baseUrl?: string;
}

const KV_API_BASE = 'https://api.cloudflare.com/client/v4';

/** Credential record kept under one key of a remote key-value namespace. */
export class KvCredentialStore extends OAuthCredentialStore {
  private readonly url: string;
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly options: KvStoreOptions,
    oauth: OAuthClientConfig
  ) {
    super(oauth);
    const base = (options.baseUrl ?? KV_API_BASE).replace(/\/+$/, '');
    this.url =
      `${base}/accounts/${encodeURIComponent(options.accountId)}` +
      `/storage/kv/namespaces/${encodeURIComponent(options.namespaceId)}` +
      `/values/${encodeURIComponent(options.key)}`;
    this.fetchImpl = oauth.fetch ?? fetch;
  }

  async get(): Promise<Credential> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.url, {
        headers: { Authorization: `Bearer ${this.options.apiToken}` },
      });
    } catch (err) {
      throw new AuthError(`key-value read failed: ${toError(err).message}`, { cause: err });
    }
    if (response.status === 404) throw new AuthError('credentials not found');
    const text = await response.text();
    if (!response.ok) {
      throw new AuthError(`key-value read failed with status ${String(response.status)}: ${text}`);
    }
    return parseCredentialJson(text);
  }

  async save(credential: Credential): Promise<void> {
    const response = await this.fetchImpl(this.url, {
      method: 'PUT',
      headers: {
        Authorization: `Bearer ${this.options.apiToken}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(serializeCredential(credential)),
    });
    if (!response.ok) {
      throw new Error(`key-value write failed with status ${String(response.status)}: ${await response.text()}`);
    }
  }

  name(): string {
    return `KvCredentialStore(${this.options.key})`;
  }
}
