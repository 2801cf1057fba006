import { type Credential, type CredentialStore, isExpiring } from './credentials.js';
import { AuthError, toError } from './errors.js';
import { structuredLog } from './logger.js';

export const EXPIRY_BUFFER_MS = 5 * 60 * 1000;
export const DEFAULT_REFRESH_INTERVAL_MS = 5 * 60 * 1000;

export interface CredentialManagerOptions {
  expiryBufferMs?: number;
  now?: () => number;
}

export interface CredentialStatus {
  hasCredentials: boolean;
  provider: string;
  isExpired: boolean;
  expiryDate: number;
  hasRefreshToken: boolean;
}

type HeaderMap = Record<string, string>;

function hasAuthorization(headers: HeaderMap): boolean {
  return Object.keys(headers).some((key) => key.toLowerCase() === 'authorization');
}

/**
 * Owns the process-wide access token. Readers get an immutable snapshot;
 * loads and refreshes publish a new one instead of editing the old.
 */
export class CredentialManager {
  private snapshot: Readonly<Credential> | null = null;
  private inflightRefresh: Promise<Readonly<Credential>> | null = null;
  private timer: NodeJS.Timeout | null = null;
  private readonly expiryBufferMs: number;
  private readonly now: () => number;

  constructor(
    private readonly store: CredentialStore,
    options: CredentialManagerOptions = {}
  ) {
    this.expiryBufferMs = options.expiryBufferMs ?? EXPIRY_BUFFER_MS;
    this.now = options.now ?? Date.now;
  }

  get current(): Readonly<Credential> | null {
    return this.snapshot;
  }

  get storeName(): string {
    return this.store.name();
  }

  /**
   * Loads the credential from the store. A token inside the expiry buffer is
   * refreshed first; if that fails the stale token is still returned.
   */
  async load(): Promise<Readonly<Credential>> {
    let credential: Credential;
    try {
      credential = await this.store.get();
    } catch (err) {
      const error = toError(err);
      structuredLog('error', 'Auth', `Failed to load credentials from ${this.store.name()}: ${error.message}`);
      throw error instanceof AuthError ? error : new AuthError('credentials not found', { cause: error });
    }

    let loaded = this.publish(credential);
    structuredLog('info', 'Auth', `Loaded credentials from ${this.store.name()}`);

    if (this.isExpiring(loaded)) {
      structuredLog('info', 'Auth', 'Access token is expired or about to expire, refreshing');
      try {
        loaded = await this.refresh();
      } catch (err) {
        structuredLog('warn', 'Auth', `Token refresh failed, continuing with the current token: ${toError(err).message}`);
      }
    }
    return loaded;
  }

  /** Refreshes through the store. Concurrent callers share one refresh. */
  refresh(): Promise<Readonly<Credential>> {
    this.inflightRefresh ??= this.store
      .refresh()
      .then((credential) => this.publish(credential))
      .finally(() => {
        this.inflightRefresh = null;
      });
    return this.inflightRefresh;
  }

  /** Replaces the stored credential, e.g. from the admin endpoint. */
  async replace(credential: Credential): Promise<Readonly<Credential>> {
    await this.store.save(credential);
    return this.publish(credential);
  }

  startBackgroundRefresh(intervalMs: number = DEFAULT_REFRESH_INTERVAL_MS): void {
    this.stopBackgroundRefresh();
    this.timer = setInterval(() => {
      void this.checkAndRefresh();
    }, intervalMs);
    this.timer.unref();
    structuredLog('info', 'Auth', `Background token refresh every ${String(Math.round(intervalMs / 1000))}s`);
  }

  stopBackgroundRefresh(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** One background tick: reload from the store and refresh when close to expiry. Never throws. */
  async checkAndRefresh(): Promise<void> {
    try {
      const stored = await this.store.get();
      const current = this.snapshot;
      // the store may lag behind a refreshed token that could not be persisted
      if (!current || (stored.accessToken !== current.accessToken && !this.isOlder(stored, current))) {
        this.publish(stored);
      }
      const latest = this.snapshot;
      if (latest && this.isExpiring(latest)) {
        await this.refresh();
      }
    } catch (err) {
      structuredLog('warn', 'Auth', `Background token refresh failed: ${toError(err).message}`);
    }
  }

  /**
   * Adds the bearer token unless the caller already set Authorization, in
   * which case the headers are returned untouched.
   */
  withAuth(headers: HeaderMap = {}): HeaderMap {
    if (hasAuthorization(headers)) return headers;
    const credential = this.snapshot;
    if (!credential) throw new AuthError('credentials not loaded');
    return { ...headers, Authorization: `Bearer ${credential.accessToken}` };
  }

  /**
   * Called after an upstream 401. Refreshes once and reports whether the
   * caller should resend the original request.
   */
  async handleUnauthorized(): Promise<boolean> {
    try {
      await this.refresh();
      return true;
    } catch (err) {
      structuredLog('warn', 'Auth', `Refresh after 401 failed: ${toError(err).message}`);
      return false;
    }
  }

  /**
   * Sends a request with auth attached. A 401 triggers one refresh and one
   * resend; if the refresh fails the original 401 response is returned.
   */
  async send(request: (headers: HeaderMap) => Promise<Response>, headers: HeaderMap = {}): Promise<Response> {
    if (!this.snapshot && !hasAuthorization(headers)) await this.load();

    const response = await request(this.withAuth(headers));
    if (response.status !== 401 || hasAuthorization(headers)) return response;

    structuredLog('info', 'Auth', 'Upstream returned 401, refreshing token and retrying once');
    if (!(await this.handleUnauthorized())) return response;

    await response.body?.cancel();
    return request(this.withAuth(headers));
  }

  status(): CredentialStatus {
    const credential = this.snapshot;
    return {
      hasCredentials: credential !== null,
      provider: this.store.name(),
      isExpired: credential ? isExpiring(credential, this.now(), 0) : true,
      expiryDate: credential?.expiryTimestampMillis ?? 0,
      hasRefreshToken: Boolean(credential?.refreshToken),
    };
  }

  private isExpiring(credential: Credential): boolean {
    return isExpiring(credential, this.now(), this.expiryBufferMs);
  }

  private isOlder(candidate: Credential, current: Credential): boolean {
    if (candidate.expiryTimestampMillis === 0 || current.expiryTimestampMillis === 0) return false;
    return candidate.expiryTimestampMillis < current.expiryTimestampMillis;
  }

  private publish(credential: Credential): Readonly<Credential> {
    const frozen = Object.freeze({ ...credential });
    this.snapshot = frozen;
    return frozen;
  }
}
