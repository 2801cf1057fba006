import type { CredentialManager } from './auth-manager.js';
import type { FetchLike } from './credentials.js';
import { type JsonObject, parseJsonObject } from './envelope.js';
import {
  GatewayError,
  UpstreamProtocolError,
  UpstreamTransportError,
  isAbortError,
  toError,
} from './errors.js';
import { structuredLog } from './logger.js';
import type { UpstreamRequest } from './types.js';

export interface CodeAssistClientOptions {
  endpoint: string;
  apiVersion: string;
  credentials: CredentialManager;
  fetch?: FetchLike;
  userAgent?: string;
}

export interface CallOptions {
  stream?: boolean;
  signal?: AbortSignal;
  requestId?: string;
}

export const CLIENT_METADATA = {
  ideType: 'IDE_UNSPECIFIED',
  platform: 'PLATFORM_UNSPECIFIED',
  pluginType: 'GEMINI',
} as const;

/** Splits a response body into lines, dropping the trailing carriage return of CRLF input. */
export async function* readLines(body: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffered = '';
  let finished = false;
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        finished = true;
        break;
      }
      buffered += decoder.decode(value, { stream: true });
      let newline = buffered.indexOf('\n');
      while (newline !== -1) {
        yield buffered.slice(0, newline).replace(/\r$/, '');
        buffered = buffered.slice(newline + 1);
        newline = buffered.indexOf('\n');
      }
    }
    buffered += decoder.decode();
    if (buffered !== '') yield buffered.replace(/\r$/, '');
  } finally {
    // consumer stopped early: abandon the upstream body
    if (!finished) {
      await reader.cancel().catch((err: unknown) => {
        structuredLog('debug', 'Upstream', `body cancel failed: ${toError(err).message}`);
      });
    }
    reader.releaseLock();
  }
}

async function* noLines(): AsyncGenerator<string> {
  // empty body
}

/**
 * Client for the internal Code Assist API. Every call goes through the
 * credential manager, which handles the single refresh-and-resend on 401.
 */
export class CodeAssistClient {
  private readonly fetchImpl: FetchLike;
  private readonly userAgent: string;

  constructor(private readonly options: CodeAssistClientOptions) {
    this.fetchImpl = options.fetch ?? fetch;
    this.userAgent = options.userAgent ?? 'code-assist-gateway/1.0.0';
  }

  methodUrl(method: string, stream = false): string {
    const base = `${this.options.endpoint}/${this.options.apiVersion}:${method}`;
    return stream ? `${base}?alt=sse` : base;
  }

  /** Posts a JSON body and returns the raw response, whatever its status. */
  async post(method: string, body: unknown, options: CallOptions = {}): Promise<Response> {
    // serialized once so a resend after 401 carries identical bytes
    const payload = JSON.stringify(body);
    const url = this.methodUrl(method, options.stream);
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'User-Agent': this.userAgent,
      ...(options.stream ? { Accept: 'text/event-stream' } : {}),
    };
    const started = Date.now();

    try {
      const response = await this.options.credentials.send(
        (authed) =>
          this.fetchImpl(url, {
            method: 'POST',
            headers: authed,
            body: payload,
            ...(options.signal ? { signal: options.signal } : {}),
          }),
        headers
      );
      structuredLog('debug', 'Upstream', `${method} -> ${String(response.status)}`, {
        requestId: options.requestId,
        durationMs: Date.now() - started,
      });
      return response;
    } catch (err) {
      const error = toError(err);
      if (error instanceof GatewayError || isAbortError(error)) throw error;
      throw new UpstreamTransportError(`${method} failed: ${error.message}`, { cause: error });
    }
  }

  /** Posts and parses a JSON object answer. Non-2xx statuses become UpstreamProtocolError. */
  async postJson(method: string, body: unknown, options: CallOptions = {}): Promise<JsonObject> {
    const response = await this.post(method, body, options);
    const text = await response.text();
    if (!response.ok) {
      throw new UpstreamProtocolError(
        response.status,
        text,
        response.headers.get('content-type') ?? 'application/json'
      );
    }
    const parsed = parseJsonObject(text);
    if (!parsed) throw new UpstreamTransportError(`${method} returned a body that is not a JSON object`);
    return parsed;
  }

  generateContent(request: UpstreamRequest | JsonObject, options: CallOptions = {}): Promise<JsonObject> {
    return this.postJson('generateContent', request, options);
  }

  /** Opens the SSE stream and yields its raw lines. */
  async streamGenerateContent(
    request: UpstreamRequest | JsonObject,
    options: CallOptions = {}
  ): Promise<AsyncIterable<string>> {
    const response = await this.post('streamGenerateContent', request, { ...options, stream: true });
    if (!response.ok) {
      throw new UpstreamProtocolError(
        response.status,
        await response.text(),
        response.headers.get('content-type') ?? 'application/json'
      );
    }
    if (!response.body) return noLines();
    return readLines(response.body);
  }

  /** Token counting takes no project; the model goes inside the inner request. */
  countTokens(model: string, inner: JsonObject, options: CallOptions = {}): Promise<JsonObject> {
    return this.postJson('countTokens', { request: { ...inner, model: `models/${model}` } }, options);
  }

  loadCodeAssist(projectId?: string): Promise<JsonObject> {
    const body: JsonObject = {
      metadata: projectId ? { ...CLIENT_METADATA, duetProject: projectId } : { ...CLIENT_METADATA },
    };
    if (projectId) body['cloudaicompanionProject'] = projectId;
    return this.postJson('loadCodeAssist', body);
  }

  onboardUser(request: JsonObject): Promise<JsonObject> {
    return this.postJson('onboardUser', request);
  }
}
