import type { OpenAIError, OpenAIErrorCode } from './types.js';

export class GatewayError extends Error {
  readonly statusCode: number;
  readonly code: OpenAIErrorCode;

  constructor(message: string, statusCode: number, code: OpenAIErrorCode, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
  }
}

/** No usable credentials, or the refresh path is exhausted. */
export class AuthError extends GatewayError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 401, 'invalid_api_key', options);
  }
}

/** The client request cannot be expressed in the upstream dialect. */
export class TranslationError extends GatewayError {
  readonly param: string | null;

  constructor(message: string, param: string | null = null) {
    super(message, 400, 'invalid_request');
    this.param = param;
  }
}

export class UpstreamTransportError extends GatewayError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 502, 'connection_error', options);
  }
}

/**
 * Non-2xx answer from the upstream. The status and body are relayed to the
 * client as they arrived.
 */
export class UpstreamProtocolError extends GatewayError {
  readonly body: string;
  readonly contentType: string;

  constructor(status: number, body: string, contentType = 'application/json') {
    super(`upstream responded with status ${String(status)}`, status, 'upstream_error');
    this.body = body;
    this.contentType = contentType;
  }
}

/** The per-request deadline passed before the upstream finished. */
export class RequestTimeoutError extends GatewayError {
  constructor(timeoutMs: number) {
    super(`request exceeded ${String(timeoutMs)}ms`, 504, 'request_timeout');
  }
}

/** Raised into in-flight requests that outlive the shutdown grace period. */
export class ShutdownError extends GatewayError {
  constructor() {
    super('Server is shutting down', 503, 'server_error');
  }
}

export class StreamWriteError extends GatewayError {
  constructor(message = 'client disconnected') {
    super(message, 499, 'client_disconnected');
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export function isAbortError(error: Error): boolean {
  return error.name === 'AbortError' || error.name === 'TimeoutError';
}

export function statusCodeFor(error: Error): number {
  if (error instanceof GatewayError) return error.statusCode;
  if (isAbortError(error)) return 504;
  return 500;
}

export function createOpenAIError(error: Error): OpenAIError {
  if (error instanceof AuthError) {
    return {
      error: {
        message: `Authentication failed: ${error.message}`,
        type: 'authentication_error',
        code: 'invalid_api_key',
        param: null,
        suggestion:
          'Sign in with the Gemini CLI to create oauth_creds.json, or upload credentials through POST /admin/credentials.',
      },
    };
  }

  if (error instanceof TranslationError) {
    return {
      error: {
        message: error.message,
        type: 'invalid_request_error',
        code: 'invalid_request',
        param: error.param,
      },
    };
  }

  if (error instanceof UpstreamTransportError) {
    return {
      error: {
        message: `Connection error: ${error.message}`,
        type: 'server_error',
        code: 'connection_error',
        param: null,
        suggestion: 'Check your network connection and ensure the upstream endpoint is reachable.',
      },
    };
  }

  if (error instanceof UpstreamProtocolError) {
    return {
      error: {
        message: `Upstream error (${String(error.statusCode)}): ${error.body}`,
        type: 'api_error',
        code: 'upstream_error',
        param: null,
      },
    };
  }

  if (error instanceof RequestTimeoutError || isAbortError(error)) {
    return {
      error: {
        message: `Request timeout: ${error.message}`,
        type: 'server_error',
        code: 'request_timeout',
        param: null,
        suggestion:
          'The request took too long to process. Try a shorter prompt or increase REQUEST_TIMEOUT_MS.',
      },
    };
  }

  if (error instanceof ShutdownError) {
    return {
      error: { message: error.message, type: 'server_error', code: 'server_error', param: null },
    };
  }

  return {
    error: {
      message: error.message,
      type: 'api_error',
      code: null,
      param: null,
      suggestion: 'Check the error message for details. If the issue persists, check server logs.',
    },
  };
}
