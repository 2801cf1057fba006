import http, { type IncomingMessage, type ServerResponse } from 'http';
import { randomUUID, timingSafeEqual } from 'crypto';
import type { CredentialManager } from './auth-manager.js';
import type { GatewayConfig } from './config.js';
import { type Credential, parseCredentialRecord } from './credentials.js';
import {
  type JsonObject,
  readUpstreamResponse,
  sanitizeUpstreamRequest,
  unwrapResponse,
  unwrapSsePayload,
} from './envelope.js';
import {
  RequestTimeoutError,
  ShutdownError,
  TranslationError,
  UpstreamProtocolError,
  createOpenAIError,
  isAbortError,
  statusCodeFor,
  toError,
} from './errors.js';
import { structuredLog } from './logger.js';
import { DEFAULT_MODEL, MODELS_CONFIG, ModelNormalizer, findModel, getModels } from './models.js';
import { type PipelineResult, responseSink, runStreamPipeline } from './pipeline.js';
import { ChatStreamRenderer, PassthroughRenderer, type StreamRenderer, classifyPayload } from './stream.js';
import { toClientNonStreaming, toUpstream } from './translate.js';
import type { CodeAssistClient } from './upstream.js';
import {
  formatUptime,
  isRecord,
  parseJsonBody,
  readChatCompletionRequest,
  validateChatCompletionRequest,
} from './utils.js';

export interface AppDependencies {
  config: GatewayConfig;
  credentials: CredentialManager;
  client: CodeAssistClient;
  /** Read per request: discovery may finish, or be retried, after the server starts. */
  getTenantId: () => string;
  normalizer?: ModelNormalizer;
  /** Runs after an admin upload replaced the credentials. */
  onCredentialsReplaced?: () => Promise<void>;
}

export interface RequestMetrics {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  activeRequests: number;
  totalLatencyMs: number;
  requestsByModel: Record<string, number>;
  errorsByType: Record<string, number>;
}

export interface Gateway {
  server: http.Server;
  metrics: RequestMetrics;
  readonly isShuttingDown: boolean;
  /** Stops accepting connections, waits for in-flight requests, then aborts the rest. */
  shutdown(signal: string): Promise<void>;
}

interface RequestContext {
  requestId: string;
  /** Aborts upstream calls: timeout, shutdown or a vanished client. */
  signal: AbortSignal;
  /** Aborts only when the client connection is gone. */
  disconnectSignal: AbortSignal;
  abort: () => void;
  finish: (success: boolean, errorType?: string) => void;
}

const CANCEL_DRAIN_MS = 1000;
const PASSTHROUGH_PATH = /^\/v1(?:beta)?\/models\/([^/:]+):([A-Za-z]+)$/;
const PASSTHROUGH_ACTIONS = new Set(['generateContent', 'streamGenerateContent', 'countTokens']);

function sendJson(res: ServerResponse, status: number, body: unknown, pretty = false): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(pretty ? JSON.stringify(body, null, 2) : JSON.stringify(body));
}

function sendNotFound(res: ServerResponse, message = 'Not found'): void {
  sendJson(res, 404, {
    error: { message, type: 'invalid_request_error', code: 'not_found', param: null },
  });
}

/** Upstream status errors are relayed as they arrived; everything else gets the error envelope. */
function sendError(res: ServerResponse, error: Error): void {
  if (res.headersSent) {
    res.end();
    return;
  }
  if (error instanceof UpstreamProtocolError) {
    res.writeHead(error.statusCode, { 'Content-Type': error.contentType });
    res.end(error.body);
    return;
  }
  sendJson(res, statusCodeFor(error), createOpenAIError(error));
}

function errorFrames(error: Error): string[] {
  return [`data: ${JSON.stringify(createOpenAIError(error))}\n\n`];
}

function writeStreamHeaders(res: ServerResponse, requestId: string): void {
  // Disable response buffering for real-time streaming
  res.writeHead(200, {
    'Content-Type': 'text/event-stream',
    'Cache-Control': 'no-cache, no-transform',
    Connection: 'keep-alive',
    'X-Accel-Buffering': 'no', // Disable nginx buffering
    'X-Request-Id': requestId,
  });
  res.flushHeaders();
}

function setCorsHeaders(res: ServerResponse): void {
  res.setHeader('Access-Control-Allow-Origin', '*');
  res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization, X-API-Key');
}

function headerValue(req: IncomingMessage, name: string): string | undefined {
  const value = req.headers[name];
  return typeof value === 'string' ? value : undefined;
}

function keysMatch(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

function decodePathSegment(segment: string): string | undefined {
  try {
    return decodeURIComponent(segment);
  } catch (err) {
    if (err instanceof URIError) return undefined;
    throw err;
  }
}

function errorTypeOf(error: Error): string {
  if (isAbortError(error)) return 'aborted';
  return error.name;
}

async function readJsonObject(req: IncomingMessage): Promise<JsonObject> {
  let body: unknown;
  try {
    body = await parseJsonBody(req);
  } catch (err) {
    throw new TranslationError(toError(err).message);
  }
  if (!isRecord(body)) throw new TranslationError('Request body must be a JSON object');
  return body;
}

/** A malformed upload is the caller's mistake, not an authentication failure. */
function readUploadedCredential(body: JsonObject): Credential {
  try {
    return parseCredentialRecord(body);
  } catch (err) {
    throw new TranslationError(toError(err).message);
  }
}

export function createGateway(deps: AppDependencies): Gateway {
  const { config, credentials, client } = deps;
  const normalizer = deps.normalizer ?? ModelNormalizer.fromConfig();
  const startedAt = Date.now();
  const activeRequests = new Map<string, AbortController>();
  let shuttingDown = false;

  const metrics: RequestMetrics = {
    totalRequests: 0,
    successfulRequests: 0,
    failedRequests: 0,
    activeRequests: 0,
    totalLatencyMs: 0,
    requestsByModel: {},
    errorsByType: {},
  };

  function beginRequest(req: IncomingMessage, res: ServerResponse): RequestContext {
    // Propagate X-Request-ID header from client or generate one
    const clientRequestId = headerValue(req, 'x-request-id');
    const requestId =
      clientRequestId && clientRequestId.length > 0
        ? clientRequestId.slice(0, 36)
        : randomUUID().slice(0, 8);
    const startTime = Date.now();
    res.setHeader('X-Request-ID', requestId);

    metrics.totalRequests++;
    metrics.activeRequests++;

    // ids from clients may repeat; the map only serves shutdown cancellation
    const trackingKey = activeRequests.has(requestId) ? `${requestId}-${randomUUID().slice(0, 8)}` : requestId;
    // timeout and shutdown abort only the upstream side so open streams still get their closing frames
    const controller = new AbortController();
    const disconnected = new AbortController();
    activeRequests.set(trackingKey, controller);

    const timeoutId = setTimeout(() => {
      structuredLog('warn', 'Request', 'Request timeout', { requestId, durationMs: config.requestTimeoutMs });
      controller.abort(new RequestTimeoutError(config.requestTimeoutMs));
    }, config.requestTimeoutMs);

    res.on('close', () => {
      if (!res.writableEnded) {
        structuredLog('info', 'Request', 'Client disconnected', { requestId });
        disconnected.abort();
        controller.abort();
      }
    });

    let finished = false;
    return {
      requestId,
      signal: controller.signal,
      disconnectSignal: disconnected.signal,
      abort: () => controller.abort(),
      finish: (success, errorType) => {
        if (finished) return;
        finished = true;
        clearTimeout(timeoutId);
        activeRequests.delete(trackingKey);
        metrics.activeRequests--;

        const durationMs = Date.now() - startTime;
        metrics.totalLatencyMs += durationMs;
        if (success) {
          metrics.successfulRequests++;
        } else {
          metrics.failedRequests++;
          if (errorType) metrics.errorsByType[errorType] = (metrics.errorsByType[errorType] ?? 0) + 1;
        }
      },
    };
  }

  function countModel(model: string): void {
    metrics.requestsByModel[model] = (metrics.requestsByModel[model] ?? 0) + 1;
  }

  function rejectWhileShuttingDown(res: ServerResponse, ctx: RequestContext): boolean {
    if (!shuttingDown) return false;
    ctx.finish(false, 'server_shutdown');
    sendJson(res, 503, {
      error: { message: 'Server is shutting down', type: 'server_error', code: 'server_error', param: null },
    });
    return true;
  }

  async function streamThrough<E>(
    res: ServerResponse,
    ctx: RequestContext,
    source: AsyncIterable<string>,
    classify: (payload: string) => E[],
    renderer: StreamRenderer<E>
  ): Promise<PipelineResult> {
    writeStreamHeaders(res, ctx.requestId);
    const result = await runStreamPipeline<E>({
      source,
      classify,
      renderer,
      sink: responseSink(res),
      queueDepth: config.queueDepth,
      keepaliveIntervalMs: config.keepaliveIntervalMs,
      signal: ctx.disconnectSignal,
      requestId: ctx.requestId,
      debugSse: config.debugSse,
      errorFrames,
      onCancel: ctx.abort,
    });
    res.end();
    return result;
  }

  function finishStream(ctx: RequestContext, result: PipelineResult, startTime: number): void {
    if (result.cancelled) {
      ctx.finish(false, 'client_disconnected');
    } else if (result.upstreamError) {
      structuredLog('error', 'Request', 'Streaming error', {
        requestId: ctx.requestId,
        data: result.upstreamError.message,
      });
      ctx.finish(false, errorTypeOf(result.upstreamError));
    } else {
      ctx.finish(true);
      structuredLog('info', 'Request', 'Stream completed', {
        requestId: ctx.requestId,
        durationMs: Date.now() - startTime,
      });
    }
  }

  async function handleChatCompletions(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const ctx = beginRequest(req, res);
    const { requestId } = ctx;
    const startTime = Date.now();

    try {
      if (rejectWhileShuttingDown(res, ctx)) return;

      const body = await readJsonObject(req);
      structuredLog('debug', 'Request', 'Received request', { requestId, data: body });

      const validation = validateChatCompletionRequest(body);
      if (!validation.valid) {
        ctx.finish(false, 'validation_error');
        sendJson(res, 400, { error: validation.error });
        return;
      }

      const request = readChatCompletionRequest(body);
      const upstreamRequest = toUpstream(request, deps.getTenantId(), normalizer);
      const model = upstreamRequest.model;
      countModel(model);

      structuredLog('info', 'Request', 'Processing request', {
        requestId,
        data: { model, requested: request.model ?? DEFAULT_MODEL, stream: request.stream ?? false },
      });

      if (request.stream) {
        const lines = await client.streamGenerateContent(upstreamRequest, { signal: ctx.signal, requestId });
        const result = await streamThrough(res, ctx, lines, classifyPayload, new ChatStreamRenderer(model));
        finishStream(ctx, result, startTime);
        return;
      }

      const raw = await client.generateContent(upstreamRequest, { signal: ctx.signal, requestId });
      sendJson(res, 200, toClientNonStreaming(readUpstreamResponse(raw), model));
      ctx.finish(true);
      structuredLog('info', 'Request', 'Request completed', { requestId, durationMs: Date.now() - startTime });
    } catch (err) {
      const error = toError(err);
      structuredLog('error', 'Request', 'Request error', { requestId, data: error.message });
      ctx.finish(false, errorTypeOf(error));
      sendError(res, error);
    }
  }

  async function handlePassthrough(
    req: IncomingMessage,
    res: ServerResponse,
    rawModel: string,
    action: string
  ): Promise<void> {
    const ctx = beginRequest(req, res);
    const { requestId } = ctx;
    const startTime = Date.now();

    try {
      if (rejectWhileShuttingDown(res, ctx)) return;

      const body = await readJsonObject(req);
      const decoded = decodePathSegment(rawModel);
      if (decoded === undefined) throw new TranslationError(`Invalid model name '${rawModel}'`, 'model');
      const model = normalizer.normalize(decoded);
      countModel(model);
      structuredLog('info', 'Request', `Forwarding ${action}`, { requestId, data: { model } });

      if (action === 'countTokens') {
        const nested = body['generateContentRequest'];
        const inner = isRecord(nested) ? nested : body;
        sendJson(res, 200, await client.countTokens(model, inner, { signal: ctx.signal, requestId }));
        ctx.finish(true);
        return;
      }

      const upstreamRequest = {
        model,
        project: deps.getTenantId(),
        request: sanitizeUpstreamRequest(body),
      };

      if (action === 'streamGenerateContent') {
        const lines = await client.streamGenerateContent(upstreamRequest, { signal: ctx.signal, requestId });
        const result = await streamThrough(
          res,
          ctx,
          lines,
          (payload) => [unwrapSsePayload(payload)],
          new PassthroughRenderer()
        );
        finishStream(ctx, result, startTime);
        return;
      }

      const raw = await client.generateContent(upstreamRequest, { signal: ctx.signal, requestId });
      sendJson(res, 200, unwrapResponse(raw));
      ctx.finish(true);
      structuredLog('info', 'Request', 'Request completed', { requestId, durationMs: Date.now() - startTime });
    } catch (err) {
      const error = toError(err);
      structuredLog('error', 'Request', 'Passthrough error', { requestId, data: error.message });
      ctx.finish(false, errorTypeOf(error));
      sendError(res, error);
    }
  }

  function handleModels(res: ServerResponse): void {
    sendJson(res, 200, { object: 'list', data: getModels() });
  }

  function handleModel(res: ServerResponse, modelId: string): void {
    const model = findModel(modelId);
    if (model) {
      sendJson(res, 200, model);
    } else {
      sendNotFound(res, `Model '${modelId}' not found`);
    }
  }

  function handleHealth(res: ServerResponse): void {
    const uptimeSeconds = (Date.now() - startedAt) / 1000;
    const memoryUsage = process.memoryUsage();
    const avgLatency = metrics.totalRequests > 0 ? metrics.totalLatencyMs / metrics.totalRequests : 0;
    const successRate =
      metrics.totalRequests > 0
        ? ((metrics.successfulRequests / metrics.totalRequests) * 100).toFixed(2)
        : '100.00';
    const auth = credentials.status();
    const tenantId = deps.getTenantId();

    let status: 'ok' | 'degraded' | 'unhealthy' = 'ok';
    let message = 'Gateway is running';
    if (shuttingDown) {
      status = 'unhealthy';
      message = 'Server is shutting down';
    } else if (!auth.hasCredentials) {
      status = 'degraded';
      message = 'No credentials loaded';
    } else if (!tenantId) {
      status = 'degraded';
      message = 'No project discovered';
    } else if (parseFloat(successRate) < 90 && metrics.totalRequests > 10) {
      status = 'degraded';
      message = 'High error rate detected';
    }

    const health = {
      status,
      message,
      timestamp: new Date().toISOString(),
      uptime: {
        seconds: Math.floor(uptimeSeconds),
        formatted: formatUptime(uptimeSeconds),
      },
      metrics: {
        totalRequests: metrics.totalRequests,
        successfulRequests: metrics.successfulRequests,
        failedRequests: metrics.failedRequests,
        activeRequests: metrics.activeRequests,
        averageLatencyMs: Math.round(avgLatency),
        successRate: `${successRate}%`,
      },
      credentials: {
        hasCredentials: auth.hasCredentials,
        provider: auth.provider,
        isExpired: auth.isExpired,
        hasProject: tenantId !== '',
      },
      models: {
        available: getModels().map((m) => m.id),
        default: DEFAULT_MODEL,
      },
      memory: {
        heapUsedMB: Math.round(memoryUsage.heapUsed / 1024 / 1024),
        heapTotalMB: Math.round(memoryUsage.heapTotal / 1024 / 1024),
        rssMB: Math.round(memoryUsage.rss / 1024 / 1024),
      },
      config: {
        requestTimeoutMs: config.requestTimeoutMs,
        shutdownTimeoutMs: config.shutdownTimeoutMs,
        queueDepth: config.queueDepth,
      },
    };

    sendJson(res, status === 'unhealthy' ? 503 : 200, health, true);
  }

  // Simple health check for load balancers
  function handleHealthSimple(res: ServerResponse): void {
    if (shuttingDown) {
      sendJson(res, 503, { status: 'shutting_down' });
    } else {
      sendJson(res, 200, { status: 'ok' });
    }
  }

  function handleVersion(res: ServerResponse): void {
    sendJson(
      res,
      200,
      {
        name: 'code-assist-gateway',
        version: MODELS_CONFIG.version,
        description: 'OpenAI-compatible gateway for the Code Assist API',
        runtime: {
          node: process.version,
          platform: process.platform,
          arch: process.arch,
        },
        api: {
          openaiCompatible: true,
          version: 'v1',
          defaultModel: DEFAULT_MODEL,
          availableModels: getModels().map((m) => m.id),
        },
        config: {
          port: config.port,
          requestTimeoutMs: config.requestTimeoutMs,
          shutdownTimeoutMs: config.shutdownTimeoutMs,
          queueDepth: config.queueDepth,
          debug: config.debug,
        },
        startedAt: new Date(startedAt).toISOString(),
      },
      true
    );
  }

  function handleMetrics(res: ServerResponse): void {
    sendJson(
      res,
      200,
      {
        timestamp: new Date().toISOString(),
        ...metrics,
        averageLatencyMs:
          metrics.totalRequests > 0 ? Math.round(metrics.totalLatencyMs / metrics.totalRequests) : 0,
      },
      true
    );
  }

  /** Admin routes exist only when a key is configured; otherwise they answer 404. */
  function authorizeAdmin(req: IncomingMessage, res: ServerResponse): boolean {
    const adminKey = config.adminApiKey;
    if (!adminKey) {
      sendNotFound(res);
      return false;
    }
    const authorization = headerValue(req, 'authorization');
    const bearer = authorization?.startsWith('Bearer ') ? authorization.slice(7).trim() : undefined;
    const given = bearer ?? headerValue(req, 'x-api-key');
    if (given !== undefined && keysMatch(given, adminKey)) return true;

    sendJson(res, 401, {
      error: {
        message: 'Invalid or missing admin API key',
        type: 'authentication_error',
        code: 'invalid_api_key',
        param: null,
      },
    });
    return false;
  }

  async function handleCredentialUpload(req: IncomingMessage, res: ServerResponse): Promise<void> {
    try {
      const body = await readJsonObject(req);
      await credentials.replace(readUploadedCredential(body));
      structuredLog('info', 'Admin', `Credentials replaced via ${credentials.storeName}`);
      if (deps.onCredentialsReplaced) await deps.onCredentialsReplaced();
      sendJson(res, 200, { success: true, message: 'Credentials updated', provider: credentials.storeName });
    } catch (err) {
      const error = toError(err);
      structuredLog('error', 'Admin', 'Credential upload failed', { data: error.message });
      sendError(res, error);
    }
  }

  function handleCredentialStatus(res: ServerResponse): void {
    const status = credentials.status();
    sendJson(res, 200, {
      type: 'oauth',
      hasCredentials: status.hasCredentials,
      provider: status.provider,
      is_expired: status.isExpired,
      expiry_date: status.expiryDate,
      expiry_date_formatted: status.expiryDate > 0 ? new Date(status.expiryDate).toISOString() : null,
      has_refresh_token: status.hasRefreshToken,
    });
  }

  const server = http.createServer((req, res) => {
    setCorsHeaders(res);

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
    const urlPath = url.pathname;
    const passthrough = PASSTHROUGH_PATH.exec(urlPath);

    structuredLog('info', 'HTTP', `${req.method ?? 'UNKNOWN'} ${urlPath}`);

    if (urlPath === '/v1/chat/completions' && req.method === 'POST') {
      void handleChatCompletions(req, res);
    } else if (passthrough && req.method === 'POST') {
      const [, model = '', action = ''] = passthrough;
      if (PASSTHROUGH_ACTIONS.has(action)) {
        void handlePassthrough(req, res, model, action);
      } else {
        sendNotFound(res, `Unknown action '${action}'`);
      }
    } else if (urlPath === '/v1/models' && req.method === 'GET') {
      handleModels(res);
    } else if (urlPath.startsWith('/v1/models/') && req.method === 'GET') {
      const rawId = urlPath.slice('/v1/models/'.length);
      const modelId = decodePathSegment(rawId);
      if (modelId === undefined) {
        sendNotFound(res, `Model '${rawId}' not found`);
      } else {
        handleModel(res, modelId);
      }
    } else if (urlPath === '/health') {
      handleHealth(res);
    } else if (urlPath === '/' || urlPath === '/healthz' || urlPath === '/ready') {
      handleHealthSimple(res);
    } else if (urlPath === '/version') {
      handleVersion(res);
    } else if (urlPath === '/metrics') {
      handleMetrics(res);
    } else if (urlPath === '/admin/credentials' && req.method === 'POST') {
      if (authorizeAdmin(req, res)) void handleCredentialUpload(req, res);
    } else if (urlPath === '/admin/credentials/status' && req.method === 'GET') {
      if (authorizeAdmin(req, res)) handleCredentialStatus(res);
    } else {
      sendNotFound(res);
    }
  });

  // Keep connections alive for 60 seconds (default is 5 seconds in Node.js)
  server.keepAliveTimeout = 60000;
  // Ensure headers timeout is greater than keep-alive timeout
  server.headersTimeout = 65000;

  // cancelled streams still write their error and closing frames before sockets are torn down
  async function drainCancelled(): Promise<void> {
    const drainStart = Date.now();
    while (metrics.activeRequests > 0 && Date.now() - drainStart < CANCEL_DRAIN_MS) {
      await new Promise((resolve) => setTimeout(resolve, 10));
    }
  }

  async function shutdown(signal: string): Promise<void> {
    if (shuttingDown) {
      structuredLog('warn', 'Shutdown', 'Shutdown already in progress, ignoring signal', { data: signal });
      return;
    }
    shuttingDown = true;
    structuredLog('info', 'Shutdown', `Received ${signal}, starting graceful shutdown...`);

    const closed = new Promise<void>((resolve) => {
      server.close(() => {
        structuredLog('info', 'Shutdown', 'Server closed, no longer accepting new connections');
        resolve();
      });
    });
    server.closeIdleConnections();
    credentials.stopBackgroundRefresh();

    const shutdownStart = Date.now();
    const checkInterval = 100;
    while (metrics.activeRequests > 0) {
      if (Date.now() - shutdownStart >= config.shutdownTimeoutMs) {
        structuredLog(
          'warn',
          'Shutdown',
          `Timeout reached with ${String(metrics.activeRequests)} active requests, forcing shutdown`
        );
        for (const [requestId, controller] of activeRequests) {
          structuredLog('info', 'Shutdown', `Cancelling request ${requestId}`);
          controller.abort(new ShutdownError());
        }
        await drainCancelled();
        break;
      }
      structuredLog(
        'info',
        'Shutdown',
        `Waiting for ${String(metrics.activeRequests)} active requests to complete...`
      );
      await new Promise((resolve) => setTimeout(resolve, checkInterval));
    }

    server.closeAllConnections();
    await closed;
    structuredLog('info', 'Shutdown', 'Graceful shutdown complete');
  }

  return {
    server,
    metrics,
    get isShuttingDown() {
      return shuttingDown;
    },
    shutdown,
  };
}

export function createApp(deps: AppDependencies): http.Server {
  return createGateway(deps).server;
}
