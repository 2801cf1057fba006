import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { type TestGateway, createTestGateway, jsonResponse } from '../helpers/fake-upstream.js';
import { startTestServer, stopTestServer, makeRequest } from '../helpers/http-helpers.js';

describe('API Endpoints', () => {
  beforeAll(async () => {
    const test = createTestGateway({ handler: () => jsonResponse({}) });
    await startTestServer(test.gateway.server);
  });

  afterAll(async () => {
    await stopTestServer();
  });

  describe('GET /v1/models', () => {
    it('should return the model catalog', async () => {
      const res = await makeRequest({ path: '/v1/models' });
      expect(res.status).toBe(200);
      const body = res.json<{ object: string; data: Array<{ id: string }> }>();
      expect(body.object).toBe('list');
      expect(body.data.map((m) => m.id)).toEqual([
        'gemini-2.5-pro',
        'gemini-2.5-flash',
        'gemini-2.5-flash-lite',
        'gemini-3-pro-preview',
        'gemini-3-flash-preview',
      ]);
    });

    it('should return correct model shape', async () => {
      const res = await makeRequest({ path: '/v1/models' });
      const body = res.json<{ data: unknown[] }>();
      expect(body.data[0]).toEqual({
        id: 'gemini-2.5-pro',
        object: 'model',
        created: 1700000000,
        owned_by: 'google',
        display_name: 'Gemini 2.5 Pro',
        context_window: 1048576,
        max_output_tokens: 65536,
      });
    });
  });

  describe('GET /v1/models/:id', () => {
    it('should return specific model', async () => {
      const res = await makeRequest({ path: '/v1/models/gemini-2.5-flash' });
      expect(res.status).toBe(200);
      expect(res.json<{ id: string }>().id).toBe('gemini-2.5-flash');
    });

    it('should return 404 for unknown model', async () => {
      const res = await makeRequest({ path: '/v1/models/nonexistent-model' });
      expect(res.status).toBe(404);
      expect(res.json<{ error: { message: string; code: string } }>().error).toMatchObject({
        message: "Model 'nonexistent-model' not found",
        code: 'not_found',
      });
    });

    it('should return 404 for a malformed model id and keep serving', async () => {
      const res = await makeRequest({ path: '/v1/models/%E0' });
      expect(res.status).toBe(404);
      expect(res.json<{ error: { message: string; code: string } }>().error).toMatchObject({
        message: "Model '%E0' not found",
        code: 'not_found',
      });

      const next = await makeRequest({ path: '/v1/models/gemini-2.5-flash' });
      expect(next.status).toBe(200);
    });
  });

  describe('GET /health', () => {
    it('should report ok with credentials and a project', async () => {
      // loads credentials as a side effect of the first upstream call
      await makeRequest({
        method: 'POST',
        path: '/v1/chat/completions',
        body: { messages: [{ role: 'user', content: 'hi' }] },
      });
      const res = await makeRequest({ path: '/health' });
      expect(res.status).toBe(200);
      const body = res.json<{
        status: string;
        message: string;
        credentials: { hasCredentials: boolean; provider: string; hasProject: boolean };
        models: { default: string };
      }>();
      expect(body.status).toBe('ok');
      expect(body.message).toBe('Gateway is running');
      expect(body.credentials).toEqual({
        hasCredentials: true,
        provider: 'MemoryCredentialStore',
        isExpired: false,
        hasProject: true,
      });
      expect(body.models.default).toBe('gemini-2.5-pro');
    });

    it('should answer the simple probes', async () => {
      for (const path of ['/', '/healthz', '/ready']) {
        const res = await makeRequest({ path });
        expect(res.status).toBe(200);
        expect(res.json()).toEqual({ status: 'ok' });
      }
    });
  });

  describe('GET /version and /metrics', () => {
    it('should return version info', async () => {
      const res = await makeRequest({ path: '/version' });
      expect(res.status).toBe(200);
      const body = res.json<{ name: string; api: { openaiCompatible: boolean; defaultModel: string } }>();
      expect(body.name).toBe('code-assist-gateway');
      expect(body.api.openaiCompatible).toBe(true);
      expect(body.api.defaultModel).toBe('gemini-2.5-pro');
    });

    it('should return request metrics', async () => {
      const res = await makeRequest({ path: '/metrics' });
      expect(res.status).toBe(200);
      const body = res.json<{ totalRequests: number; activeRequests: number; requestsByModel: Record<string, number> }>();
      expect(body.totalRequests).toBeGreaterThanOrEqual(1);
      expect(body.activeRequests).toBe(0);
      expect(body.requestsByModel['gemini-2.5-pro']).toBeGreaterThanOrEqual(1);
    });
  });

  describe('Admin routes', () => {
    it('should not exist without an admin key', async () => {
      const res = await makeRequest({ path: '/admin/credentials/status' });
      expect(res.status).toBe(404);
    });
  });

  describe('CORS and routing', () => {
    it('should answer OPTIONS with 204 and CORS headers', async () => {
      const res = await makeRequest({ method: 'OPTIONS', path: '/v1/chat/completions' });
      expect(res.status).toBe(204);
      expect(res.headers['access-control-allow-origin']).toBe('*');
      expect(res.headers['access-control-allow-methods']).toBe('GET, POST, OPTIONS');
      expect(res.headers['access-control-allow-headers']).toBe('Content-Type, Authorization, X-API-Key');
    });

    it('should return 404 for unknown routes', async () => {
      const res = await makeRequest({ path: '/v2/unknown' });
      expect(res.status).toBe(404);
      expect(res.json()).toEqual({
        error: { message: 'Not found', type: 'invalid_request_error', code: 'not_found', param: null },
      });
    });

    it('should return 404 for GET on the chat route', async () => {
      const res = await makeRequest({ path: '/v1/chat/completions' });
      expect(res.status).toBe(404);
    });
  });
});

describe('Health without a project', () => {
  beforeAll(async () => {
    const test = createTestGateway({ handler: () => jsonResponse({}), tenantId: '' });
    await test.credentials.load();
    await startTestServer(test.gateway.server);
  });

  afterAll(async () => {
    await stopTestServer();
  });

  it('should report degraded', async () => {
    const res = await makeRequest({ path: '/health' });
    expect(res.status).toBe(200);
    expect(res.json()).toMatchObject({ status: 'degraded', message: 'No project discovered' });
  });
});

describe('Admin credential routes', () => {
  const ADMIN_KEY = 'test-admin-key';
  let test: TestGateway;

  beforeAll(async () => {
    test = createTestGateway({ handler: () => jsonResponse({}), config: { adminApiKey: ADMIN_KEY } });
    await startTestServer(test.gateway.server);
  });

  afterAll(async () => {
    await stopTestServer();
  });

  it('should reject a missing key', async () => {
    const res = await makeRequest({ path: '/admin/credentials/status' });
    expect(res.status).toBe(401);
    expect(res.json()).toEqual({
      error: {
        message: 'Invalid or missing admin API key',
        type: 'authentication_error',
        code: 'invalid_api_key',
        param: null,
      },
    });
  });

  it('should reject a wrong key', async () => {
    const res = await makeRequest({ path: '/admin/credentials/status', headers: { 'X-API-Key': 'wrong-key' } });
    expect(res.status).toBe(401);
  });

  it('should replace credentials with a valid key', async () => {
    const res = await makeRequest({
      method: 'POST',
      path: '/admin/credentials',
      headers: { Authorization: `Bearer ${ADMIN_KEY}` },
      body: {
        access_token: 'test-uploaded-token',
        refresh_token: 'test-refresh-token',
        token_type: 'Bearer',
        expiry_date: 4102444800000,
      },
    });
    expect(res.status).toBe(200);
    expect(res.json()).toEqual({ success: true, message: 'Credentials updated', provider: 'MemoryCredentialStore' });
    expect(test.credentials.current?.accessToken).toBe('test-uploaded-token');
    expect(test.store.saveCount).toBe(1);
  });

  it('should report credential status', async () => {
    const res = await makeRequest({ path: '/admin/credentials/status', headers: { 'X-API-Key': ADMIN_KEY } });
    expect(res.status).toBe(200);
    expect(res.json()).toEqual({
      type: 'oauth',
      hasCredentials: true,
      provider: 'MemoryCredentialStore',
      is_expired: false,
      expiry_date: 4102444800000,
      expiry_date_formatted: '2100-01-01T00:00:00.000Z',
      has_refresh_token: true,
    });
  });

  it('should reject an upload without an access token', async () => {
    const res = await makeRequest({
      method: 'POST',
      path: '/admin/credentials',
      headers: { Authorization: `Bearer ${ADMIN_KEY}` },
      body: { refresh_token: 'test-refresh-token' },
    });
    expect(res.status).toBe(400);
    expect(res.json()).toEqual({
      error: {
        message: 'credential record has no access_token',
        type: 'invalid_request_error',
        code: 'invalid_request',
        param: null,
      },
    });
  });
});

describe('Graceful shutdown', () => {
  it('should refuse new work and close the server', async () => {
    const test = createTestGateway({ handler: () => jsonResponse({}) });
    const { server } = test.gateway;
    await new Promise<void>((resolve) => server.listen(0, resolve));
    expect(server.listening).toBe(true);

    await test.gateway.shutdown('SIGTERM');
    expect(test.gateway.isShuttingDown).toBe(true);
    expect(server.listening).toBe(false);
  });
});
