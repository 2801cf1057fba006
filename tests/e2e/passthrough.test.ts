import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import {
  type FetchHandler,
  type TestGateway,
  createTestGateway,
  jsonResponse,
  sseData,
  sseResponse,
} from '../helpers/fake-upstream.js';
import { startTestServer, stopTestServer, makeRequest } from '../helpers/http-helpers.js';
import { collectSSEEvents } from '../helpers/sse-helpers.js';

const CONTENTS = [{ role: 'user', parts: [{ text: 'hi' }] }];

describe('Gemini-style passthrough', () => {
  let handler: FetchHandler;
  let test: TestGateway;
  let port: number;

  beforeAll(async () => {
    test = createTestGateway({ handler: (call, index) => handler(call, index) });
    port = await startTestServer(test.gateway.server);
  });

  afterAll(async () => {
    await stopTestServer();
  });

  beforeEach(() => {
    test.upstream.calls.length = 0;
    handler = () =>
      jsonResponse({ traceId: 'trace-1', response: { candidates: [{ content: { parts: [{ text: 'ok' }] } }] } });
  });

  it('should wrap generateContent for the upstream and unwrap the answer', async () => {
    const res = await makeRequest({
      method: 'POST',
      path: '/v1beta/models/gemini-1.5-pro:generateContent',
      body: { contents: CONTENTS, systemInstruction: { parts: [{ text: 'be brief' }] } },
    });

    expect(res.status).toBe(200);
    expect(test.upstream.calls[0]!.url).toBe('https://upstream.test/v1internal:generateContent');
    expect(test.upstream.jsonBody(0)).toEqual({
      model: 'gemini-3-pro',
      project: 'test-project',
      request: { contents: CONTENTS, systemInstruction: { parts: [{ text: 'be brief' }], role: 'system' } },
    });
    expect(res.json()).toEqual({ traceId: 'trace-1', candidates: [{ content: { parts: [{ text: 'ok' }] } }] });
  });

  it('should accept the v1 path as well', async () => {
    const res = await makeRequest({
      method: 'POST',
      path: '/v1/models/gemini-2.5-flash:generateContent',
      body: { contents: CONTENTS },
    });
    expect(res.status).toBe(200);
    expect(test.upstream.jsonBody(0)).toMatchObject({ model: 'gemini-2.5-flash' });
  });

  it('should drop a zero thinking budget', async () => {
    await makeRequest({
      method: 'POST',
      path: '/v1beta/models/gemini-2.5-flash:generateContent',
      body: { contents: CONTENTS, generationConfig: { temperature: 0, thinkingConfig: { thinkingBudget: 0 } } },
    });
    expect(test.upstream.jsonBody(0)).toEqual({
      model: 'gemini-2.5-flash',
      project: 'test-project',
      request: { contents: CONTENTS, generationConfig: { temperature: 0 } },
    });
  });

  it('should stream unwrapped payloads one frame each', async () => {
    handler = () =>
      sseResponse(
        sseData(
          { response: { candidates: [{ content: { parts: [{ text: 'a' }] } }] } },
          { response: { candidates: [{ content: { parts: [{ text: 'b' }] } }] } }
        )
      );
    const events = await collectSSEEvents(port, {
      path: '/v1beta/models/gemini-2.5-pro:streamGenerateContent',
      body: { contents: CONTENTS },
    });

    expect(test.upstream.calls[0]!.url).toBe('https://upstream.test/v1internal:streamGenerateContent?alt=sse');
    expect(events.map((event) => event.data)).toEqual([
      '{"candidates":[{"content":{"parts":[{"text":"a"}]}}]}',
      '{"candidates":[{"content":{"parts":[{"text":"b"}]}}]}',
    ]);
  });

  it('should count tokens with the model inside the request', async () => {
    handler = () => jsonResponse({ totalTokens: 4 });
    const res = await makeRequest({
      method: 'POST',
      path: '/v1beta/models/gemini-2.5-pro:countTokens',
      body: { generateContentRequest: { contents: CONTENTS } },
    });

    expect(res.status).toBe(200);
    expect(res.json()).toEqual({ totalTokens: 4 });
    expect(test.upstream.calls[0]!.url).toBe('https://upstream.test/v1internal:countTokens');
    expect(test.upstream.jsonBody(0)).toEqual({
      request: { contents: CONTENTS, model: 'models/gemini-2.5-pro' },
    });
  });

  it('should reject unknown actions', async () => {
    const res = await makeRequest({
      method: 'POST',
      path: '/v1beta/models/gemini-2.5-pro:embedContent',
      body: { contents: CONTENTS },
    });
    expect(res.status).toBe(404);
    expect(res.json()).toEqual({
      error: {
        message: "Unknown action 'embedContent'",
        type: 'invalid_request_error',
        code: 'not_found',
        param: null,
      },
    });
    expect(test.upstream.calls).toHaveLength(0);
  });

  it('should reject a malformed model name with 400', async () => {
    const res = await makeRequest({
      method: 'POST',
      path: '/v1beta/models/%E0:generateContent',
      body: { contents: CONTENTS },
    });
    expect(res.status).toBe(400);
    expect(res.json()).toEqual({
      error: {
        message: "Invalid model name '%E0'",
        type: 'invalid_request_error',
        code: 'invalid_request',
        param: 'model',
      },
    });
    expect(test.upstream.calls).toHaveLength(0);
  });

  it('should relay upstream errors unchanged', async () => {
    handler = () => new Response('{"error":{"code":400}}', { status: 400, headers: { 'Content-Type': 'application/json' } });
    const res = await makeRequest({
      method: 'POST',
      path: '/v1beta/models/gemini-2.5-pro:generateContent',
      body: { contents: CONTENTS },
    });
    expect(res.status).toBe(400);
    expect(res.body).toBe('{"error":{"code":400}}');
  });
});
