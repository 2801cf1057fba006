import { describe, it, expect, vi } from 'vitest';
import { CredentialManager } from '../../src/auth-manager.js';
import { UpstreamProtocolError, UpstreamTransportError } from '../../src/errors.js';
import { CodeAssistClient, readLines } from '../../src/upstream.js';
import {
  type FetchHandler,
  MemoryCredentialStore,
  createFakeFetch,
  jsonResponse,
  sseResponse,
  testCredential,
} from '../helpers/fake-upstream.js';

function setup(handler: FetchHandler) {
  const store = new MemoryCredentialStore(testCredential());
  const credentials = new CredentialManager(store);
  const upstream = createFakeFetch(handler);
  const client = new CodeAssistClient({
    endpoint: 'https://upstream.test',
    apiVersion: 'v1internal',
    credentials,
    fetch: upstream.fetch,
  });
  return { client, upstream, store };
}

async function collect(lines: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const line of lines) out.push(line);
  return out;
}

const REQUEST = {
  model: 'gemini-2.5-flash',
  project: 'test-project',
  request: { contents: [{ role: 'user', parts: [{ text: 'hi' }] }] },
};

describe('CodeAssistClient', () => {
  it('should post generateContent with auth and JSON headers', async () => {
    const { client, upstream } = setup(() => jsonResponse({ response: { candidates: [] } }));
    const result = await client.generateContent(REQUEST);

    expect(result).toEqual({ response: { candidates: [] } });
    const call = upstream.calls[0]!;
    expect(call.url).toBe('https://upstream.test/v1internal:generateContent');
    expect(call.method).toBe('POST');
    expect(call.headers.get('authorization')).toBe('Bearer test-access-token');
    expect(call.headers.get('content-type')).toBe('application/json');
    expect(call.headers.get('user-agent')).toBe('code-assist-gateway/1.0.0');
    expect(upstream.jsonBody(0)).toEqual(REQUEST);
  });

  it('should open the SSE stream and split CRLF lines across chunks', async () => {
    const { client, upstream } = setup(() => sseResponse(['data: {"a"', ':1}\r\n\r\ndata: [DO', 'NE]\r\n']));
    const lines = await collect(await client.streamGenerateContent(REQUEST));

    expect(lines).toEqual(['data: {"a":1}', '', 'data: [DONE]']);
    expect(upstream.calls[0]!.url).toBe('https://upstream.test/v1internal:streamGenerateContent?alt=sse');
    expect(upstream.calls[0]!.headers.get('accept')).toBe('text/event-stream');
  });

  it('should yield nothing for a stream without a body', async () => {
    const { client } = setup(() => new Response(null, { status: 200 }));
    expect(await collect(await client.streamGenerateContent(REQUEST))).toEqual([]);
  });

  it('should refresh and resend the same body once after a 401', async () => {
    const { client, upstream, store } = setup((_call, index) =>
      index === 0 ? jsonResponse({ error: { code: 401 } }, 401) : jsonResponse({ ok: true })
    );
    const result = await client.generateContent(REQUEST);

    expect(result).toEqual({ ok: true });
    expect(store.refreshCount).toBe(1);
    expect(upstream.calls).toHaveLength(2);
    expect(upstream.calls[1]!.headers.get('authorization')).toBe('Bearer test-refreshed-token');
    expect(upstream.calls[1]!.body).toBe(upstream.calls[0]!.body);
  });

  it('should raise UpstreamProtocolError carrying the upstream answer', async () => {
    const { client } = setup(
      () => new Response('{"error":"slow down"}', { status: 429, headers: { 'Content-Type': 'application/json' } })
    );
    const error: unknown = await client.generateContent(REQUEST).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UpstreamProtocolError);
    expect(error).toMatchObject({
      statusCode: 429,
      body: '{"error":"slow down"}',
      contentType: 'application/json',
      message: 'upstream responded with status 429',
    });
  });

  it('should raise UpstreamProtocolError before streaming starts', async () => {
    const { client } = setup(() => new Response('overloaded', { status: 503, headers: { 'Content-Type': 'text/plain' } }));
    const error: unknown = await client.streamGenerateContent(REQUEST).catch((err: unknown) => err);
    expect(error).toMatchObject({ statusCode: 503, body: 'overloaded', contentType: 'text/plain' });
  });

  it('should wrap network failures as UpstreamTransportError', async () => {
    const { client } = setup(() => {
      throw new TypeError('fetch failed');
    });
    const error: unknown = await client.generateContent(REQUEST).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(UpstreamTransportError);
    expect(error).toHaveProperty('message', 'generateContent failed: fetch failed');
  });

  it('should let aborts through unchanged', async () => {
    const { client } = setup(() => jsonResponse({}));
    const controller = new AbortController();
    controller.abort();
    const error: unknown = await client.generateContent(REQUEST, { signal: controller.signal }).catch((err: unknown) => err);
    expect(error).not.toBeInstanceOf(UpstreamTransportError);
    expect(error).toHaveProperty('name', 'AbortError');
  });

  it('should reject answers that are not JSON objects', async () => {
    const { client } = setup(() => new Response('[1,2]'));
    await expect(client.generateContent(REQUEST)).rejects.toThrow(
      'generateContent returned a body that is not a JSON object'
    );
  });

  it('should put the model inside the countTokens request', async () => {
    const { client, upstream } = setup(() => jsonResponse({ totalTokens: 4 }));
    const result = await client.countTokens('gemini-2.5-pro', { contents: [{ role: 'user', parts: [{ text: 'hi' }] }] });

    expect(result).toEqual({ totalTokens: 4 });
    expect(upstream.calls[0]!.url).toBe('https://upstream.test/v1internal:countTokens');
    expect(upstream.jsonBody(0)).toEqual({
      request: { contents: [{ role: 'user', parts: [{ text: 'hi' }] }], model: 'models/gemini-2.5-pro' },
    });
  });

  it('should send client metadata to loadCodeAssist', async () => {
    const { client, upstream } = setup(() => jsonResponse({}));
    await client.loadCodeAssist();
    await client.loadCodeAssist('test-project');

    expect(upstream.jsonBody(0)).toEqual({
      metadata: { ideType: 'IDE_UNSPECIFIED', platform: 'PLATFORM_UNSPECIFIED', pluginType: 'GEMINI' },
    });
    expect(upstream.jsonBody(1)).toEqual({
      metadata: {
        ideType: 'IDE_UNSPECIFIED',
        platform: 'PLATFORM_UNSPECIFIED',
        pluginType: 'GEMINI',
        duetProject: 'test-project',
      },
      cloudaicompanionProject: 'test-project',
    });
  });
});

describe('readLines', () => {
  it('should emit a trailing line without a newline', async () => {
    const body = sseResponse(['a\nb']).body!;
    expect(await collect(readLines(body))).toEqual(['a', 'b']);
  });

  it('should cancel the body when the consumer stops early', async () => {
    const cancel = vi.fn();
    const body = new ReadableStream<Uint8Array>({
      pull(controller) {
        controller.enqueue(new TextEncoder().encode('data: 1\n'));
      },
      cancel,
    });
    for await (const line of readLines(body)) {
      expect(line).toBe('data: 1');
      break;
    }
    expect(cancel).toHaveBeenCalledTimes(1);
  });
});
