import { describe, it, expect } from 'vitest';
import {
  parseJsonObject,
  parseSseLine,
  readUpstreamResponse,
  sanitizeUpstreamRequest,
  unwrapResponse,
  unwrapSsePayload,
} from '../../src/envelope.js';

describe('unwrapResponse', () => {
  it('should lay nested response fields over top-level fields', () => {
    const payload = { traceId: 't-1', candidates: 'outer', response: { candidates: ['inner'], modelVersion: 'v' } };
    expect(unwrapResponse(payload)).toEqual({ traceId: 't-1', candidates: ['inner'], modelVersion: 'v' });
  });

  it('should return flat payloads unchanged', () => {
    const payload = { candidates: [] };
    expect(unwrapResponse(payload)).toBe(payload);
  });

  it('should be idempotent', () => {
    const once = unwrapResponse({ a: 1, response: { b: 2 } });
    expect(unwrapResponse(once)).toEqual(once);
  });

  it('should leave a non-object response field alone', () => {
    const payload = { response: 'text' };
    expect(unwrapResponse(payload)).toEqual({ response: 'text' });
  });
});

describe('readUpstreamResponse', () => {
  it('should read candidates from content.parts', () => {
    const response = readUpstreamResponse({
      response: {
        candidates: [{ content: { role: 'model', parts: [{ text: 'hi' }] }, finishReason: 'STOP' }],
        usageMetadata: { promptTokenCount: 3, candidatesTokenCount: 5, totalTokenCount: 8 },
      },
    });
    expect(response).toEqual({
      candidates: [{ parts: [{ text: 'hi' }], finishReason: 'STOP' }],
      usageMetadata: { promptTokenCount: 3, candidatesTokenCount: 5, totalTokenCount: 8 },
    });
  });

  it('should accept parts directly on the candidate', () => {
    const response = readUpstreamResponse({ candidates: [{ parts: [{ text: 'a' }, 'junk'] }] });
    expect(response.candidates[0]?.parts).toEqual([{ text: 'a' }]);
  });

  it('should keep grounding metadata', () => {
    const response = readUpstreamResponse({ candidates: [{ parts: [], groundingMetadata: { webSearchQueries: ['q'] } }] });
    expect(response.candidates[0]?.groundingMetadata).toEqual({ webSearchQueries: ['q'] });
  });

  it('should tolerate missing candidates', () => {
    expect(readUpstreamResponse({})).toEqual({ candidates: [] });
  });
});

describe('parseSseLine', () => {
  it('should extract data payloads', () => {
    expect(parseSseLine('data: {"a":1}')).toEqual({ kind: 'data', payload: '{"a":1}' });
    expect(parseSseLine('data:{"a":1}')).toEqual({ kind: 'data', payload: '{"a":1}' });
  });

  it('should recognise termination markers', () => {
    expect(parseSseLine('data: [DONE]')).toEqual({ kind: 'done' });
    expect(parseSseLine('data: "[DONE]"')).toEqual({ kind: 'done' });
    expect(parseSseLine('data: ')).toEqual({ kind: 'done' });
  });

  it('should ignore blank lines, comments and other fields', () => {
    expect(parseSseLine('')).toEqual({ kind: 'ignore' });
    expect(parseSseLine(': ping')).toEqual({ kind: 'ignore' });
    expect(parseSseLine('event: message')).toEqual({ kind: 'ignore' });
  });
});

describe('parseJsonObject', () => {
  it('should return objects only', () => {
    expect(parseJsonObject('{"a":1}')).toEqual({ a: 1 });
    expect(parseJsonObject('[1]')).toBeUndefined();
    expect(parseJsonObject('nope')).toBeUndefined();
  });
});

describe('unwrapSsePayload', () => {
  it('should unwrap JSON payloads', () => {
    expect(unwrapSsePayload('{"traceId":"t","response":{"candidates":[]}}')).toBe('{"traceId":"t","candidates":[]}');
  });

  it('should forward other payloads untouched', () => {
    expect(unwrapSsePayload('not json')).toBe('not json');
  });
});

describe('sanitizeUpstreamRequest', () => {
  it('should force the system instruction role', () => {
    const body = { systemInstruction: { role: 'user', parts: [{ text: 'be brief' }] } };
    expect(sanitizeUpstreamRequest(body)).toEqual({
      systemInstruction: { role: 'system', parts: [{ text: 'be brief' }] },
    });
    expect(body.systemInstruction.role).toBe('user');
  });

  it('should drop a zero thinking budget but keep thinking when thoughts are requested', () => {
    const result = sanitizeUpstreamRequest({
      generationConfig: { temperature: 1, thinkingConfig: { thinkingBudget: 0, includeThoughts: true } },
    });
    expect(result).toEqual({ generationConfig: { temperature: 1, thinkingConfig: { includeThoughts: true } } });
  });

  it('should keep thinking when a level is set', () => {
    const result = sanitizeUpstreamRequest({
      generationConfig: { thinkingConfig: { thinkingBudget: 0, thinkingLevel: 'low' } },
    });
    expect(result).toEqual({ generationConfig: { thinkingConfig: { thinkingLevel: 'low' } } });
  });

  it('should remove thinking config entirely for a bare zero budget', () => {
    const result = sanitizeUpstreamRequest({
      generationConfig: { maxOutputTokens: 10, thinkingConfig: { thinkingBudget: 0 } },
    });
    expect(result).toEqual({ generationConfig: { maxOutputTokens: 10 } });
  });

  it('should leave non-zero budgets alone', () => {
    const body = { generationConfig: { thinkingConfig: { thinkingBudget: 512 } } };
    expect(sanitizeUpstreamRequest(body)).toEqual(body);
  });
});
