import type { UpstreamCandidate, UpstreamResponse, UsageMetadata } from './types.js';
import { isRecord } from './utils.js';

export type JsonObject = Record<string, unknown>;

/**
 * Flattens the upstream `{..., response: {...}}` wrapper. Top-level fields are
 * copied first and the nested response fields are laid over them, so nested
 * values win on collision. Payloads without an object-valued `response` are
 * returned as they are.
 */
export function unwrapResponse(payload: JsonObject): JsonObject {
  const inner = payload['response'];
  if (!isRecord(inner)) return payload;

  const flat: JsonObject = {};
  for (const [key, value] of Object.entries(payload)) {
    if (key !== 'response') flat[key] = value;
  }
  return { ...flat, ...inner };
}

function readUsageMetadata(value: unknown): UsageMetadata | undefined {
  if (!isRecord(value)) return undefined;
  const usage: UsageMetadata = {};
  const prompt = value['promptTokenCount'];
  const candidates = value['candidatesTokenCount'];
  const total = value['totalTokenCount'];
  if (typeof prompt === 'number') usage.promptTokenCount = prompt;
  if (typeof candidates === 'number') usage.candidatesTokenCount = candidates;
  if (typeof total === 'number') usage.totalTokenCount = total;
  return usage;
}

function readCandidate(candidate: Record<string, unknown>): UpstreamCandidate {
  const content = candidate['content'];
  const parts = isRecord(content) ? content['parts'] : candidate['parts'];
  const result: UpstreamCandidate = { parts: Array.isArray(parts) ? parts.filter(isRecord) : [] };
  const finishReason = candidate['finishReason'];
  if (typeof finishReason === 'string') result.finishReason = finishReason;
  if (candidate['groundingMetadata'] !== undefined) {
    result.groundingMetadata = candidate['groundingMetadata'];
  }
  return result;
}

/** Unwraps a payload and narrows it to candidates and usage. */
export function readUpstreamResponse(payload: JsonObject): UpstreamResponse {
  const flat = unwrapResponse(payload);
  const candidates = flat['candidates'];
  const response: UpstreamResponse = {
    candidates: Array.isArray(candidates) ? candidates.filter(isRecord).map(readCandidate) : [],
  };
  const usage = readUsageMetadata(flat['usageMetadata']);
  if (usage) response.usageMetadata = usage;
  return response;
}

export type SseLine =
  | { kind: 'data'; payload: string }
  | { kind: 'done' }
  | { kind: 'ignore' };

const DONE_MARKERS = new Set(['', '[DONE]', '"[DONE]"']);

/** Classifies one raw upstream line. Only `data:` lines carry payloads. */
export function parseSseLine(line: string): SseLine {
  if (!line.startsWith('data:')) return { kind: 'ignore' };
  const payload = line.slice(5).trim();
  if (DONE_MARKERS.has(payload)) return { kind: 'done' };
  return { kind: 'data', payload };
}

export function parseJsonObject(text: string): JsonObject | undefined {
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Re-emits one upstream SSE data payload in the public dialect. Payloads that
 * are not JSON objects are forwarded untouched.
 */
export function unwrapSsePayload(payload: string): string {
  const parsed = parseJsonObject(payload);
  return parsed ? JSON.stringify(unwrapResponse(parsed)) : payload;
}

/**
 * Shape fixes applied to public-dialect requests before they are wrapped for
 * the upstream. Returns a new object; the input is left as it was.
 */
export function sanitizeUpstreamRequest(body: JsonObject): JsonObject {
  const result: JsonObject = { ...body };

  const system = result['systemInstruction'];
  if (isRecord(system) && system['role'] !== 'system') {
    result['systemInstruction'] = { ...system, role: 'system' };
  }

  const generation = result['generationConfig'];
  if (isRecord(generation)) {
    const thinking = generation['thinkingConfig'];
    if (isRecord(thinking) && thinking['thinkingBudget'] === 0) {
      const level = thinking['thinkingLevel'];
      const keepThinking =
        thinking['includeThoughts'] === true || (typeof level === 'string' && level.trim() !== '');
      const nextGeneration: JsonObject = { ...generation };
      if (keepThinking) {
        const { thinkingBudget: _dropped, ...rest } = thinking;
        nextGeneration['thinkingConfig'] = rest;
      } else {
        delete nextGeneration['thinkingConfig'];
      }
      result['generationConfig'] = nextGeneration;
    }
  }

  return result;
}
