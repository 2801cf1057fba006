import { randomUUID } from 'crypto';
import { parseJsonObject, readUpstreamResponse } from './envelope.js';
import { extractFunctionArgs, newToolCallId } from './translate.js';
import type { ChatUsage, FinishReason, StreamEvent, UpstreamCandidate } from './types.js';
import { SYSTEM_FINGERPRINT, isRecord, nowSeconds } from './utils.js';

export const DONE_FRAME = 'data: [DONE]\n\n';

const PASSTHROUGH_PART_KINDS = ['executableCode', 'codeExecutionResult'] as const;

function classifyCandidate(candidate: UpstreamCandidate, events: StreamEvent[]): void {
  if (candidate.groundingMetadata !== undefined && candidate.groundingMetadata !== null) {
    events.push({ type: 'grounding', metadata: candidate.groundingMetadata });
  }

  for (const part of candidate.parts) {
    const text = part['text'];
    if (typeof text === 'string' && text !== '') {
      events.push(part['thought'] ? { type: 'thinking', text } : { type: 'text', text });
    }

    const call = part['functionCall'];
    if (isRecord(call)) {
      const name = typeof call['name'] === 'string' ? call['name'].trim() : '';
      if (name) events.push({ type: 'toolCall', name, args: extractFunctionArgs(call) });
    }

    for (const kind of PASSTHROUGH_PART_KINDS) {
      if (part[kind] !== undefined) {
        events.push({ type: 'toolResultPassthrough', kind, data: part[kind] });
      }
    }
  }
}

/**
 * Turns one upstream SSE data payload into canonical events, in source order.
 * Payloads that are not JSON objects come through as a single text event.
 */
export function classifyPayload(payload: string): StreamEvent[] {
  const parsed = parseJsonObject(payload);
  if (!parsed) return [{ type: 'text', text: payload }];

  const response = readUpstreamResponse(parsed);
  const events: StreamEvent[] = [];
  for (const candidate of response.candidates) classifyCandidate(candidate, events);

  const usage = response.usageMetadata;
  if (usage) {
    events.push({
      type: 'usage',
      promptTokens: usage.promptTokenCount ?? 0,
      completionTokens: usage.candidatesTokenCount ?? 0,
    });
  }
  return events;
}

export interface StreamRenderer<E> {
  render(event: E): string[];
  finish(): string[];
}

type Delta = Record<string, unknown>;

/** Renders canonical events as chat.completion.chunk frames. One instance per stream. */
export class ChatStreamRenderer implements StreamRenderer<StreamEvent> {
  private readonly id = `chatcmpl-${randomUUID()}`;
  private readonly created = nowSeconds();
  private roleSent = false;
  private toolCalls = 0;
  private usage: ChatUsage | undefined;

  constructor(private readonly model: string) {}

  get toolCallCount(): number {
    return this.toolCalls;
  }

  render(event: StreamEvent): string[] {
    switch (event.type) {
      case 'text':
        return [this.chunk({ ...this.roleMarker(), content: event.text })];

      case 'thinking':
        return [this.chunk({ reasoning_content: event.text })];

      case 'toolCall': {
        const first = !this.roleSent;
        const delta: Delta = {
          ...this.roleMarker(),
          ...(first ? { content: '' } : {}),
          tool_calls: [
            {
              index: this.toolCalls,
              id: newToolCallId(),
              type: 'function',
              function: { name: event.name, arguments: JSON.stringify(event.args) },
            },
          ],
        };
        this.toolCalls++;
        return [this.chunk(delta)];
      }

      case 'toolResultPassthrough':
        return [this.chunk({ native_tool_calls: [{ type: event.kind, data: event.data }] })];

      case 'grounding':
        return [this.chunk({ grounding: event.metadata })];

      case 'usage': {
        const prompt = event.promptTokens;
        const completion = event.completionTokens;
        this.usage = { prompt_tokens: prompt, completion_tokens: completion, total_tokens: prompt + completion };
        return [];
      }
    }
  }

  finish(): string[] {
    const reason: FinishReason = this.toolCalls > 0 ? 'tool_calls' : 'stop';
    return [this.chunk({}, reason, this.usage), DONE_FRAME];
  }

  private roleMarker(): Delta {
    if (this.roleSent) return {};
    this.roleSent = true;
    return { role: 'assistant' };
  }

  private chunk(delta: Delta, finishReason: FinishReason | null = null, usage?: ChatUsage): string {
    const body = {
      id: this.id,
      object: 'chat.completion.chunk',
      created: this.created,
      model: this.model,
      system_fingerprint: SYSTEM_FINGERPRINT,
      choices: [{ index: 0, delta, finish_reason: finishReason, logprobs: null }],
      ...(usage ? { usage } : {}),
    };
    return `data: ${JSON.stringify(body)}\n\n`;
  }
}

/** Frames already-unwrapped public-dialect payloads one to one. */
export class PassthroughRenderer implements StreamRenderer<string> {
  render(payload: string): string[] {
    return [`data: ${payload}\n\n`];
  }

  finish(): string[] {
    return [];
  }
}
