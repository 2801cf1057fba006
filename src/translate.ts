import { randomUUID } from 'crypto';
import { parseJsonObject } from './envelope.js';
import { TranslationError } from './errors.js';
import { DEFAULT_MODEL, type ModelNormalizer } from './models.js';
import { convertSchema } from './schema.js';
import type {
  ChatCompletionRequest,
  ChatCompletionResponse,
  ChatContent,
  ChatMessage,
  ChatTool,
  ChatToolCall,
  ChatUsage,
  FunctionDeclaration,
  GenerateContentRequest,
  GenerationConfig,
  SystemInstruction,
  UpstreamContent,
  UpstreamPart,
  UpstreamRequest,
  UpstreamResponse,
  UsageMetadata,
} from './types.js';
import { SYSTEM_FINGERPRINT, isRecord, nowSeconds } from './utils.js';

// Client -> upstream

function textParts(content: ChatContent | undefined): string[] {
  if (typeof content === 'string') return content === '' ? [] : [content];
  if (!Array.isArray(content)) return [];
  const texts: string[] = [];
  for (const part of content) {
    if (part.type === 'text' && typeof part.text === 'string' && part.text !== '') {
      texts.push(part.text);
    }
  }
  return texts;
}

function toolOutput(content: ChatContent | undefined): string {
  if (typeof content === 'string') return content;
  return textParts(content).join('\n');
}

function parseToolArguments(raw: string): Record<string, unknown> {
  return parseJsonObject(raw) ?? {};
}

function assistantTurn(msg: ChatMessage): UpstreamContent | null {
  const parts: UpstreamPart[] = textParts(msg.content).map((text) => ({ text }));
  for (const call of msg.tool_calls ?? []) {
    parts.push({
      functionCall: { name: call.function.name, args: parseToolArguments(call.function.arguments) },
    });
  }
  return parts.length > 0 ? { role: 'model', parts } : null;
}

/**
 * Folds a run of consecutive tool messages into one user turn. Responses are
 * ordered by the position of their call in the preceding assistant turn;
 * results for unknown ids keep their arrival order after the known ones.
 */
function toolResponseTurn(run: ChatMessage[], calls: readonly ChatToolCall[]): UpstreamContent {
  const callIndex = new Map<string, number>();
  calls.forEach((call, index) => callIndex.set(call.id, index));

  const ranked = run.map((msg, arrival) => {
    const id = msg.tool_call_id ?? '';
    const index = callIndex.get(id);
    const recorded = index !== undefined ? calls[index]?.function.name : undefined;
    const name = recorded ? recorded : msg.name;
    if (!name) {
      throw new TranslationError(
        'tool response missing function name and unresolved tool_call_id',
        'messages'
      );
    }
    const part: UpstreamPart = {
      functionResponse: { name, response: { output: toolOutput(msg.content) } },
    };
    return { rank: index ?? calls.length + arrival, part };
  });

  ranked.sort((a, b) => a.rank - b.rank);
  return { role: 'user', parts: ranked.map((entry) => entry.part) };
}

export function convertMessages(messages: readonly ChatMessage[]): {
  contents: UpstreamContent[];
  systemInstruction?: SystemInstruction;
} {
  const contents: UpstreamContent[] = [];
  const systemParts: Array<{ text: string }> = [];
  // tool calls of the assistant turn directly before the current position
  let openCalls: readonly ChatToolCall[] = [];

  let i = 0;
  while (i < messages.length) {
    const msg = messages[i];
    if (!msg) break;

    switch (msg.role) {
      case 'system':
        for (const text of textParts(msg.content)) systemParts.push({ text });
        i++;
        break;

      case 'user': {
        const parts = textParts(msg.content).map((text) => ({ text }));
        if (parts.length > 0) contents.push({ role: 'user', parts });
        openCalls = [];
        i++;
        break;
      }

      case 'assistant': {
        const turn = assistantTurn(msg);
        if (turn) contents.push(turn);
        openCalls = msg.tool_calls ?? [];
        i++;
        break;
      }

      case 'tool': {
        const run: ChatMessage[] = [];
        while (i < messages.length) {
          const next = messages[i];
          if (!next || next.role !== 'tool') break;
          run.push(next);
          i++;
        }
        contents.push(toolResponseTurn(run, openCalls));
        openCalls = [];
        break;
      }
    }
  }

  return systemParts.length > 0
    ? { contents, systemInstruction: { role: 'system', parts: systemParts } }
    : { contents };
}

/**
 * Every model turn with N function calls must be followed directly by a user
 * turn carrying exactly N function responses.
 */
export function validateToolParity(contents: readonly UpstreamContent[]): void {
  contents.forEach((turn, index) => {
    if (turn.role !== 'model') return;
    const calls = turn.parts.filter((part) => part.functionCall !== undefined).length;
    if (calls === 0) return;

    const next = contents[index + 1];
    if (!next) {
      throw new TranslationError(
        `turn ${String(index)} emitted ${String(calls)} function calls, but no following turn has function responses`,
        'messages'
      );
    }

    const responses = next.parts.filter((part) => part.functionResponse !== undefined).length;
    if (next.role !== 'user' || responses !== calls) {
      throw new TranslationError(
        `turn ${String(index)} emitted ${String(calls)} function calls, but following ${next.role} turn has ${String(responses)} function responses`,
        'messages'
      );
    }
  });
}

export function convertTools(
  tools: readonly ChatTool[] | undefined
): Array<{ functionDeclarations: FunctionDeclaration[] }> | undefined {
  if (!tools || tools.length === 0) return undefined;
  const functionDeclarations = tools.map((tool): FunctionDeclaration => {
    const declaration: FunctionDeclaration = { name: tool.function.name };
    if (tool.function.description) declaration.description = tool.function.description;
    if (tool.function.parameters) declaration.parameters = convertSchema(tool.function.parameters);
    return declaration;
  });
  return [{ functionDeclarations }];
}

export function convertGenerationConfig(request: ChatCompletionRequest): GenerationConfig | undefined {
  const config: GenerationConfig = {};
  if (request.temperature !== undefined) config.temperature = request.temperature;
  if (request.max_tokens !== undefined && request.max_tokens > 0) {
    config.maxOutputTokens = request.max_tokens;
  }
  if (request.top_p !== undefined) config.topP = request.top_p;
  if (typeof request.stop === 'string') {
    config.stopSequences = [request.stop];
  } else if (request.stop && request.stop.length > 0) {
    config.stopSequences = [...request.stop];
  }
  return Object.keys(config).length > 0 ? config : undefined;
}

export function toUpstream(
  request: ChatCompletionRequest,
  tenantId: string,
  normalizer: ModelNormalizer
): UpstreamRequest {
  const { contents, systemInstruction } = convertMessages(request.messages);
  validateToolParity(contents);

  const inner: GenerateContentRequest = { contents };
  if (systemInstruction) inner.systemInstruction = systemInstruction;
  const tools = convertTools(request.tools);
  if (tools) inner.tools = tools;
  const generationConfig = convertGenerationConfig(request);
  if (generationConfig) inner.generationConfig = generationConfig;

  return {
    model: normalizer.normalize(request.model ?? DEFAULT_MODEL),
    project: tenantId,
    request: inner,
  };
}

// Upstream -> client

type ArgsExtractor = (call: Record<string, unknown>) => Record<string, unknown> | undefined;

const objectArgs: ArgsExtractor = (call) => {
  const args = call['args'];
  return isRecord(args) ? args : undefined;
};

function jsonStringArgs(key: string): ArgsExtractor {
  return (call) => {
    const value = call[key];
    return typeof value === 'string' ? parseJsonObject(value) : undefined;
  };
}

/** Tried in order; the first extractor that yields an object wins. */
export const ARGS_EXTRACTORS: readonly ArgsExtractor[] = [
  objectArgs,
  jsonStringArgs('args'),
  jsonStringArgs('argsJson'),
  jsonStringArgs('arguments'),
  jsonStringArgs('parameters'),
];

export function extractFunctionArgs(call: Record<string, unknown>): Record<string, unknown> {
  for (const extract of ARGS_EXTRACTORS) {
    const args = extract(call);
    if (args) return args;
  }
  return {};
}

export function toUsage(metadata: UsageMetadata | undefined): ChatUsage | undefined {
  if (!metadata) return undefined;
  const prompt = metadata.promptTokenCount ?? 0;
  const completion = metadata.candidatesTokenCount ?? 0;
  return { prompt_tokens: prompt, completion_tokens: completion, total_tokens: prompt + completion };
}

export function newToolCallId(): string {
  return `call_${randomUUID()}`;
}

/** Builds a chat.completion object from an unwrapped generateContent response. */
export function toClientNonStreaming(response: UpstreamResponse, model: string): ChatCompletionResponse {
  const parts = response.candidates[0]?.parts ?? [];
  let text = '';
  let reasoning = '';
  const toolCalls: ChatToolCall[] = [];

  for (const part of parts) {
    const partText = part['text'];
    if (typeof partText === 'string') {
      if (part['thought'] === true) {
        reasoning += partText;
      } else {
        text += partText;
      }
    }
    const call = part['functionCall'];
    if (isRecord(call) && typeof call['name'] === 'string') {
      toolCalls.push({
        id: newToolCallId(),
        type: 'function',
        function: { name: call['name'].trim(), arguments: JSON.stringify(extractFunctionArgs(call)) },
      });
    }
  }

  const message: ChatCompletionResponse['choices'][number]['message'] = {
    role: 'assistant',
    content: toolCalls.length > 0 && text === '' ? null : text,
  };
  if (reasoning) message.reasoning_content = reasoning;
  if (toolCalls.length > 0) message.tool_calls = toolCalls;

  const result: ChatCompletionResponse = {
    id: `chatcmpl-${randomUUID()}`,
    object: 'chat.completion',
    created: nowSeconds(),
    model,
    system_fingerprint: SYSTEM_FINGERPRINT,
    choices: [
      {
        index: 0,
        message,
        finish_reason: toolCalls.length > 0 ? 'tool_calls' : 'stop',
        logprobs: null,
      },
    ],
  };
  const usage = toUsage(response.usageMetadata);
  if (usage) result.usage = usage;
  return result;
}
