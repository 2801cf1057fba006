import type { IncomingMessage, ServerResponse } from 'http';
import type {
  ChatCompletionRequest,
  ChatContent,
  ChatMessage,
  ChatRole,
  ChatTool,
  ChatToolCall,
  RawChatCompletionRequest,
  RawChatMessage,
  ValidationResult,
} from './types.js';

export const SYSTEM_FINGERPRINT = `code-assist-gateway-${process.env['npm_package_version'] ?? '1.0.0'}`;

const MAX_BODY_BYTES = 20 * 1024 * 1024;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

export function formatUptime(seconds: number): string {
  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = Math.floor(seconds % 60);

  const parts: string[] = [];
  if (days > 0) parts.push(`${String(days)}d`);
  if (hours > 0) parts.push(`${String(hours)}h`);
  if (minutes > 0) parts.push(`${String(minutes)}m`);
  parts.push(`${String(secs)}s`);

  return parts.join(' ');
}

export function safeWrite(res: ServerResponse, data: string): boolean {
  if (!res.destroyed && res.writable) {
    return res.write(data);
  }
  return false;
}

export function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new Error('Request body too large'));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => {
      resolve(Buffer.concat(chunks).toString('utf-8'));
    });
    req.on('error', reject);
  });
}

/** Parses a JSON request body. An empty body is treated as `{}`. */
export async function parseJsonBody(req: IncomingMessage): Promise<unknown> {
  const text = await readBody(req);
  if (!text.trim()) return {};
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    throw new SyntaxError('Invalid JSON');
  }
}

function invalid(message: string, code: string, param: string): ValidationResult {
  return {
    valid: false,
    error: { message, type: 'invalid_request_error', code, param },
  };
}

const ROLES: readonly ChatRole[] = ['system', 'user', 'assistant', 'tool'];

function isChatRole(value: unknown): value is ChatRole {
  return ROLES.some((role) => role === value);
}

function validateMessage(msg: RawChatMessage, i: number): ValidationResult | null {
  const at = `messages[${String(i)}]`;

  if (!msg.role) {
    return invalid(`${at}.role is required`, 'missing_required_parameter', `${at}.role`);
  }
  if (!isChatRole(msg.role)) {
    return invalid(
      `${at}.role must be one of: ${ROLES.join(', ')}`,
      'invalid_value',
      `${at}.role`
    );
  }

  if (msg.tool_calls !== undefined && !Array.isArray(msg.tool_calls)) {
    return invalid(`${at}.tool_calls must be an array`, 'invalid_type', `${at}.tool_calls`);
  }

  const hasToolCalls = Array.isArray(msg.tool_calls) && msg.tool_calls.length > 0;
  if (msg.content === undefined || msg.content === null) {
    if (msg.role === 'assistant' && hasToolCalls) return null;
    return invalid(`${at}.content is required`, 'missing_required_parameter', `${at}.content`);
  }
  if (typeof msg.content !== 'string' && !Array.isArray(msg.content)) {
    return invalid(
      `${at}.content must be a string or an array of content parts`,
      'invalid_type',
      `${at}.content`
    );
  }

  if (msg.role === 'tool' && msg.tool_call_id !== undefined && typeof msg.tool_call_id !== 'string') {
    return invalid(`${at}.tool_call_id must be a string`, 'invalid_type', `${at}.tool_call_id`);
  }

  return null;
}

export function validateChatCompletionRequest(body: RawChatCompletionRequest): ValidationResult {
  if (!body.messages) {
    return invalid('Missing required parameter: messages', 'missing_required_parameter', 'messages');
  }
  if (!Array.isArray(body.messages)) {
    return invalid('messages must be an array', 'invalid_type', 'messages');
  }
  if (body.messages.length === 0) {
    return invalid('messages array must not be empty', 'invalid_value', 'messages');
  }

  const messages: unknown[] = body.messages;
  for (let i = 0; i < messages.length; i++) {
    const msg = messages[i];
    if (!isRecord(msg)) {
      return invalid(`messages[${String(i)}] must be an object`, 'invalid_type', `messages[${String(i)}]`);
    }
    const failure = validateMessage(msg, i);
    if (failure) return failure;
  }

  if (body.model !== undefined && typeof body.model !== 'string') {
    return invalid('model must be a string', 'invalid_type', 'model');
  }
  if (body.stream !== undefined && typeof body.stream !== 'boolean') {
    return invalid('stream must be a boolean', 'invalid_type', 'stream');
  }
  if (body.temperature !== undefined && typeof body.temperature !== 'number') {
    return invalid('temperature must be a number', 'invalid_type', 'temperature');
  }
  if (body.max_tokens !== undefined && typeof body.max_tokens !== 'number') {
    return invalid('max_tokens must be a number', 'invalid_type', 'max_tokens');
  }
  if (body.tools !== undefined && !Array.isArray(body.tools)) {
    return invalid('tools must be an array', 'invalid_type', 'tools');
  }

  return { valid: true };
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function readContent(value: unknown): ChatContent {
  if (typeof value === 'string') return value;
  if (!Array.isArray(value)) return null;
  return value.filter(isRecord).map((part) => {
    const text = optionalString(part['text']);
    return {
      type: optionalString(part['type']) ?? 'text',
      ...(text !== undefined ? { text } : {}),
    };
  });
}

function readToolCalls(value: unknown): ChatToolCall[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter(isRecord).map((call, i): ChatToolCall => {
    const fn: Record<string, unknown> = isRecord(call['function']) ? call['function'] : {};
    const args = fn['arguments'];
    return {
      id: optionalString(call['id']) ?? `call_${String(i)}`,
      type: 'function',
      function: {
        name: optionalString(fn['name']) ?? '',
        arguments: typeof args === 'string' ? args : args === undefined ? '{}' : JSON.stringify(args),
      },
    };
  });
}

function readTools(value: unknown): ChatTool[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const tools: ChatTool[] = [];
  for (const tool of value) {
    if (!isRecord(tool) || !isRecord(tool['function'])) continue;
    const fn = tool['function'];
    const name = optionalString(fn['name']);
    if (!name) continue;
    const description = optionalString(fn['description']);
    const parameters = fn['parameters'];
    tools.push({
      type: 'function',
      function: {
        name,
        ...(description !== undefined ? { description } : {}),
        ...(isRecord(parameters) ? { parameters } : {}),
      },
    });
  }
  return tools;
}

function readMessage(raw: Record<string, unknown>): ChatMessage {
  const role = isChatRole(raw['role']) ? raw['role'] : 'user';
  const message: ChatMessage = { role, content: readContent(raw['content']) };
  const toolCalls = readToolCalls(raw['tool_calls']);
  if (toolCalls && toolCalls.length > 0) message.tool_calls = toolCalls;
  const toolCallId = optionalString(raw['tool_call_id']);
  if (toolCallId !== undefined) message.tool_call_id = toolCallId;
  const name = optionalString(raw['name']);
  if (name !== undefined) message.name = name;
  return message;
}

/**
 * Builds the typed request from a body that passed
 * validateChatCompletionRequest. Unknown fields are dropped.
 */
export function readChatCompletionRequest(body: Record<string, unknown>): ChatCompletionRequest {
  const rawMessages = body['messages'];
  const messages = Array.isArray(rawMessages) ? rawMessages.filter(isRecord).map(readMessage) : [];
  const stop = body['stop'];
  const request: ChatCompletionRequest = { messages };

  const model = optionalString(body['model']);
  if (model !== undefined) request.model = model;
  if (typeof body['stream'] === 'boolean') request.stream = body['stream'];
  const temperature = optionalNumber(body['temperature']);
  if (temperature !== undefined) request.temperature = temperature;
  const maxTokens = optionalNumber(body['max_tokens']);
  if (maxTokens !== undefined) request.max_tokens = maxTokens;
  const topP = optionalNumber(body['top_p']);
  if (topP !== undefined) request.top_p = topP;
  if (typeof stop === 'string') {
    request.stop = stop;
  } else if (Array.isArray(stop)) {
    request.stop = stop.filter((s): s is string => typeof s === 'string');
  }
  const tools = readTools(body['tools']);
  if (tools) request.tools = tools;

  return request;
}
