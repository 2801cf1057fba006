// Client dialect (OpenAI chat completions)
export type ChatRole = 'system' | 'user' | 'assistant' | 'tool';

export interface ChatContentPart {
  type: string;
  text?: string;
}

export type ChatContent = string | ChatContentPart[] | null;

export interface ChatToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: string;
  };
}

export interface ChatMessage {
  role: ChatRole;
  content?: ChatContent;
  tool_calls?: ChatToolCall[];
  tool_call_id?: string;
  name?: string;
}

export interface ChatTool {
  type: 'function';
  function: {
    name: string;
    description?: string;
    parameters?: Record<string, unknown>;
  };
}

export interface ChatCompletionRequest {
  model?: string;
  messages: ChatMessage[];
  stream?: boolean;
  temperature?: number;
  max_tokens?: number;
  top_p?: number;
  stop?: string | string[];
  tools?: ChatTool[];
}

export interface ChatUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export type FinishReason = 'stop' | 'tool_calls';

export interface ChatCompletionResponse {
  id: string;
  object: 'chat.completion';
  created: number;
  model: string;
  system_fingerprint: string;
  choices: Array<{
    index: number;
    message: {
      role: 'assistant';
      content: string | null;
      reasoning_content?: string;
      tool_calls?: ChatToolCall[];
    };
    finish_reason: FinishReason;
    logprobs: null;
  }>;
  usage?: ChatUsage;
}

// Input types for validation (raw JSON input before type narrowing)
export interface RawChatCompletionRequest {
  model?: unknown;
  messages?: unknown;
  stream?: unknown;
  temperature?: unknown;
  max_tokens?: unknown;
  tools?: unknown;
}

export interface RawChatMessage {
  role?: unknown;
  content?: unknown;
  tool_calls?: unknown;
  tool_call_id?: unknown;
}

export interface ValidationResult {
  valid: boolean;
  error?: {
    message: string;
    type: string;
    code: string;
    param?: string;
  };
}

// Upstream dialect (Code Assist / Gemini)
export interface FunctionCall {
  name: string;
  args: Record<string, unknown>;
}

export interface FunctionResponse {
  name: string;
  response: Record<string, unknown>;
}

export interface UpstreamPart {
  text?: string;
  thought?: boolean;
  functionCall?: FunctionCall;
  functionResponse?: FunctionResponse;
}

export type UpstreamRole = 'user' | 'model';

export interface UpstreamContent {
  role: UpstreamRole;
  parts: UpstreamPart[];
}

export interface SystemInstruction {
  role: 'system';
  parts: Array<{ text: string }>;
}

export interface UpstreamSchema {
  type?: string;
  description?: string;
  properties?: Record<string, UpstreamSchema>;
  items?: UpstreamSchema;
  required?: string[];
  enum?: string[];
}

export interface FunctionDeclaration {
  name: string;
  description?: string;
  parameters?: UpstreamSchema;
}

export interface GenerationConfig {
  temperature?: number;
  maxOutputTokens?: number;
  topP?: number;
  stopSequences?: string[];
}

export interface GenerateContentRequest {
  contents: UpstreamContent[];
  systemInstruction?: SystemInstruction;
  tools?: Array<{ functionDeclarations: FunctionDeclaration[] }>;
  generationConfig?: GenerationConfig;
}

export interface UpstreamRequest {
  model: string;
  project: string;
  request: GenerateContentRequest;
}

export interface UsageMetadata {
  promptTokenCount?: number;
  candidatesTokenCount?: number;
  totalTokenCount?: number;
}

export interface UpstreamCandidate {
  parts: Array<Record<string, unknown>>;
  finishReason?: string;
  groundingMetadata?: unknown;
}

// Unwrapped generateContent payload, narrowed to the fields the gateway reads
export interface UpstreamResponse {
  candidates: UpstreamCandidate[];
  usageMetadata?: UsageMetadata;
}

// Canonical stream events
export type StreamEvent =
  | { type: 'text'; text: string }
  | { type: 'thinking'; text: string }
  | { type: 'toolCall'; name: string; args: Record<string, unknown> }
  | { type: 'toolResultPassthrough'; kind: string; data: unknown }
  | { type: 'usage'; promptTokens: number; completionTokens: number }
  | { type: 'grounding'; metadata: unknown };

// Model catalog (src/models.json)
export interface ModelRule {
  contains: string;
  model: string;
}

export interface CatalogModel {
  id: string;
  name: string;
  context: number;
  output: number;
}

export interface ModelsConfig {
  version: string;
  defaultModel: string;
  rules: ModelRule[];
  models: CatalogModel[];
}

// OpenAI error envelope
export type OpenAIErrorType =
  | 'invalid_request_error'
  | 'authentication_error'
  | 'server_error'
  | 'api_error';

export type OpenAIErrorCode =
  | 'invalid_api_key'
  | 'invalid_request'
  | 'upstream_error'
  | 'connection_error'
  | 'request_timeout'
  | 'client_disconnected'
  | 'server_error'
  | null;

export interface OpenAIError {
  error: {
    message: string;
    type: OpenAIErrorType;
    code: OpenAIErrorCode;
    param?: string | null;
    suggestion?: string;
  };
}
