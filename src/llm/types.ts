// LLM provider abstraction types

// Tool definition handed to the model
export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

// Tool call requested by the model
export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

// Result of executing a tool call, always text
export interface ToolResult {
  toolCallId: string;
  content: string;
  isError: boolean;
}

// Content blocks (native wire shape)
export interface TextBlock {
  type: 'text';
  text: string;
}

export interface ToolUseBlock {
  type: 'tool_use';
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface ToolResultBlock {
  type: 'tool_result';
  tool_use_id: string;
  content: string;
  is_error?: boolean;
}

export type ContentBlock = TextBlock | ToolUseBlock | ToolResultBlock;

export interface ConversationMessage {
  role: 'user' | 'assistant';
  content: string | ContentBlock[];
}

export type StreamEvent =
  | { type: 'text'; text: string }
  | { type: 'tool_call'; toolCall: ToolCall }
  | { type: 'done'; stopReason: string };

export const DEFAULT_MAX_TOKENS = 16384;

/**
 * A model backend. `streamCompletion` returns a lazy sequence: the request is
 * made when iteration starts, and the sequence always ends with one `done`.
 */
export interface LLMProvider {
  readonly name: string;
  readonly model: string;

  streamCompletion(
    system: string,
    messages: ConversationMessage[],
    tools?: ToolDefinition[],
    maxTokens?: number
  ): AsyncIterable<StreamEvent>;
}

export type ProviderKind = 'anthropic' | 'ollama' | 'openai';

export interface ProviderConfig {
  kind: ProviderKind;
  model?: string;
  apiKey?: string;
  baseUrl?: string;
  /** Log request summaries to stderr */
  debug?: boolean;
}
