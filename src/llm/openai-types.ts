/**
 * OpenAI-compatible chat-completions wire types
 */

import type { ToolCallDelta } from './tool-call-accumulator.js';

// ============================================================================
// Request Message Types
// ============================================================================

/** Tool call structure for request messages */
export interface OpenAIRequestToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: string;
  };
}

export interface OpenAISystemMessage {
  role: 'system';
  content: string;
}

export interface OpenAIUserMessage {
  role: 'user';
  content: string;
}

/** Assistant message, optionally carrying the calls it made */
export interface OpenAIAssistantMessage {
  role: 'assistant';
  content: string | null;
  tool_calls?: OpenAIRequestToolCall[];
}

/** Tool result message for request */
export interface OpenAIToolResultMessage {
  role: 'tool';
  tool_call_id: string;
  content: string;
}

export type OpenAIMessage =
  | OpenAISystemMessage
  | OpenAIUserMessage
  | OpenAIAssistantMessage
  | OpenAIToolResultMessage;

// ============================================================================
// Tool Definition Types
// ============================================================================

export interface OpenAIFunctionTool {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

export interface OpenAIChatRequest {
  model: string;
  messages: OpenAIMessage[];
  max_tokens: number;
  stream: true;
  tools?: OpenAIFunctionTool[];
}

// ============================================================================
// Streaming Response Types
// ============================================================================

export interface OpenAIStreamDelta {
  content?: string | null;
  tool_calls?: ToolCallDelta[];
}

export interface OpenAIStreamChoice {
  delta?: OpenAIStreamDelta;
  finish_reason?: string | null;
}

/** One `data:` payload of a streamed chat completion */
export interface OpenAIStreamChunk {
  id?: string;
  model?: string;
  choices?: OpenAIStreamChoice[];
}
