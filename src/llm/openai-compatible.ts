/**
 * OpenAI-Compatible Provider
 *
 * Chat-completions backend used for Ollama and OpenAI. The history arrives in
 * the native block format and is flattened into this API's role vocabulary;
 * tool calls stream in as index-keyed fragments and are only released as
 * whole calls once the stream has ended.
 */

import type {
  ConversationMessage,
  LLMProvider,
  StreamEvent,
  ToolDefinition,
} from './types.js';
import { DEFAULT_MAX_TOKENS } from './types.js';
import type {
  OpenAIChatRequest,
  OpenAIFunctionTool,
  OpenAIMessage,
  OpenAIStreamChunk,
} from './openai-types.js';
import { ToolCallAccumulator } from './tool-call-accumulator.js';

export interface OpenAICompatibleConfig {
  /** Provider name used in logs and run records */
  name: string;
  model: string;
  baseUrl: string;
  apiKey: string;
  /** Retries for 429/5xx/network failures before the stream starts (default: 3) */
  maxRetries?: number;
  /** Base backoff in ms, doubled per attempt (default: 1000) */
  retryDelayMs?: number;
  /** Log request summaries to stderr */
  debug?: boolean;
}

export const OLLAMA_DEFAULTS = {
  baseUrl: 'http://localhost:11434/v1',
  model: 'llama3.1',
  apiKey: 'ollama',
} as const;

export const OPENAI_DEFAULTS = {
  baseUrl: 'https://api.openai.com/v1',
  model: 'gpt-4o',
} as const;

/**
 * Convert a native-format history into chat-completions messages.
 * tool_use blocks become `tool_calls` on one assistant message; each
 * tool_result block becomes its own `tool` message.
 */
export function toOpenAIMessages(system: string, messages: ConversationMessage[]): OpenAIMessage[] {
  const openaiMessages: OpenAIMessage[] = [{ role: 'system', content: system }];

  for (const msg of messages) {
    if (typeof msg.content === 'string') {
      openaiMessages.push(
        msg.role === 'assistant'
          ? { role: 'assistant', content: msg.content }
          : { role: 'user', content: msg.content }
      );
      continue;
    }

    const text = msg.content
      .filter((block) => block.type === 'text')
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('');

    if (msg.role === 'assistant') {
      const toolCalls = msg.content.flatMap((block) =>
        block.type === 'tool_use'
          ? [{
              id: block.id,
              type: 'function' as const,
              function: { name: block.name, arguments: JSON.stringify(block.input) },
            }]
          : []
      );
      openaiMessages.push(
        toolCalls.length > 0
          ? { role: 'assistant', content: text || null, tool_calls: toolCalls }
          : { role: 'assistant', content: text }
      );
      continue;
    }

    for (const block of msg.content) {
      if (block.type === 'tool_result') {
        openaiMessages.push({
          role: 'tool',
          tool_call_id: block.tool_use_id,
          content: block.content,
        });
      }
    }
    if (text) {
      openaiMessages.push({ role: 'user', content: text });
    }
  }

  return openaiMessages;
}

export function toOpenAITools(tools: ToolDefinition[]): OpenAIFunctionTool[] {
  return tools.map((t): OpenAIFunctionTool => ({
    type: 'function',
    function: {
      name: t.name,
      description: t.description,
      parameters: t.inputSchema,
    },
  }));
}

export class OpenAICompatibleProvider implements LLMProvider {
  readonly name: string;
  readonly model: string;

  private baseUrl: string;
  private apiKey: string;
  private maxRetries: number;
  private retryDelayMs: number;
  private logPrefix: string;
  private debug: boolean;

  constructor(config: OpenAICompatibleConfig) {
    this.name = config.name;
    this.model = config.model;
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.apiKey = config.apiKey;
    this.maxRetries = config.maxRetries ?? 3;
    this.retryDelayMs = config.retryDelayMs ?? 1000;
    this.logPrefix = `[${config.name}]`;
    this.debug = config.debug ?? false;
  }

  /**
   * Fetch with retry for transient errors (5xx, 429).
   * Uses exponential backoff with jitter.
   */
  protected async fetchWithRetry(url: string, options: RequestInit): Promise<Response> {
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      try {
        const response = await fetch(url, options);

        if (response.ok || (response.status >= 400 && response.status < 500 && response.status !== 429)) {
          return response;
        }

        const errorText = await response.text();
        lastError = new Error(`${this.logPrefix} API error: ${response.status} ${errorText}`);
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
      }

      if (attempt < this.maxRetries) {
        const backoffMs = this.retryDelayMs > 0
          ? Math.pow(2, attempt) * this.retryDelayMs + Math.random() * this.retryDelayMs
          : 0;
        console.warn(`${this.logPrefix} Retrying (attempt ${attempt + 1}/${this.maxRetries}), waiting ${Math.round(backoffMs)}ms: ${lastError?.message}`);
        await new Promise((resolve) => setTimeout(resolve, backoffMs));
      }
    }

    throw lastError ?? new Error(`${this.logPrefix} Request failed after retries`);
  }

  async *streamCompletion(
    system: string,
    messages: ConversationMessage[],
    tools?: ToolDefinition[],
    maxTokens: number = DEFAULT_MAX_TOKENS
  ): AsyncGenerator<StreamEvent> {
    const requestBody: OpenAIChatRequest = {
      model: this.model,
      messages: toOpenAIMessages(system, messages),
      max_tokens: maxTokens,
      stream: true,
    };
    if (tools && tools.length > 0) {
      requestBody.tools = toOpenAITools(tools);
    }

    if (this.debug) {
      console.error(`${this.logPrefix} stream request:`, {
        model: this.model,
        messageCount: requestBody.messages.length,
        toolCount: requestBody.tools?.length ?? 0,
      });
    }

    const response = await this.fetchWithRetry(`${this.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify(requestBody),
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`${this.logPrefix} API error: ${response.status} ${error}`);
    }

    const reader = response.body?.getReader();
    if (!reader) {
      throw new Error(`${this.logPrefix} No response body`);
    }

    const decoder = new TextDecoder();
    const accumulator = new ToolCallAccumulator();
    let stopReason = 'stop';
    let lineBuffer = '';

    const handleLine = (line: string): string | null => {
      const trimmedLine = line.trim();
      if (!trimmedLine.startsWith('data:') || trimmedLine === 'data: [DONE]') {
        return null;
      }

      let data: OpenAIStreamChunk;
      try {
        data = JSON.parse(trimmedLine.slice(5).trim());
      } catch {
        // Skip malformed JSON lines
        return null;
      }

      const choice = data.choices?.[0];
      if (!choice) {
        return null;
      }
      for (const toolCall of choice.delta?.tool_calls ?? []) {
        accumulator.add(toolCall);
      }
      if (choice.finish_reason) {
        stopReason = choice.finish_reason;
      }
      return choice.delta?.content || null;
    };

    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      const lines = (lineBuffer + decoder.decode(value, { stream: true })).split('\n');
      lineBuffer = lines.pop() ?? '';

      for (const line of lines) {
        const text = handleLine(line);
        if (text) {
          yield { type: 'text', text };
        }
      }
    }

    const trailing = handleLine(lineBuffer + decoder.decode());
    if (trailing) {
      yield { type: 'text', text: trailing };
    }

    for (const toolCall of accumulator.finalize()) {
      yield { type: 'tool_call', toolCall };
    }
    yield { type: 'done', stopReason };
  }
}
