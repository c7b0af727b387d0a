import Anthropic from '@anthropic-ai/sdk';
import type {
  ConversationMessage,
  LLMProvider,
  StreamEvent,
  ToolCall,
  ToolDefinition,
} from './types.js';
import { DEFAULT_MAX_TOKENS } from './types.js';
import { parseToolArguments } from './tool-call-accumulator.js';

export const DEFAULT_ANTHROPIC_MODEL = 'claude-sonnet-4-6';

/**
 * The slice of the SDK client the provider talks to. The real `Anthropic`
 * client satisfies it; tests hand in a fake.
 */
export type AnthropicMessageStream = AsyncIterable<Anthropic.MessageStreamEvent>;

export interface AnthropicMessagesClient {
  messages: {
    stream(params: Anthropic.MessageStreamParams): AnthropicMessageStream;
  };
}

export interface AnthropicProviderOptions {
  client?: AnthropicMessagesClient;
  /** Log request summaries to stderr */
  debug?: boolean;
}

function toInputSchema(schema: Record<string, unknown>): Anthropic.Tool.InputSchema {
  const { type: _type, properties, required, ...rest } = schema;
  return {
    ...rest,
    type: 'object',
    properties: properties ?? {},
    required: Array.isArray(required)
      ? required.filter((key): key is string => typeof key === 'string')
      : undefined,
  };
}

export function toAnthropicTools(tools: ToolDefinition[]): Anthropic.Tool[] {
  return tools.map((t) => ({
    name: t.name,
    description: t.description,
    input_schema: toInputSchema(t.inputSchema),
  }));
}

export function toAnthropicMessages(messages: ConversationMessage[]): Anthropic.MessageParam[] {
  return messages.map((m): Anthropic.MessageParam => {
    if (typeof m.content === 'string') {
      return { role: m.role, content: m.content };
    }
    const content = m.content.map((block): Anthropic.ContentBlockParam => {
      switch (block.type) {
        case 'text':
          return { type: 'text', text: block.text };
        case 'tool_use':
          return { type: 'tool_use', id: block.id, name: block.name, input: block.input };
        case 'tool_result':
          return {
            type: 'tool_result',
            tool_use_id: block.tool_use_id,
            content: block.content,
            is_error: block.is_error,
          };
      }
    });
    return { role: m.role, content };
  });
}

/**
 * Native backend. History and tool blocks already use the Messages API
 * shape, so only the tool catalog is reshaped.
 */
export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';
  readonly model: string;

  private client: AnthropicMessagesClient;
  private debug: boolean;

  constructor(apiKey: string, model: string = DEFAULT_ANTHROPIC_MODEL, options: AnthropicProviderOptions = {}) {
    this.model = model;
    this.client = options.client ?? new Anthropic({ apiKey });
    this.debug = options.debug ?? false;
  }

  async *streamCompletion(
    system: string,
    messages: ConversationMessage[],
    tools?: ToolDefinition[],
    maxTokens: number = DEFAULT_MAX_TOKENS
  ): AsyncGenerator<StreamEvent> {
    const params: Anthropic.MessageStreamParams = {
      model: this.model,
      max_tokens: maxTokens,
      system,
      messages: toAnthropicMessages(messages),
    };
    if (tools && tools.length > 0) {
      params.tools = toAnthropicTools(tools);
    }

    if (this.debug) {
      console.error('[Anthropic] stream request:', {
        model: this.model,
        messageCount: messages.length,
        toolCount: tools?.length ?? 0,
      });
    }

    const stream = this.client.messages.stream(params);
    const toolCalls: ToolCall[] = [];
    let current: { id: string; name: string; inputJson: string } | null = null;
    let stopReason: string | null = null;

    for await (const event of stream) {
      if (event.type === 'content_block_start') {
        if (event.content_block.type === 'tool_use') {
          current = { id: event.content_block.id, name: event.content_block.name, inputJson: '' };
        }
      } else if (event.type === 'content_block_delta') {
        if (event.delta.type === 'text_delta') {
          if (event.delta.text) {
            yield { type: 'text', text: event.delta.text };
          }
        } else if (event.delta.type === 'input_json_delta' && current) {
          current.inputJson += event.delta.partial_json;
        }
      } else if (event.type === 'content_block_stop') {
        if (current) {
          toolCalls.push({
            id: current.id,
            name: current.name,
            arguments: parseToolArguments(current.inputJson),
          });
          current = null;
        }
      } else if (event.type === 'message_delta') {
        if (event.delta.stop_reason) {
          stopReason = event.delta.stop_reason;
        }
      }
    }

    // Tool calls are only released once the message is complete
    for (const toolCall of toolCalls) {
      yield { type: 'tool_call', toolCall };
    }
    yield { type: 'done', stopReason: stopReason ?? (toolCalls.length > 0 ? 'tool_use' : 'end_turn') };
  }
}
