import { describe, it, expect, vi } from 'vitest';
import type Anthropic from '@anthropic-ai/sdk';
import { AnthropicProvider, toAnthropicMessages, toAnthropicTools, type AnthropicMessagesClient } from '../anthropic.js';
import type { StreamEvent } from '../types.js';

async function* replay(events: Anthropic.MessageStreamEvent[]): AsyncGenerator<Anthropic.MessageStreamEvent> {
  for (const event of events) {
    yield event;
  }
}

function fakeClient(events: Anthropic.MessageStreamEvent[]) {
  const stream = vi.fn((_params: Anthropic.MessageStreamParams) => replay(events));
  const client: AnthropicMessagesClient = { messages: { stream } };
  return { client, stream };
}

async function collect(events: AsyncIterable<StreamEvent>): Promise<StreamEvent[]> {
  const out: StreamEvent[] = [];
  for await (const event of events) {
    out.push(event);
  }
  return out;
}

describe('toAnthropicTools', () => {
  it('should reshape definitions to input_schema', () => {
    const tools = toAnthropicTools([
      {
        name: 'read_file',
        description: 'Read a file',
        inputSchema: { type: 'object', properties: { path: { type: 'string' } }, required: ['path'] },
      },
    ]);

    expect(tools).toEqual([
      {
        name: 'read_file',
        description: 'Read a file',
        input_schema: { type: 'object', properties: { path: { type: 'string' } }, required: ['path'] },
      },
    ]);
  });
});

describe('toAnthropicMessages', () => {
  it('should pass history blocks through unchanged', () => {
    const messages = toAnthropicMessages([
      { role: 'user', content: 'List files' },
      { role: 'assistant', content: [{ type: 'tool_use', id: 't1', name: 'list_directory', input: {} }] },
      { role: 'user', content: [{ type: 'tool_result', tool_use_id: 't1', content: 'a.txt', is_error: false }] },
    ]);

    expect(messages).toEqual([
      { role: 'user', content: 'List files' },
      { role: 'assistant', content: [{ type: 'tool_use', id: 't1', name: 'list_directory', input: {} }] },
      { role: 'user', content: [{ type: 'tool_result', tool_use_id: 't1', content: 'a.txt', is_error: false }] },
    ]);
  });
});

describe('AnthropicProvider', () => {
  it('should stream text deltas and release tool calls after the message', async () => {
    const { client } = fakeClient([
      { type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text: 'Checking ' } },
      { type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text: 'files.' } },
      { type: 'content_block_stop', index: 0 },
      {
        type: 'content_block_start',
        index: 1,
        content_block: { type: 'tool_use', id: 'toolu_1', name: 'list_directory', input: {} },
      },
      { type: 'content_block_delta', index: 1, delta: { type: 'input_json_delta', partial_json: '{"path":' } },
      { type: 'content_block_delta', index: 1, delta: { type: 'input_json_delta', partial_json: '"docs"}' } },
      { type: 'content_block_stop', index: 1 },
    ]);

    const provider = new AnthropicProvider('test-secret', 'claude-sonnet-4-6', { client });
    const events = await collect(provider.streamCompletion('sys', [{ role: 'user', content: 'List files' }]));

    expect(events).toEqual([
      { type: 'text', text: 'Checking ' },
      { type: 'text', text: 'files.' },
      { type: 'tool_call', toolCall: { id: 'toolu_1', name: 'list_directory', arguments: { path: 'docs' } } },
      { type: 'done', stopReason: 'tool_use' },
    ]);
  });

  it('should end with end_turn when no tools were called', async () => {
    const { client } = fakeClient([
      { type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text: 'All done.' } },
      { type: 'content_block_stop', index: 0 },
    ]);

    const events = await collect(new AnthropicProvider('test-secret', undefined, { client }).streamCompletion('sys', []));
    expect(events).toEqual([
      { type: 'text', text: 'All done.' },
      { type: 'done', stopReason: 'end_turn' },
    ]);
  });

  it('should send the system prompt, max tokens and tools', async () => {
    const { client, stream } = fakeClient([]);
    const provider = new AnthropicProvider('test-secret', 'claude-test', { client });

    await collect(
      provider.streamCompletion(
        'You are a skill runner.',
        [{ role: 'user', content: 'hi' }],
        [{ name: 'fetch_url', description: 'Fetch', inputSchema: { type: 'object', properties: {} } }],
        64
      )
    );

    expect(stream).toHaveBeenCalledTimes(1);
    expect(stream.mock.calls[0][0]).toEqual({
      model: 'claude-test',
      max_tokens: 64,
      system: 'You are a skill runner.',
      messages: [{ role: 'user', content: 'hi' }],
      tools: [{ name: 'fetch_url', description: 'Fetch', input_schema: { type: 'object', properties: {} } }],
    });
  });

  it('should leave tools out when the catalog is empty', async () => {
    const { client, stream } = fakeClient([]);
    await collect(new AnthropicProvider('test-secret', 'claude-test', { client }).streamCompletion('sys', [], []));

    expect(stream.mock.calls[0][0]).not.toHaveProperty('tools');
  });
});
