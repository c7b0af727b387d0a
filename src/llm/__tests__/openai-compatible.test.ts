import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  OpenAICompatibleProvider,
  toOpenAIMessages,
  toOpenAITools,
} from '../openai-compatible.js';
import type { ConversationMessage, StreamEvent } from '../types.js';

function dataLine(payload: unknown): string {
  return `data: ${JSON.stringify(payload)}\n\n`;
}

function sseResponse(chunks: string[]): Response {
  const encoder = new TextEncoder();
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(encoder.encode(chunk));
      }
      controller.close();
    },
  });
  return new Response(body, { status: 200, headers: { 'Content-Type': 'text/event-stream' } });
}

async function collect(events: AsyncIterable<StreamEvent>): Promise<StreamEvent[]> {
  const out: StreamEvent[] = [];
  for await (const event of events) {
    out.push(event);
  }
  return out;
}

function provider(debug = false): OpenAICompatibleProvider {
  return new OpenAICompatibleProvider({
    name: 'ollama',
    model: 'llama3.1',
    baseUrl: 'http://localhost:11434/v1/',
    apiKey: 'ollama',
    retryDelayMs: 0,
    debug,
  });
}

describe('toOpenAIMessages', () => {
  it('should put the system instruction first and pass plain turns through', () => {
    const messages: ConversationMessage[] = [
      { role: 'user', content: 'Hello' },
      { role: 'assistant', content: 'Hi' },
    ];

    expect(toOpenAIMessages('Be brief.', messages)).toEqual([
      { role: 'system', content: 'Be brief.' },
      { role: 'user', content: 'Hello' },
      { role: 'assistant', content: 'Hi' },
    ]);
  });

  it('should turn a tool_use turn and its results into a function call and a matching tool message', () => {
    const messages: ConversationMessage[] = [
      {
        role: 'assistant',
        content: [{ type: 'tool_use', id: 'call_1', name: 'read_file', input: { path: 'a.txt' } }],
      },
      {
        role: 'user',
        content: [{ type: 'tool_result', tool_use_id: 'call_1', content: 'file body' }],
      },
    ];

    const [, assistant, tool] = toOpenAIMessages('sys', messages);

    expect(assistant).toEqual({
      role: 'assistant',
      content: null,
      tool_calls: [
        { id: 'call_1', type: 'function', function: { name: 'read_file', arguments: '{"path":"a.txt"}' } },
      ],
    });
    expect(tool).toEqual({ role: 'tool', tool_call_id: 'call_1', content: 'file body' });
  });

  it('should keep assistant text beside tool calls', () => {
    const messages: ConversationMessage[] = [
      {
        role: 'assistant',
        content: [
          { type: 'text', text: 'Let me look.' },
          { type: 'tool_use', id: 'c1', name: 'list_directory', input: {} },
          { type: 'tool_use', id: 'c2', name: 'read_file', input: { path: 'x' } },
        ],
      },
    ];

    const [, assistant] = toOpenAIMessages('sys', messages);
    expect(assistant).toMatchObject({ role: 'assistant', content: 'Let me look.' });
    expect(assistant.role === 'assistant' ? assistant.tool_calls?.map((c) => c.id) : []).toEqual(['c1', 'c2']);
  });

  it('should emit one tool message per result, in order', () => {
    const messages: ConversationMessage[] = [
      {
        role: 'user',
        content: [
          { type: 'tool_result', tool_use_id: 'c1', content: 'one' },
          { type: 'tool_result', tool_use_id: 'c2', content: 'two', is_error: true },
        ],
      },
    ];

    expect(toOpenAIMessages('sys', messages).slice(1)).toEqual([
      { role: 'tool', tool_call_id: 'c1', content: 'one' },
      { role: 'tool', tool_call_id: 'c2', content: 'two' },
    ]);
  });
});

describe('toOpenAITools', () => {
  it('should rename input_schema to parameters inside a function wrapper', () => {
    const schema = { type: 'object', properties: { url: { type: 'string' } }, required: ['url'] };
    expect(toOpenAITools([{ name: 'fetch_url', description: 'Fetch', inputSchema: schema }])).toEqual([
      { type: 'function', function: { name: 'fetch_url', description: 'Fetch', parameters: schema } },
    ]);
  });
});

describe('OpenAICompatibleProvider', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('should stream text, then reassembled tool calls, then done', async () => {
    const first = dataLine({ choices: [{ delta: { content: 'Hello' } }] });
    const fetchMock = vi.fn(async () =>
      sseResponse([
        first.slice(0, 25),
        first.slice(25),
        dataLine({
          choices: [{ delta: { tool_calls: [{ index: 0, id: 'call_a', function: { name: 'read_file', arguments: '{"pa' } }] } }],
        }),
        dataLine({ choices: [{ delta: { tool_calls: [{ index: 0, function: { arguments: 'th":"a.txt"}' } }] } }] }),
        dataLine({ choices: [{ delta: {}, finish_reason: 'tool_calls' }] }),
        'data: [DONE]\n\n',
      ])
    );
    vi.stubGlobal('fetch', fetchMock);

    const events = await collect(provider().streamCompletion('sys', [{ role: 'user', content: 'hi' }]));

    expect(events).toEqual([
      { type: 'text', text: 'Hello' },
      { type: 'tool_call', toolCall: { id: 'call_a', name: 'read_file', arguments: { path: 'a.txt' } } },
      { type: 'done', stopReason: 'tool_calls' },
    ]);
  });

  it('should post to chat/completions with translated messages and tools', async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) =>
      sseResponse([dataLine({ choices: [{ delta: { content: 'ok' }, finish_reason: 'stop' }] })])
    );
    vi.stubGlobal('fetch', fetchMock);

    await collect(
      provider().streamCompletion(
        'sys',
        [{ role: 'user', content: 'hi' }],
        [{ name: 'list_directory', description: 'List', inputSchema: { type: 'object', properties: {} } }],
        128
      )
    );

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://localhost:11434/v1/chat/completions');
    const body: unknown = JSON.parse(String(init.body));
    expect(body).toEqual({
      model: 'llama3.1',
      messages: [
        { role: 'system', content: 'sys' },
        { role: 'user', content: 'hi' },
      ],
      max_tokens: 128,
      stream: true,
      tools: [
        { type: 'function', function: { name: 'list_directory', description: 'List', parameters: { type: 'object', properties: {} } } },
      ],
    });
  });

  it('should default the stop reason to stop', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => sseResponse([dataLine({ choices: [{ delta: { content: 'x' } }] })])));

    const events = await collect(provider().streamCompletion('sys', []));
    expect(events[events.length - 1]).toEqual({ type: 'done', stopReason: 'stop' });
  });

  it('should skip malformed data lines', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () =>
        sseResponse(['data: {not json\n\n', ': keep-alive\n\n', dataLine({ choices: [{ delta: { content: 'fine' } }] })])
      )
    );

    const events = await collect(provider().streamCompletion('sys', []));
    expect(events).toEqual([
      { type: 'text', text: 'fine' },
      { type: 'done', stopReason: 'stop' },
    ]);
  });

  it('should retry a 503 before streaming', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(new Response('busy', { status: 503 }))
      .mockResolvedValueOnce(sseResponse([dataLine({ choices: [{ delta: { content: 'up' } }] })]));
    vi.stubGlobal('fetch', fetchMock);

    const events = await collect(provider().streamCompletion('sys', []));

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(events[0]).toEqual({ type: 'text', text: 'up' });
  });

  it('should log a request summary only when debug is on', async () => {
    const log = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.stubGlobal('fetch', vi.fn(async () => sseResponse([dataLine({ choices: [{ delta: { content: 'x' } }] })])));

    await collect(provider().streamCompletion('sys', []));
    expect(log).not.toHaveBeenCalled();

    await collect(provider(true).streamCompletion('sys', []));
    expect(log).toHaveBeenCalledWith('[ollama] stream request:', { model: 'llama3.1', messageCount: 1, toolCount: 0 });
  });

  it('should throw on a non-retryable error', async () => {
    const fetchMock = vi.fn(async () => new Response('bad request', { status: 400 }));
    vi.stubGlobal('fetch', fetchMock);

    await expect(collect(provider().streamCompletion('sys', []))).rejects.toThrow('[ollama] API error: 400 bad request');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});
