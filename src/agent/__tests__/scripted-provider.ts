import type { ConversationMessage, LLMProvider, StreamEvent, ToolDefinition } from '../../llm/types.js';

/** A full response, an immediate failure, or some events followed by a failure */
export type ScriptedResponse = StreamEvent[] | Error | { events: StreamEvent[]; error: Error };

export interface RecordedCall {
  system: string;
  messages: ConversationMessage[];
  tools?: ToolDefinition[];
  maxTokens?: number;
}

/** Provider stub that replays one scripted response per call */
export class ScriptedProvider implements LLMProvider {
  readonly name = 'scripted';
  readonly model = 'scripted-model';
  readonly calls: RecordedCall[] = [];

  constructor(private responses: ScriptedResponse[]) {}

  async *streamCompletion(
    system: string,
    messages: ConversationMessage[],
    tools?: ToolDefinition[],
    maxTokens?: number
  ): AsyncGenerator<StreamEvent> {
    this.calls.push({ system, messages: [...messages], tools, maxTokens });
    const next = this.responses.shift();
    if (next === undefined) {
      throw new Error('No scripted response left');
    }
    if (next instanceof Error) {
      throw next;
    }
    if (Array.isArray(next)) {
      yield* next;
      return;
    }
    yield* next.events;
    throw next.error;
  }
}

export function textResponse(text: string): StreamEvent[] {
  return [
    { type: 'text', text },
    { type: 'done', stopReason: 'end_turn' },
  ];
}

export function toolResponse(calls: Array<{ id: string; name: string; arguments?: Record<string, unknown> }>, text?: string): StreamEvent[] {
  const events: StreamEvent[] = [];
  if (text) {
    events.push({ type: 'text', text });
  }
  for (const call of calls) {
    events.push({ type: 'tool_call', toolCall: { id: call.id, name: call.name, arguments: call.arguments ?? {} } });
  }
  events.push({ type: 'done', stopReason: 'tool_use' });
  return events;
}
