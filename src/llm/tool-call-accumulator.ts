import type { ToolCall } from './types.js';
import { isRecord } from '../utils/validation.js';

/** One streamed tool-call fragment, as the chat-completions API sends it. */
export interface ToolCallDelta {
  index: number;
  id?: string;
  function?: {
    name?: string;
    arguments?: string;
  };
}

interface PartialToolCall {
  id: string;
  name: string;
  arguments: string;
}

/**
 * Parse a tool-argument JSON string. Empty, malformed or non-object input
 * yields `{}`.
 */
export function parseToolArguments(json: string): Record<string, unknown> {
  if (!json) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(json);
    return isRecord(parsed) ? parsed : {};
  } catch {
    console.warn(`[ToolCalls] Failed to parse tool arguments: ${json}`);
    return {};
  }
}

/**
 * Collects tool-call fragments keyed by stream index. Nothing leaves the
 * accumulator until `finalize()`, which is called once the stream has ended.
 */
export class ToolCallAccumulator {
  private calls: Map<number, PartialToolCall> = new Map();

  add(delta: ToolCallDelta): void {
    let call = this.calls.get(delta.index);
    if (!call) {
      call = { id: '', name: '', arguments: '' };
      this.calls.set(delta.index, call);
    }
    if (delta.id) call.id = delta.id;
    if (delta.function?.name) call.name = delta.function.name;
    if (delta.function?.arguments) call.arguments += delta.function.arguments;
  }

  get size(): number {
    return this.calls.size;
  }

  /** Completed calls in stream-index order. */
  finalize(): ToolCall[] {
    return [...this.calls.entries()]
      .sort(([a], [b]) => a - b)
      .map(([index, call]) =>
        Object.freeze({
          // Some servers omit ids; the history still needs one to correlate results
          id: call.id || `call_${index}`,
          name: call.name,
          arguments: parseToolArguments(call.arguments),
        })
      );
  }
}
