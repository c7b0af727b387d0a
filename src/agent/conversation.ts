/**
 * Conversation loop
 *
 * One round is one provider call plus the tool calls it asked for. Text is
 * forwarded to the output as it streams; tool calls are run one at a time
 * and their results go back to the model in the next round.
 */

import type {
  ContentBlock,
  ConversationMessage,
  LLMProvider,
  ToolCall,
  ToolDefinition,
  ToolResultBlock,
} from '../llm/types.js';
import type { ToolRunner } from '../tools/runner.js';
import { SkeinError, errorMessage } from '../utils/errors.js';
import { throwIfInterrupted } from '../utils/abort.js';

export const DEFAULT_MAX_ROUNDS = 20;

/** Written to the output when a failed attempt had already streamed text */
export const RETRY_NOTICE = '\n\n[retrying without tools]\n\n';

export interface ConversationOptions {
  provider: LLMProvider;
  toolRunner: ToolRunner;
  /** Instruction used while tools are offered */
  systemPrompt: string;
  /** Instruction used after falling back to a tool-less run */
  plainSystemPrompt: string;
  /** Receives each text fragment as it arrives */
  onText?: (text: string) => void;
  maxRounds?: number;
  maxTokens?: number;
  /** Stops the loop before the next model call or tool call */
  signal?: AbortSignal;
}

export interface ConversationOutcome {
  /** All streamed text, across rounds */
  text: string;
  rounds: number;
  toolCalls: number;
  /** The round cap was hit while the model was still calling tools */
  truncated: boolean;
  /** Tools were dropped after a provider failure */
  degraded: boolean;
}

interface RoundResponse {
  text: string;
  toolCalls: ToolCall[];
}

/**
 * Stream one attempt into `response`, a buffer scoped to that attempt. On
 * failure the caller can still see what was already forwarded.
 */
async function streamRound(
  options: ConversationOptions,
  system: string,
  messages: ConversationMessage[],
  tools: ToolDefinition[],
  response: RoundResponse
): Promise<RoundResponse> {
  for await (const event of options.provider.streamCompletion(
    system,
    messages,
    tools.length > 0 ? tools : undefined,
    options.maxTokens
  )) {
    throwIfInterrupted(options.signal);
    switch (event.type) {
      case 'text':
        response.text += event.text;
        options.onText?.(event.text);
        break;
      case 'tool_call':
        response.toolCalls.push(event.toolCall);
        break;
      case 'done':
        break;
    }
  }

  return response;
}

function emptyResponse(): RoundResponse {
  return { text: '', toolCalls: [] };
}

function assistantTurn(response: RoundResponse): ConversationMessage {
  const content: ContentBlock[] = [];
  if (response.text) {
    content.push({ type: 'text', text: response.text });
  }
  for (const call of response.toolCalls) {
    content.push({ type: 'tool_use', id: call.id, name: call.name, input: call.arguments });
  }
  return { role: 'assistant', content };
}

/**
 * Drive the model until it answers without calling tools or the round cap is
 * reached. `messages` is extended in place with every completed round.
 */
export async function runConversation(
  messages: ConversationMessage[],
  options: ConversationOptions
): Promise<ConversationOutcome> {
  const maxRounds = options.maxRounds ?? DEFAULT_MAX_ROUNDS;
  let tools = options.toolRunner.getToolDefinitions();
  let system = options.systemPrompt;
  let degraded = false;

  let text = '';
  let rounds = 0;
  let toolCalls = 0;
  let truncated = false;

  while (rounds < maxRounds) {
    throwIfInterrupted(options.signal);
    rounds++;

    let response: RoundResponse;
    const attempt = emptyResponse();
    try {
      response = await streamRound(options, system, messages, tools, attempt);
    } catch (error) {
      if (options.signal?.aborted) {
        throw SkeinError.interrupted();
      }
      if (tools.length === 0) {
        if (degraded) {
          throw SkeinError.provider(`Model call failed: ${errorMessage(error)}`, error);
        }
        throw error;
      }

      console.error(`[Conversation] Model call with tools failed, retrying without tools: ${errorMessage(error)}`);
      tools = [];
      system = options.plainSystemPrompt;
      degraded = true;
      if (attempt.text) {
        options.onText?.(RETRY_NOTICE);
      }

      try {
        response = await streamRound(options, system, messages, tools, emptyResponse());
      } catch (retryError) {
        if (options.signal?.aborted) {
          throw SkeinError.interrupted();
        }
        throw SkeinError.provider(`Model call failed: ${errorMessage(retryError)}`, retryError);
      }
    }

    text += response.text;

    if (response.toolCalls.length === 0) {
      truncated = false;
      break;
    }

    messages.push(assistantTurn(response));

    const results = await options.toolRunner.executeTools(response.toolCalls, options.signal);
    toolCalls += results.length;

    const resultBlocks: ToolResultBlock[] = results.map((result) => ({
      type: 'tool_result',
      tool_use_id: result.toolCallId,
      content: result.content,
      is_error: result.isError,
    }));
    messages.push({ role: 'user', content: resultBlocks });

    truncated = rounds >= maxRounds;
  }

  return { text, rounds, toolCalls, truncated, degraded };
}
