/**
 * Tool System Types
 *
 * Built-in tools run in process; external tools come from a source that
 * routes calls to the server that announced them.
 */

import type { ToolDefinition } from '../llm/types.js';

export type ToolSource = 'native' | 'external';

/** Text outcome of one call, before it is correlated to a call id */
export interface ToolOutput {
  content: string;
  isError: boolean;
}

/** Tools provided from outside the process (e.g. MCP servers) */
export interface ExternalToolSource {
  readonly tools: readonly ToolDefinition[];
  callTool(name: string, args: Record<string, unknown>): Promise<ToolOutput>;
}

// Event: Tool requested (emitted when tool execution starts)
export interface ToolRequestedEvent {
  type: 'tool_requested';
  toolCallId: string;
  toolName: string;
  source: ToolSource | null;
  arguments: Record<string, unknown>;
  timestamp: Date;
}

// Event: Tool execution finished (emitted when tool completes)
export interface ToolExecutionFinishedEvent {
  type: 'tool_execution_finished';
  toolCallId: string;
  toolName: string;
  source: ToolSource | null;
  isError: boolean;
  durationMs: number;
  timestamp: Date;
}

export type ToolEvent = ToolRequestedEvent | ToolExecutionFinishedEvent;

export type ToolEventCallback = (event: ToolEvent) => void;
