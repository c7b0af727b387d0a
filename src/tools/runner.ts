/**
 * Tool Runner
 *
 * Holds the built-in tools and an optional external source, builds the
 * catalog offered to the model and dispatches calls. Dispatch never throws:
 * every failure becomes an error result correlated to its call id.
 */

import type { ToolCall, ToolDefinition, ToolResult } from '../llm/types.js';
import type { NativeTool } from './native/types.js';
import type {
  ExternalToolSource,
  ToolEvent,
  ToolEventCallback,
  ToolOutput,
  ToolSource,
} from './types.js';
import { errorMessage } from '../utils/errors.js';
import { throwIfInterrupted } from '../utils/abort.js';

export interface ToolRunnerConfig {
  nativeTools?: NativeTool[];
  external?: ExternalToolSource | null;
}

export class ToolRunner {
  private nativeTools: Map<string, NativeTool> = new Map();
  private externalTools: Map<string, ToolDefinition> = new Map();
  private external: ExternalToolSource | null;
  private eventListeners: Set<ToolEventCallback> = new Set();

  constructor(config: ToolRunnerConfig = {}) {
    for (const tool of config.nativeTools ?? []) {
      this.nativeTools.set(tool.name, tool);
    }

    this.external = config.external ?? null;
    for (const tool of this.external?.tools ?? []) {
      if (this.nativeTools.has(tool.name)) {
        console.warn(
          `[ToolRunner] External tool '${tool.name}' conflicts with built-in tool. Built-in takes precedence. External tool ignored.`
        );
        continue;
      }
      this.externalTools.set(tool.name, tool);
    }
  }

  /**
   * Subscribe to tool events
   * Returns unsubscribe function
   */
  onToolEvent(callback: ToolEventCallback): () => void {
    this.eventListeners.add(callback);
    return () => this.eventListeners.delete(callback);
  }

  private emitEvent(event: ToolEvent): void {
    for (const listener of this.eventListeners) {
      try {
        listener(event);
      } catch (error) {
        console.error('[ToolRunner] Event listener error:', error);
      }
    }
  }

  /**
   * Catalog offered to the model: built-ins first, then external tools.
   */
  getToolDefinitions(): ToolDefinition[] {
    const tools: ToolDefinition[] = [];

    for (const tool of this.nativeTools.values()) {
      tools.push({
        name: tool.name,
        description: tool.description,
        inputSchema: tool.inputSchema,
      });
    }

    tools.push(...this.externalTools.values());
    return tools;
  }

  private sourceOf(name: string): ToolSource | null {
    if (this.nativeTools.has(name)) return 'native';
    if (this.externalTools.has(name)) return 'external';
    return null;
  }

  /**
   * Execute a single tool call
   */
  async executeTool(call: ToolCall): Promise<ToolResult> {
    const startTime = Date.now();
    const source = this.sourceOf(call.name);

    this.emitEvent({
      type: 'tool_requested',
      toolCallId: call.id,
      toolName: call.name,
      source,
      arguments: call.arguments,
      timestamp: new Date(),
    });

    let output: ToolOutput;
    try {
      output = await this.invokeToolBySource(call, source);
    } catch (error) {
      output = { content: errorMessage(error), isError: true };
    }

    this.emitEvent({
      type: 'tool_execution_finished',
      toolCallId: call.id,
      toolName: call.name,
      source,
      isError: output.isError,
      durationMs: Date.now() - startTime,
      timestamp: new Date(),
    });

    return { toolCallId: call.id, content: output.content, isError: output.isError };
  }

  /**
   * Execute calls one after another, in the order given. An aborted signal
   * stops before the next call with an interrupted SkeinError.
   */
  async executeTools(calls: ToolCall[], signal?: AbortSignal): Promise<ToolResult[]> {
    const results: ToolResult[] = [];
    for (const call of calls) {
      throwIfInterrupted(signal);
      results.push(await this.executeTool(call));
    }
    return results;
  }

  private async invokeToolBySource(call: ToolCall, source: ToolSource | null): Promise<ToolOutput> {
    switch (source) {
      case 'native': {
        const tool = this.nativeTools.get(call.name);
        if (!tool) {
          return { content: `Unknown tool: ${call.name}`, isError: true };
        }
        const result = await tool.execute(call.arguments);
        if (!result.success) {
          return { content: result.error || 'Tool execution failed', isError: true };
        }
        return { content: result.output ?? '', isError: false };
      }

      case 'external': {
        if (!this.external) {
          return { content: `Unknown tool: ${call.name}`, isError: true };
        }
        return this.external.callTool(call.name, call.arguments);
      }

      case null:
        return { content: `Unknown tool: ${call.name}`, isError: true };
    }
  }
}
