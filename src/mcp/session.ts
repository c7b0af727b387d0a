/**
 * MCP SDK session adapter
 *
 * Wraps an initialized SDK `Client` behind the MCPSession interface and
 * flattens tool results to text.
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { z } from 'zod';
import type { ToolDefinition } from '../llm/types.js';
import type { ToolOutput } from '../tools/types.js';
import type { MCPConnectors, MCPServerConfig, MCPSession } from './types.js';
import { errorMessage } from '../utils/errors.js';

const CLIENT_INFO = { name: 'skein', version: '0.1.0' };

const CallToolResultShape = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() }).passthrough()).default([]),
  isError: z.boolean().optional(),
});

/** Join text blocks with newlines; other block kinds are serialized as JSON. */
export function flattenToolResult(result: unknown): ToolOutput {
  const parsed = CallToolResultShape.safeParse(result);
  if (!parsed.success) {
    return { content: JSON.stringify(result), isError: false };
  }
  const content = parsed.data.content
    .map((block) => (block.type === 'text' && block.text !== undefined ? block.text : JSON.stringify(block)))
    .join('\n');
  return { content, isError: parsed.data.isError ?? false };
}

class SdkMCPSession implements MCPSession {
  constructor(
    private readonly serverName: string,
    private readonly client: Client
  ) {}

  async listTools(): Promise<ToolDefinition[]> {
    const { tools } = await this.client.listTools();
    return tools.map((tool): ToolDefinition => ({
      name: tool.name,
      description: tool.description ?? '',
      inputSchema: { ...tool.inputSchema },
    }));
  }

  async callTool(name: string, args: Record<string, unknown>): Promise<ToolOutput> {
    try {
      return flattenToolResult(await this.client.callTool({ name, arguments: args }));
    } catch (error) {
      return { content: `MCP tool '${name}' on ${this.serverName} failed: ${errorMessage(error)}`, isError: true };
    }
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}

/** Run the initialize handshake over `transport`. */
export async function connectSession(serverName: string, transport: Transport): Promise<MCPSession> {
  const client = new Client(CLIENT_INFO);
  await client.connect(transport);
  return new SdkMCPSession(serverName, client);
}

export const defaultConnectors: MCPConnectors = {
  sse: (config: MCPServerConfig) =>
    connectSession(
      config.name,
      new SSEClientTransport(new URL(config.url), { requestInit: { headers: config.headers } })
    ),
  http: (config: MCPServerConfig) =>
    connectSession(
      config.name,
      new StreamableHTTPClientTransport(new URL(config.url), { requestInit: { headers: config.headers } })
    ),
};
