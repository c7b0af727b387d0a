/**
 * MCP (Model Context Protocol) Server Integration Types
 *
 * External tool servers are declared in mcp.json and reached over HTTP,
 * either server-sent events or streamable HTTP.
 */

import type { ToolDefinition } from '../llm/types.js';
import type { ToolOutput } from '../tools/types.js';

export type MCPTransportKind = 'sse' | 'http' | 'streamable-http';

export interface MCPServerConfig {
  name: string;
  url: string;
  transport: MCPTransportKind;
  /** Request headers with `${VAR}` references already resolved */
  headers: Record<string, string>;
}

/** One initialized connection to a server */
export interface MCPSession {
  listTools(): Promise<ToolDefinition[]>;
  callTool(name: string, args: Record<string, unknown>): Promise<ToolOutput>;
  close(): Promise<void>;
}

export type MCPConnector = (config: MCPServerConfig) => Promise<MCPSession>;

/** Connector per wire protocol; `http` serves both `http` and `streamable-http` */
export interface MCPConnectors {
  sse: MCPConnector;
  http: MCPConnector;
}
