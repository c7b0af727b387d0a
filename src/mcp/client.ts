import type { Environment } from '../config/env.js';
import type { ToolDefinition } from '../llm/types.js';
import type { ExternalToolSource, ToolOutput } from '../tools/types.js';
import type { MCPConnector, MCPConnectors, MCPServerConfig, MCPSession } from './types.js';
import { loadMCPConfig } from './config.js';
import { defaultConnectors } from './session.js';
import { SkeinError, errorMessage } from '../utils/errors.js';

/**
 * MCP tool source - the union of every declared server's tools, with a
 * routing table from tool name to the session that announced it.
 *
 * Connections are released through a stack of closers, newest first.
 */
export class MCPToolSource implements ExternalToolSource {
  private routes: Map<string, MCPSession> = new Map();
  private definitions: ToolDefinition[] = [];
  private closers: Array<{ name: string; close: () => Promise<void> }> = [];

  get tools(): readonly ToolDefinition[] {
    return this.definitions;
  }

  /** Take ownership of a session; its tools join the catalog. */
  addSession(serverName: string, session: MCPSession, tools: ToolDefinition[]): void {
    for (const tool of tools) {
      if (this.routes.has(tool.name)) {
        console.warn(`[MCP] Duplicate tool '${tool.name}' from ${serverName} ignored; first server wins`);
        continue;
      }
      this.routes.set(tool.name, session);
      this.definitions.push(tool);
    }
  }

  pushCloser(name: string, close: () => Promise<void>): void {
    this.closers.push({ name, close });
  }

  async callTool(name: string, args: Record<string, unknown>): Promise<ToolOutput> {
    const session = this.routes.get(name);
    if (!session) {
      return { content: `Unknown tool: ${name}`, isError: true };
    }
    try {
      return await session.callTool(name, args);
    } catch (error) {
      return { content: `MCP tool '${name}' failed: ${errorMessage(error)}`, isError: true };
    }
  }

  /**
   * Close every connection. Failures are logged so a close error never
   * replaces the run's own result.
   */
  async close(): Promise<void> {
    while (this.closers.length > 0) {
      const closer = this.closers.pop();
      if (!closer) break;
      try {
        await closer.close();
      } catch (error) {
        console.warn(`[MCP] Failed to close ${closer.name}: ${errorMessage(error)}`);
      }
    }
    this.routes.clear();
    this.definitions = [];
  }
}

function connectorFor(config: MCPServerConfig, connectors: MCPConnectors): MCPConnector {
  return config.transport === 'sse' ? connectors.sse : connectors.http;
}

/**
 * Connect to every server in the declaration file and list their tools.
 * Any failure closes what was already opened and aborts the run's setup.
 */
export async function connectMCPServers(
  configPath: string,
  env: Environment,
  connectors: MCPConnectors = defaultConnectors
): Promise<MCPToolSource> {
  const servers = loadMCPConfig(configPath, env);
  const source = new MCPToolSource();

  for (const server of servers) {
    try {
      const session = await connectorFor(server, connectors)(server);
      source.pushCloser(server.name, () => session.close());
      const tools = await session.listTools();
      source.addSession(server.name, session, tools);
      console.error(`[MCP] Connected to ${server.name} (${tools.length} tools)`);
    } catch (error) {
      await source.close();
      throw SkeinError.mcpConnect(
        `Failed to connect to MCP server '${server.name}' at ${server.url}: ${errorMessage(error)}`,
        error
      );
    }
  }

  return source;
}

/**
 * Run `fn` with the declared servers connected; connections are torn down
 * on every exit path.
 */
export async function withMCPServers<T>(
  configPath: string,
  env: Environment,
  fn: (source: MCPToolSource) => Promise<T>,
  connectors?: MCPConnectors
): Promise<T> {
  const source = await connectMCPServers(configPath, env, connectors);
  try {
    return await fn(source);
  } finally {
    await source.close();
  }
}
