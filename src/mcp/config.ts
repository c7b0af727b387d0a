import { readFileSync } from 'fs';
import { z } from 'zod';
import type { Environment } from '../config/env.js';
import type { MCPServerConfig } from './types.js';
import { SkeinError } from '../utils/errors.js';
import { formatZodIssues } from '../utils/validation.js';

const ServerDeclarationSchema = z.object({
  url: z.string().url(),
  type: z.enum(['sse', 'http', 'streamable-http']).optional(),
  headers: z.record(z.string()).optional(),
});

const MCPConfigFileSchema = z.object({
  mcpServers: z.record(ServerDeclarationSchema).default({}),
});

/** Replace `${VAR}` with its value from `env`; unset variables become ''. */
export function interpolateEnv(value: string, env: Environment): string {
  return value.replace(/\$\{([^}]+)\}/g, (_match, name: string) => env[name] ?? '');
}

/**
 * Read a server declaration file. An unreadable or malformed file makes the
 * external tools unusable for this run, so it is reported as a connect error.
 */
export function loadMCPConfig(configPath: string, env: Environment): MCPServerConfig[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw SkeinError.mcpConnect(`Cannot read MCP config ${configPath}`, error);
  }

  const parsed = MCPConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw SkeinError.mcpConnect(`Invalid MCP config ${configPath}: ${formatZodIssues(parsed.error)}`);
  }

  return Object.entries(parsed.data.mcpServers).map(([name, server]) => ({
    name,
    url: server.url,
    transport: server.type ?? 'http',
    headers: Object.fromEntries(
      Object.entries(server.headers ?? {}).map(([key, value]) => [key, interpolateEnv(value, env)])
    ),
  }));
}
