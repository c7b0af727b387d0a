import { existsSync, readFileSync } from 'fs';
import { basename, join } from 'path';
import { z } from 'zod';
import { getDataDir } from '../config/paths.js';
import { formatZodIssues } from '../utils/validation.js';
import { SkeinError } from '../utils/errors.js';

export const PACK_MANIFEST_FILE = 'agent.json';
export const PACK_MCP_FILE = 'mcp.json';
export const PACK_SKILLS_DIR = 'skills';

/** Agent names become a single directory under the skills home */
export const AgentNameSchema = z
  .string()
  .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'must start with a letter or digit and use only letters, digits, ".", "_" or "-"');

export function isValidAgentName(name: string): boolean {
  return AgentNameSchema.safeParse(name).success;
}

const PackManifestSchema = z.object({
  name: AgentNameSchema.optional(),
  description: z.string().optional(),
  workingDir: z.string().optional(),
});

export interface PackManifest {
  name: string;
  description: string;
  workingDir: string;
}

/**
 * Read a pack's optional agent.json. The name falls back to the directory
 * name and the working directory to a per-agent workspace under the data dir.
 */
export function readPackManifest(packDir: string, env: NodeJS.ProcessEnv = process.env): PackManifest {
  const manifestPath = join(packDir, PACK_MANIFEST_FILE);
  let raw: unknown = {};

  if (existsSync(manifestPath)) {
    const text = readFileSync(manifestPath, 'utf-8');
    try {
      raw = text.trim() ? JSON.parse(text) : {};
    } catch (error) {
      throw SkeinError.config(`Invalid JSON in ${manifestPath}`, error);
    }
  }

  const result = PackManifestSchema.safeParse(raw);
  if (!result.success) {
    throw SkeinError.config(`Invalid ${manifestPath}: ${formatZodIssues(result.error)}`);
  }

  const name = result.data.name ?? basename(packDir);
  return {
    name,
    description: result.data.description ?? '',
    workingDir: result.data.workingDir ?? join(getDataDir(env), 'workspaces', name),
  };
}
