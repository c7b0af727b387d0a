/**
 * Agent registry
 *
 * agents.json names agents explicitly; installed packs under the skills home
 * are picked up automatically. An explicit entry wins over a discovered pack
 * with the same name.
 */

import { existsSync, readFileSync, readdirSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { expandHome } from './env.js';
import { getSkillsHome } from './paths.js';
import { PACK_MANIFEST_FILE, PACK_MCP_FILE, PACK_SKILLS_DIR, readPackManifest } from '../packs/manifest.js';
import { SkeinError } from '../utils/errors.js';
import { formatZodIssues } from '../utils/validation.js';

export type AgentMode = 'linked' | 'installed';

export interface Agent {
  name: string;
  mode: AgentMode;
  description: string;
  /** Directory whose `*\/SKILL.md` files are this agent's skills */
  skillsDir: string;
  workingDir: string;
  /** MCP server declaration file, when the agent uses external tools */
  mcpConfig?: string;
  /** Installed pack root; doubles as the companion script directory */
  packDir?: string;
}

export interface AgentRegistry {
  agents: Map<string, Agent>;
  defaultAgent: string;
}

const AgentEntrySchema = z.object({
  mode: z.enum(['linked', 'installed']),
  description: z.string().default(''),
  skillsDir: z.string().optional(),
  workingDir: z.string().default('.'),
  mcpConfig: z.string().optional(),
});

const AgentsFileSchema = z.object({
  defaults: z.object({ defaultAgent: z.string().default('') }).default({}),
  agents: z.record(AgentEntrySchema).default({}),
});

export type AgentsFile = z.infer<typeof AgentsFileSchema>;
type AgentEntry = z.infer<typeof AgentEntrySchema>;

function packMcpConfig(packDir: string): string | undefined {
  const candidate = join(packDir, PACK_MCP_FILE);
  return existsSync(candidate) ? candidate : undefined;
}

function toAgent(name: string, entry: AgentEntry, skillsHome: string): Agent {
  const workingDir = expandHome(entry.workingDir);
  const mcpConfig = entry.mcpConfig ? expandHome(entry.mcpConfig) : undefined;

  if (entry.mode === 'linked') {
    if (!entry.skillsDir) {
      throw SkeinError.config(`Agent '${name}': linked mode requires skillsDir`);
    }
    return { name, mode: 'linked', description: entry.description, skillsDir: expandHome(entry.skillsDir), workingDir, mcpConfig };
  }

  const packDir = join(skillsHome, name);
  return {
    name,
    mode: 'installed',
    description: entry.description,
    skillsDir: entry.skillsDir ? expandHome(entry.skillsDir) : join(packDir, PACK_SKILLS_DIR),
    workingDir,
    mcpConfig: mcpConfig ?? packMcpConfig(packDir),
    packDir,
  };
}

/**
 * Every directory under the skills home that looks like a pack (it has a
 * manifest or a skills directory).
 */
export function discoverInstalledAgents(env: NodeJS.ProcessEnv = process.env): Agent[] {
  const skillsHome = getSkillsHome(env);
  if (!existsSync(skillsHome)) {
    return [];
  }

  const agents: Agent[] = [];
  const entries = readdirSync(skillsHome, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .sort((a, b) => a.name.localeCompare(b.name));

  for (const entry of entries) {
    const packDir = join(skillsHome, entry.name);
    if (!existsSync(join(packDir, PACK_MANIFEST_FILE)) && !existsSync(join(packDir, PACK_SKILLS_DIR))) {
      continue;
    }

    const manifest = readPackManifest(packDir, env);
    agents.push({
      name: entry.name,
      mode: 'installed',
      description: manifest.description,
      skillsDir: join(packDir, PACK_SKILLS_DIR),
      workingDir: expandHome(manifest.workingDir),
      mcpConfig: packMcpConfig(packDir),
      packDir,
    });
  }

  return agents;
}

function readAgentsFile(configPath: string): AgentsFile {
  if (!existsSync(configPath)) {
    throw SkeinError.config(`Config not found: ${configPath}. Run 'skein init' to create one.`);
  }

  const text = readFileSync(configPath, 'utf-8');
  let raw: unknown;
  try {
    raw = text.trim() ? JSON.parse(text) : {};
  } catch (error) {
    throw SkeinError.config(`Invalid JSON in ${configPath}`, error);
  }

  const result = AgentsFileSchema.safeParse(raw);
  if (!result.success) {
    throw SkeinError.config(`Invalid ${configPath}: ${formatZodIssues(result.error)}`);
  }
  return result.data;
}

export function loadAgents(configPath: string, env: NodeJS.ProcessEnv = process.env): AgentRegistry {
  const file = readAgentsFile(configPath);
  const skillsHome = getSkillsHome(env);
  const agents = new Map<string, Agent>();

  for (const agent of discoverInstalledAgents(env)) {
    agents.set(agent.name, agent);
  }
  for (const [name, entry] of Object.entries(file.agents)) {
    agents.set(name, toAgent(name, entry, skillsHome));
  }

  const defaultAgent = file.defaults.defaultAgent;
  if (defaultAgent && !agents.has(defaultAgent)) {
    throw SkeinError.config(
      `Default agent '${defaultAgent}' not found in agents: ${[...agents.keys()].join(', ') || '(none)'}`
    );
  }

  return { agents, defaultAgent };
}

/**
 * Pick the requested agent, else the configured default, else the only
 * agent there is.
 */
export function resolveAgent(registry: AgentRegistry, name?: string): Agent {
  const wanted = name || registry.defaultAgent;
  if (!wanted) {
    if (registry.agents.size === 1) {
      const [only] = registry.agents.values();
      return only;
    }
    throw SkeinError.config('No agent specified and no defaultAgent configured. Use --agent <name>.');
  }

  const agent = registry.agents.get(wanted);
  if (!agent) {
    throw SkeinError.notFound(
      `Agent '${wanted}' not found. Available: ${[...registry.agents.keys()].join(', ') || '(none)'}`
    );
  }
  return agent;
}

/** Starter agents.json written by `skein init` */
export function starterAgentsFile(): AgentsFile {
  return {
    defaults: { defaultAgent: 'example' },
    agents: {
      example: {
        mode: 'linked',
        description: 'Example agent using skills from ~/skills',
        skillsDir: '~/skills',
        workingDir: '.',
      },
    },
  };
}
