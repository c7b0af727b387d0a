/**
 * CLI command handlers
 *
 * Each handler returns the process exit code. Setup failures are thrown as
 * SkeinError and reported by the entry point.
 */

import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import chalk from 'chalk';
import type { LLMProvider } from '../llm/types.js';
import { createProvider } from '../llm/factory.js';
import type { Environment } from '../config/env.js';
import { getAgentsConfigPath, getDataDir } from '../config/paths.js';
import { loadAgents, resolveAgent, starterAgentsFile, type Agent, type AgentRegistry } from '../config/agents.js';
import { countSkills, discoverSkills } from '../skills/parser.js';
import { routeIntent } from '../skills/router.js';
import type { Skill } from '../skills/types.js';
import { installAgent, uninstallAgent } from '../packs/installer.js';
import { executeSkill, type ExecuteSkillOptions, type ExecuteSkillResult } from '../agent/execute.js';
import { errorMessage } from '../utils/errors.js';
import { agentsTable, skillsTable, type CliIO } from './io.js';

export interface CliDeps {
  env: Environment;
  io: CliIO;
  /** Runs a matched skill; the real engine by default */
  execute?: (options: ExecuteSkillOptions) => Promise<ExecuteSkillResult>;
  /** Provider for model-based routing; null disables that pass */
  routerProvider?: (env: Environment) => LLMProvider | null;
  /** Yes/no question for destructive commands */
  confirm?: (message: string) => Promise<boolean>;
  /** Aborted on SIGINT/SIGTERM; interrupts a running skill */
  signal?: AbortSignal;
}

export interface RequestOptions {
  agent?: string;
  dryRun?: boolean;
  verbose?: boolean;
}

function defaultRouterProvider(env: Environment): LLMProvider | null {
  try {
    return createProvider(env);
  } catch (error) {
    console.error(`[Router] Model routing unavailable: ${errorMessage(error)}`);
    return null;
  }
}

export function loadRegistry(env: Environment): AgentRegistry {
  return loadAgents(getAgentsConfigPath(env), env);
}

/** Execute a skill for an agent, streaming its output. */
export async function runSkill(
  agent: Agent,
  skill: Skill,
  deps: CliDeps,
  userRequest?: string
): Promise<number> {
  const execute = deps.execute ?? executeSkill;
  const result = await execute({
    skillBody: skill.body,
    skillName: skill.name,
    workingDir: agent.workingDir,
    companionDir: agent.packDir,
    mcpConfig: agent.mcpConfig,
    userRequest,
    env: deps.env,
    signal: deps.signal,
  });

  if (result.text && !result.text.endsWith('\n')) {
    deps.io.out('');
  }
  if (result.truncated) {
    deps.io.err(chalk.yellow(`Stopped after ${result.rounds} rounds; the skill may not have finished.`));
  }
  return 0;
}

export async function handleRequest(request: string, options: RequestOptions, deps: CliDeps): Promise<number> {
  const { io } = deps;
  const registry = loadRegistry(deps.env);
  const agent = resolveAgent(registry, options.agent);
  const skills = await discoverSkills(agent.skillsDir);

  if (skills.length === 0) {
    io.err(chalk.red.bold(`No skills found for agent '${agent.name}'.`));
    return 1;
  }

  if (options.verbose) {
    io.out(`${chalk.dim('Agent:')} ${agent.name}`);
    io.out(`${chalk.dim('Skills dir:')} ${agent.skillsDir}`);
  }

  const getProvider = () => (deps.routerProvider ?? defaultRouterProvider)(deps.env);
  const route = await routeIntent(request, skills, getProvider);

  if (!route) {
    io.err(`${chalk.red.bold('No matching skill found for:')} '${request}'`);
    io.err('');
    for (const line of skillsTable(skills, 'Available skills:')) {
      io.err(line);
    }
    return 1;
  }

  const matched = route.skill;
  if (options.verbose) {
    io.out(
      route.method === 'keyword'
        ? `${chalk.dim('Routing:')} keyword`
        : `${chalk.dim('Routing:')} model (${route.provider.name}/${route.provider.model})`
    );
    io.out(`${chalk.dim('Matched skill:')} ${matched.name}`);
  }

  if (options.dryRun) {
    io.out(`${chalk.green.bold('Matched:')} agent=${agent.name}, skill=${matched.name}`);
    return 0;
  }

  return runSkill(agent, matched, deps, request);
}

export async function listSkillsCommand(agentName: string | undefined, deps: CliDeps): Promise<number> {
  const agent = resolveAgent(loadRegistry(deps.env), agentName);
  const skills = await discoverSkills(agent.skillsDir);

  if (skills.length === 0) {
    deps.io.out(`No skills found for agent '${agent.name}'.`);
    return 0;
  }

  for (const line of skillsTable(skills, `Skills for ${agent.name}`)) {
    deps.io.out(line);
  }
  return 0;
}

export async function agentsCommand(deps: CliDeps): Promise<number> {
  const registry = loadRegistry(deps.env);
  const agents = [...registry.agents.values()];

  if (agents.length === 0) {
    deps.io.out('No agents registered. Edit agents.json or run `skein install <path>`.');
    return 0;
  }

  const counts = new Map<string, number>();
  for (const agent of agents) {
    counts.set(agent.name, await countSkills(agent.skillsDir));
  }

  for (const line of agentsTable(agents, counts, registry.defaultAgent)) {
    deps.io.out(line);
  }
  return 0;
}

export async function installCommand(path: string, deps: CliDeps): Promise<number> {
  const result = await installAgent(path, deps.env);
  deps.io.out(chalk.green.bold(`Installed agent '${result.agentName}' with ${result.skillCount} skills`));
  deps.io.out(`${chalk.dim('Skills at:')} ${result.installPath}`);
  return 0;
}

export async function uninstallCommand(name: string, yes: boolean, deps: CliDeps): Promise<number> {
  if (!yes) {
    const confirmed = deps.confirm ? await deps.confirm(`Remove agent '${name}' and all its skills?`) : false;
    if (!confirmed) {
      deps.io.out('Cancelled.');
      return 0;
    }
  }

  await uninstallAgent(name, deps.env);
  deps.io.out(chalk.green.bold(`Uninstalled agent '${name}'`));
  return 0;
}

/** Write a starter agents.json; an existing file is left alone. */
export function initCommand(deps: CliDeps): number {
  const configPath = getAgentsConfigPath(deps.env);

  if (existsSync(configPath)) {
    deps.io.out(`Config already exists at ${configPath}, not overwriting.`);
    return 0;
  }

  mkdirSync(dirname(configPath), { recursive: true });
  mkdirSync(join(getDataDir(deps.env), 'workspaces'), { recursive: true });
  writeFileSync(configPath, `${JSON.stringify(starterAgentsFile(), null, 2)}\n`, 'utf-8');

  deps.io.out(chalk.green.bold(`Config created at ${configPath}`));
  deps.io.out('Edit it to register your agents, then run `skein agents` to verify.');
  return 0;
}
