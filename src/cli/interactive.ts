import { select } from '@inquirer/prompts';
import chalk from 'chalk';
import { countSkills, discoverSkills } from '../skills/parser.js';
import { loadRegistry, runSkill, type CliDeps } from './commands.js';
import type { AgentRegistry } from '../config/agents.js';
import { isSkeinError } from '../utils/errors.js';

type RunChoice = 'run' | 'dry-run' | 'quit';

function isPromptCancel(error: unknown): boolean {
  return error instanceof Error && (error.name === 'ExitPromptError' || error.name === 'AbortPromptError');
}

/**
 * Browse agents and skills with arrow-key menus, then run or dry-run the
 * chosen skill.
 */
export async function interactiveMode(deps: CliDeps): Promise<number> {
  const { io } = deps;

  let registry: AgentRegistry;
  try {
    registry = loadRegistry(deps.env);
  } catch (error) {
    if (isSkeinError(error)) {
      io.err(`${chalk.red.bold('No agents found.')} Run \`skein init\` then \`skein install <path>\` to add agents.`);
      return 1;
    }
    throw error;
  }

  const agents = [...registry.agents.values()].sort((a, b) => a.name.localeCompare(b.name));
  if (agents.length === 0) {
    io.err(`${chalk.red.bold('No agents found.')} Run \`skein install <path>\` to add one.`);
    return 1;
  }

  try {
    const agentChoices: Array<{ name: string; value: string; description?: string }> = [];
    for (const agent of agents) {
      const count = await countSkills(agent.skillsDir);
      agentChoices.push({
        name: `${agent.name} (${count} skills)`,
        value: agent.name,
        description: agent.description || undefined,
      });
    }

    const agentName = await select({ message: 'Select agent:', choices: agentChoices, loop: true });
    const agent = registry.agents.get(agentName);
    if (!agent) {
      return 1;
    }

    const skills = await discoverSkills(agent.skillsDir);
    if (skills.length === 0) {
      io.err(chalk.red.bold(`No skills found for '${agent.name}'.`));
      return 1;
    }

    const skillName = await select({
      message: `Select skill (${agent.name}):`,
      choices: skills.map((skill) => ({ name: skill.name, value: skill.name, description: skill.description })),
      loop: true,
    });
    const skill = skills.find((s) => s.name === skillName);
    if (!skill) {
      return 1;
    }

    io.out(`${chalk.green.bold('Matched:')} agent=${agent.name}, skill=${skill.name}`);

    const action = await select<RunChoice>({
      message: 'Run?',
      choices: [
        { name: 'Execute', value: 'run' },
        { name: 'Dry run', value: 'dry-run' },
        { name: 'Quit', value: 'quit' },
      ],
    });

    switch (action) {
      case 'run':
        return runSkill(agent, skill, deps);
      case 'dry-run':
        io.out(chalk.dim(`Dry run: would execute skill '${skill.name}' on agent '${agent.name}'`));
        return 0;
      case 'quit':
        return 0;
    }
  } catch (error) {
    if (isPromptCancel(error)) {
      return 0;
    }
    throw error;
  }
}
