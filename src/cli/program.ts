import { Command } from 'commander';
import { confirm } from '@inquirer/prompts';
import {
  agentsCommand,
  handleRequest,
  initCommand,
  installCommand,
  listSkillsCommand,
  uninstallCommand,
  type CliDeps,
} from './commands.js';
import { interactiveMode } from './interactive.js';

interface GlobalOptions {
  agent?: string;
  dryRun?: boolean;
  verbose?: boolean;
}

export const VERSION = '0.1.0';

export interface ProgramOptions {
  /** Whether stdin is a terminal; no-argument runs go interactive only then */
  interactive?: boolean;
  onExit: (code: number) => void;
}

/**
 * Build the command tree. A request that is not a subcommand name is routed
 * to a skill.
 */
export function createProgram(deps: CliDeps, options: ProgramOptions): Command {
  const program = new Command();
  const withConfirm: CliDeps = {
    ...deps,
    confirm: deps.confirm ?? ((message) => confirm({ message, default: false })),
  };

  program
    .name('skein')
    .description('Route natural-language requests to skills and execute them with a tool-calling model')
    .version(VERSION)
    .argument('[request...]', 'natural-language request')
    .option('-a, --agent <name>', 'agent to use (overrides the default)')
    .option('--dry-run', 'show the matched skill without executing')
    .option('-v, --verbose', 'show routing details')
    .action(async (request: string[]) => {
      const opts = program.opts<GlobalOptions>();

      if (request.length === 0) {
        if (options.interactive && !opts.agent && !opts.dryRun && !opts.verbose) {
          options.onExit(await interactiveMode(withConfirm));
          return;
        }
        program.outputHelp();
        return;
      }

      options.onExit(
        await handleRequest(request.join(' '), { agent: opts.agent, dryRun: opts.dryRun, verbose: opts.verbose }, withConfirm)
      );
    });

  program
    .command('list-skills')
    .description('List available skills for an agent')
    .option('-a, --agent <name>', 'agent to list skills for')
    .action(async (cmdOptions: { agent?: string }) => {
      options.onExit(await listSkillsCommand(cmdOptions.agent ?? program.opts<GlobalOptions>().agent, withConfirm));
    });

  program
    .command('agents')
    .description('List all registered agents')
    .action(async () => {
      options.onExit(await agentsCommand(withConfirm));
    });

  program
    .command('install <path>')
    .description('Install an agent pack from a local directory')
    .action(async (path: string) => {
      options.onExit(await installCommand(path, withConfirm));
    });

  program
    .command('uninstall <name>')
    .description('Uninstall an agent and remove its skills')
    .option('-y, --yes', 'skip the confirmation prompt')
    .action(async (name: string, cmdOptions: { yes?: boolean }) => {
      options.onExit(await uninstallCommand(name, cmdOptions.yes ?? false, withConfirm));
    });

  program
    .command('init')
    .description('Create a starter agents.json in the config directory')
    .action(() => {
      options.onExit(initCommand(withConfirm));
    });

  return program;
}
