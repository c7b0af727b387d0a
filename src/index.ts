#!/usr/bin/env node
import chalk from 'chalk';
import { createProgram } from './cli/program.js';
import { consoleIO } from './cli/io.js';
import { loadEnv } from './config/env.js';
import { getEnvFilePath } from './config/paths.js';
import { ErrorCode, isSkeinError, errorMessage } from './utils/errors.js';
import { isDebugEnabled } from './utils/debug.js';

// Conventional exit status for a run stopped by a signal
const INTERRUPTED_EXIT_CODE = 130;

const env = loadEnv(getEnvFilePath());

async function main(): Promise<number> {
  const shutdown = new AbortController();
  let exitCode = 0;

  // The first signal interrupts the run and lets it close its connections;
  // a second one exits immediately
  const interrupt = (signal: NodeJS.Signals): void => {
    if (shutdown.signal.aborted) {
      process.exit(INTERRUPTED_EXIT_CODE);
    }
    console.error(`\n[Shutdown] ${signal} received, stopping...`);
    shutdown.abort();
  };

  process.on('SIGINT', interrupt);
  process.on('SIGTERM', interrupt);

  const program = createProgram(
    { env, io: consoleIO, signal: shutdown.signal },
    {
      interactive: Boolean(process.stdin.isTTY),
      onExit: (code) => {
        exitCode = code;
      },
    }
  );

  await program.parseAsync(process.argv);
  return exitCode;
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    if (isSkeinError(error) && error.code === ErrorCode.INTERRUPTED) {
      console.error(chalk.yellow('Interrupted.'));
      process.exit(INTERRUPTED_EXIT_CODE);
    }
    if (isSkeinError(error)) {
      console.error(chalk.red.bold(`Error: ${error.message}`));
      if (isDebugEnabled(env) && error.details !== undefined) {
        console.error(error.details);
      }
    } else {
      console.error(chalk.red.bold(`Fatal error: ${errorMessage(error)}`));
      if (isDebugEnabled(env)) {
        console.error(error);
      }
    }
    process.exit(1);
  });
