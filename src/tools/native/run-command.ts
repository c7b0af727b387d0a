/**
 * Run Command Tool
 *
 * Runs a shell command with the companion script directory (or the working
 * directory) as cwd. stderr is reported even when the command succeeds.
 */

import { spawn } from 'child_process';
import { z } from 'zod';
import type { NativeTool, NativeToolResult } from './types.js';
import { parseParams } from './params.js';
import { errorMessage } from '../../utils/errors.js';

export const DEFAULT_COMMAND_TIMEOUT_MS = 60_000;

const RunCommandParams = z.object({
  command: z.string().min(1),
});

export interface RunCommandOptions {
  workingDir: string;
  /** Directory holding the skill's helper scripts; used as cwd when set */
  companionDir?: string;
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
  /** Aborting kills the running command and its process group */
  signal?: AbortSignal;
}

interface ProcessOutcome {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  interrupted?: boolean;
}

/** Compose the tool text: stdout, then stderr and exit status notes. */
export function formatCommandOutput(outcome: ProcessOutcome, timeoutMs: number): NativeToolResult {
  const sections: string[] = [];
  if (outcome.stdout) {
    sections.push(outcome.stdout);
  }
  if (outcome.stderr) {
    sections.push(`[stderr]\n${outcome.stderr}`);
  }

  if (outcome.interrupted) {
    sections.push('[command interrupted]');
    return { success: false, error: sections.join('\n') };
  }
  if (outcome.timedOut) {
    sections.push(`[command timed out after ${timeoutMs / 1000}s]`);
    return { success: false, error: sections.join('\n') };
  }
  if (outcome.exitCode !== 0) {
    sections.push(`[exit code: ${outcome.exitCode}]`);
    return { success: false, error: sections.join('\n') };
  }
  return { success: true, output: sections.length > 0 ? sections.join('\n') : '(no output)' };
}

export class RunCommandTool implements NativeTool {
  readonly name = 'run_command';
  readonly description = 'Run a shell command. Runs in the skill\'s script directory when it has one, otherwise in the working directory. Returns stdout, stderr and the exit code on failure.';

  readonly inputSchema = {
    type: 'object',
    properties: {
      command: { type: 'string', description: 'The shell command to run' },
    },
    required: ['command'],
  };

  private readonly cwd: string;
  private readonly timeoutMs: number;
  private readonly env: NodeJS.ProcessEnv;
  private readonly signal?: AbortSignal;

  constructor(options: RunCommandOptions) {
    this.cwd = options.companionDir ?? options.workingDir;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    this.env = options.env ?? process.env;
    this.signal = options.signal;
  }

  async execute(params: Record<string, unknown>): Promise<NativeToolResult> {
    const parsed = parseParams(RunCommandParams, params);
    if (!parsed.ok) {
      return { success: false, error: parsed.error };
    }

    if (this.signal?.aborted) {
      return { success: false, error: '[command interrupted]' };
    }

    try {
      const outcome = await this.runProcess(parsed.value.command);
      return formatCommandOutput(outcome, this.timeoutMs);
    } catch (error) {
      return { success: false, error: errorMessage(error) };
    }
  }

  private runProcess(command: string): Promise<ProcessOutcome> {
    return new Promise((resolve, reject) => {
      // Own process group so a timeout can take down the shell's children too
      const proc = spawn(command, {
        cwd: this.cwd,
        env: this.env,
        shell: true,
        detached: process.platform !== 'win32',
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      let settled = false;

      const stop = (reason: 'timedOut' | 'interrupted') => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        this.signal?.removeEventListener('abort', onAbort);
        killTree(proc.pid, () => proc.kill('SIGKILL'));
        resolve({
          exitCode: -1,
          stdout: stdout.trimEnd(),
          stderr: stderr.trimEnd(),
          timedOut: reason === 'timedOut',
          interrupted: reason === 'interrupted',
        });
      };
      const onAbort = () => stop('interrupted');

      const timer = setTimeout(() => stop('timedOut'), this.timeoutMs);
      this.signal?.addEventListener('abort', onAbort, { once: true });

      // Decode per stream so multi-byte characters split across chunks survive
      proc.stdout.setEncoding('utf8');
      proc.stderr.setEncoding('utf8');

      proc.stdout.on('data', (data: string) => {
        stdout += data;
      });

      proc.stderr.on('data', (data: string) => {
        stderr += data;
      });

      proc.on('error', (error) => {
        clearTimeout(timer);
        this.signal?.removeEventListener('abort', onAbort);
        if (!settled) {
          settled = true;
          reject(error);
        }
      });

      proc.on('close', (code) => {
        clearTimeout(timer);
        this.signal?.removeEventListener('abort', onAbort);
        if (!settled) {
          settled = true;
          resolve({ exitCode: code ?? 1, stdout: stdout.trimEnd(), stderr: stderr.trimEnd(), timedOut: false });
        }
      });
    });
  }
}

function killTree(pid: number | undefined, fallback: () => void): void {
  if (pid === undefined || process.platform === 'win32') {
    fallback();
    return;
  }
  try {
    process.kill(-pid, 'SIGKILL');
  } catch {
    fallback();
  }
}
