import { existsSync, readFileSync, mkdirSync } from 'fs';
import { homedir } from 'os';
import { join, resolve } from 'path';
import { parse } from 'dotenv';

/** Environment mapping handed to provider selection and header interpolation */
export type Environment = Record<string, string | undefined>;

/**
 * Merge an optional dotenv file over the process environment.
 * File values win; a missing file yields a copy of the process environment.
 */
export function loadEnv(envPath?: string, base: NodeJS.ProcessEnv = process.env): Environment {
  const env: Environment = { ...base };

  if (!envPath || !existsSync(envPath)) {
    return env;
  }

  const parsed = parse(readFileSync(envPath, 'utf-8'));
  return { ...env, ...parsed };
}

/** Expand a leading `~` to the home directory. */
export function expandHome(path: string): string {
  if (path === '~') {
    return homedir();
  }
  if (path.startsWith('~/')) {
    return join(homedir(), path.slice(2));
  }
  return path;
}

/**
 * Resolve a working directory: `~` expands, `.` means the current directory.
 * The directory is created when missing.
 */
export function resolveWorkingDir(dir: string, options: { create?: boolean } = {}): string {
  const resolved = dir === '.' ? process.cwd() : resolve(expandHome(dir));
  if (options.create && !existsSync(resolved)) {
    mkdirSync(resolved, { recursive: true });
  }
  return resolved;
}
