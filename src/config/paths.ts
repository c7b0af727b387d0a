import { homedir } from 'os';
import { join } from 'path';

// Directory layout, each overridable through the environment

export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.SKEIN_CONFIG_DIR || join(homedir(), '.config', 'skein');
}

export function getDataDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.SKEIN_DATA_DIR || join(homedir(), '.local', 'share', 'skein');
}

/** Where installed agent packs live */
export function getSkillsHome(env: NodeJS.ProcessEnv = process.env): string {
  return env.SKEIN_SKILLS_DIR || join(homedir(), '.skills');
}

export function getAgentsConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return join(getConfigDir(env), 'agents.json');
}

export function getEnvFilePath(env: NodeJS.ProcessEnv = process.env): string {
  return join(getConfigDir(env), '.env');
}
