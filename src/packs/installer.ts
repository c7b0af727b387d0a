import { existsSync } from 'fs';
import { cp, mkdir, rm } from 'fs/promises';
import { dirname, join, resolve } from 'path';
import { getSkillsHome } from '../config/paths.js';
import { countSkills } from '../skills/parser.js';
import { SkeinError } from '../utils/errors.js';
import { PACK_SKILLS_DIR, isValidAgentName, readPackManifest } from './manifest.js';

export interface InstallResult {
  agentName: string;
  skillCount: number;
  installPath: string;
}

/** Refuse to touch anything that is not a direct child of the skills home. */
function assertInsideSkillsHome(agentDir: string, skillsHome: string): void {
  if (dirname(resolve(agentDir)) !== resolve(skillsHome)) {
    throw SkeinError.config(`Refusing to modify ${agentDir}: not a directory directly under ${skillsHome}`);
  }
}

/**
 * Copy a pack directory into the skills home as `<skillsHome>/<name>`,
 * replacing any previous install of the same agent.
 */
export async function installAgent(packDir: string, env: NodeJS.ProcessEnv = process.env): Promise<InstallResult> {
  const source = resolve(packDir);
  if (!existsSync(source)) {
    throw SkeinError.notFound(`Pack directory not found: ${source}`);
  }

  const manifest = readPackManifest(source, env);
  const skillsHome = getSkillsHome(env);
  const installPath = join(skillsHome, manifest.name);
  assertInsideSkillsHome(installPath, skillsHome);

  if (existsSync(installPath)) {
    await rm(installPath, { recursive: true, force: true });
  }
  await mkdir(skillsHome, { recursive: true });
  await cp(source, installPath, { recursive: true });

  return {
    agentName: manifest.name,
    skillCount: await countSkills(join(installPath, PACK_SKILLS_DIR)),
    installPath,
  };
}

export async function uninstallAgent(agentName: string, env: NodeJS.ProcessEnv = process.env): Promise<void> {
  const skillsHome = getSkillsHome(env);
  const agentDir = join(skillsHome, agentName);

  if (!isValidAgentName(agentName) || !existsSync(agentDir)) {
    throw SkeinError.notFound(`Agent '${agentName}' not found in ${skillsHome}`);
  }
  assertInsideSkillsHome(agentDir, skillsHome);

  await rm(agentDir, { recursive: true, force: true });
}
