import { readFile, readdir, stat } from 'fs/promises';
import { join } from 'path';
import type { Skill } from './types.js';
import { NO_DESCRIPTION } from './types.js';

export const SKILL_FILE = 'SKILL.md';

/**
 * Split SKILL.md content into its frontmatter description and body.
 * Content without frontmatter is returned whole as the body.
 */
export function parseSkillContent(content: string): { description: string; body: string } {
  const match = content.trim().match(/^---\r?\n([\s\S]*?)\r?\n---(?:\r?\n|$)([\s\S]*)$/);
  if (!match) {
    return { description: NO_DESCRIPTION, body: content };
  }

  const [, frontmatter, body] = match;
  let description = NO_DESCRIPTION;

  for (const line of frontmatter.split(/\r?\n/)) {
    const keyMatch = line.match(/^\s*description:\s*(.*)$/);
    if (keyMatch) {
      let value = keyMatch[1].trim();
      // Handle quoted strings
      if (value.length >= 2 && (value[0] === '"' || value[0] === "'") && value.endsWith(value[0])) {
        value = value.slice(1, -1);
      }
      description = value || NO_DESCRIPTION;
      break;
    }
  }

  return { description, body: body.trim() };
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (error) {
    if (isMissing(error)) return false;
    throw error;
  }
}

/**
 * Find every `<dir>/SKILL.md` directly under `skillsDir`, sorted by name.
 * A missing directory yields no skills.
 */
export async function discoverSkills(skillsDir: string): Promise<Skill[]> {
  let entries;
  try {
    entries = await readdir(skillsDir, { withFileTypes: true });
  } catch (error) {
    if (isMissing(error)) return [];
    throw error;
  }

  const skills: Skill[] = [];
  for (const entry of entries) {
    if (!entry.isDirectory()) continue;

    const filePath = join(skillsDir, entry.name, SKILL_FILE);
    if (!(await isFile(filePath))) continue;

    const { description, body } = parseSkillContent(await readFile(filePath, 'utf-8'));
    skills.push({ name: entry.name, description, body, filePath });
  }

  return skills.sort((a, b) => a.name.localeCompare(b.name));
}

export async function countSkills(skillsDir: string): Promise<number> {
  return (await discoverSkills(skillsDir)).length;
}
