/**
 * Skill Types
 *
 * A skill is a directory holding a SKILL.md file: optional YAML frontmatter
 * (only `description` is read) followed by markdown instructions.
 */

export interface Skill {
  /** Skill identifier, the directory name */
  name: string;
  /** What the skill does, from frontmatter; `(no description)` when absent */
  description: string;
  /** Markdown instructions after the frontmatter */
  body: string;
  /** Absolute path to SKILL.md */
  filePath: string;
}

export const NO_DESCRIPTION = '(no description)';
