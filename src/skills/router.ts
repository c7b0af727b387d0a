import type { LLMProvider } from '../llm/types.js';
import type { Skill } from './types.js';

const ROUTER_SYSTEM_PROMPT =
  'You are a skill router. Given a list of available skills and a user request, ' +
  'respond with ONLY the skill name that best matches the request. ' +
  'If no skill matches, respond with NONE. ' +
  'Do not include any explanation, punctuation, or preamble. Answer with the skill name or NONE.';

/**
 * Case-insensitive substring match of skill names against the request.
 * Longer names are tried first so `weekly-review` beats `review`.
 */
export function keywordMatch(input: string, skills: Skill[]): Skill | null {
  const lowered = input.toLowerCase();
  const byLength = [...skills].sort((a, b) => b.name.length - a.name.length);
  return byLength.find((skill) => lowered.includes(skill.name.toLowerCase())) ?? null;
}

/** Ask the model to pick a skill by name. */
export async function llmRoute(input: string, skills: Skill[], provider: LLMProvider): Promise<Skill | null> {
  if (skills.length === 0) {
    return null;
  }

  const manifest = skills.map((s) => `- ${s.name}: ${s.description}`).join('\n');
  const userMessage = `Available skills:\n${manifest}\n\nUser request: ${input}`;

  let answer = '';
  for await (const event of provider.streamCompletion(
    ROUTER_SYSTEM_PROMPT,
    [{ role: 'user', content: userMessage }],
    undefined,
    64
  )) {
    if (event.type === 'text') {
      answer += event.text;
    }
  }

  const skillName = answer.trim();
  if (!skillName || skillName === 'NONE') {
    return null;
  }
  return skills.find((s) => s.name === skillName) ?? null;
}

export type RouteMatch =
  | { skill: Skill; method: 'keyword' }
  | { skill: Skill; method: 'model'; provider: LLMProvider };

/**
 * Two-pass routing: keyword match, then the model. The provider is only
 * requested when the keyword pass finds nothing; null skips the model pass.
 */
export async function routeIntent(
  input: string,
  skills: Skill[],
  getProvider?: () => LLMProvider | null
): Promise<RouteMatch | null> {
  const keyword = keywordMatch(input, skills);
  if (keyword) {
    return { skill: keyword, method: 'keyword' };
  }

  const provider = getProvider?.() ?? null;
  if (!provider) {
    return null;
  }
  const skill = await llmRoute(input, skills, provider);
  return skill ? { skill, method: 'model', provider } : null;
}
