const WEEKDAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** `YYYY-MM-DD HH:MM (Weekday)` in local time */
export function formatDateTime(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())} (${WEEKDAYS[date.getDay()]})`
  );
}

/**
 * The first user turn: skill body, the current date/time and, when given,
 * the user's request below a separator.
 */
export function buildPrompt(skillBody: string, userRequest?: string, now: Date = new Date()): string {
  let prompt = `${skillBody}\n\nCurrent date/time: ${formatDateTime(now)}`;
  if (userRequest) {
    prompt += `\n\n---\nUser request: ${userRequest}`;
  }
  return prompt;
}

export function buildToolSystemPrompt(workingDir: string, hasScripts: boolean): string {
  const lines = [
    'You are an autonomous agent executing a skill. Follow the instructions in the user message.',
    `Your working directory is ${workingDir}. Relative file paths resolve against it.`,
    'You can call tools: write_file, read_file and list_directory for files, fetch_url to download a web page, and run_command to run shell commands.',
  ];
  if (hasScripts) {
    lines.push('run_command starts in the skill\'s script directory, so helper scripts there can be run by name.');
  }
  lines.push(
    'Any additional tools listed are provided by external servers.',
    'Use tools when they help complete the task. When the task is finished, reply with a short summary of what you did and do not call any more tools.'
  );
  return lines.join('\n');
}

export const PLAIN_SYSTEM_PROMPT =
  'You are an autonomous agent executing a skill. Follow the instructions in the user message and reply with the result.';
