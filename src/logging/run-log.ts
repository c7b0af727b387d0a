/**
 * Run log - one JSON object per line in `<dataDir>/logs/YYYY-MM-DD.jsonl`
 *
 * Writing is best effort: a failed append is warned about and the run goes
 * on.
 */

import { appendFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { v4 as uuid } from 'uuid';
import type { ConversationMessage } from '../llm/types.js';
import { getDataDir } from '../config/paths.js';
import { errorMessage } from '../utils/errors.js';

export interface SkillStartEntry {
  skill: string;
  provider: string;
  model: string;
  hasMcp: boolean;
}

export interface SkillEndEntry {
  durationS: number;
  rounds: number;
  toolCalls: number;
  truncated: boolean;
  error: string | null;
  messages: ConversationMessage[];
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/** Local calendar date, `YYYY-MM-DD` */
export function formatLocalDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** ISO-8601 timestamp in local time with its UTC offset */
export function formatLocalTimestamp(date: Date): string {
  const offsetMinutes = -date.getTimezoneOffset();
  const sign = offsetMinutes >= 0 ? '+' : '-';
  const absolute = Math.abs(offsetMinutes);
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)}`;
  return `${formatLocalDate(date)}T${time}${sign}${pad(Math.floor(absolute / 60))}:${pad(absolute % 60)}`;
}

export class RunLogger {
  readonly runId: string = uuid();

  constructor(
    private readonly logDir: string = join(getDataDir(), 'logs'),
    private readonly now: () => Date = () => new Date()
  ) {}

  /** Today's log file */
  get logPath(): string {
    return join(this.logDir, `${formatLocalDate(this.now())}.jsonl`);
  }

  skillStart(entry: SkillStartEntry): void {
    this.append('skill_start', {
      skill: entry.skill,
      provider: entry.provider,
      model: entry.model,
      has_mcp: entry.hasMcp,
    });
  }

  toolCall(tool: string, isError: boolean): void {
    this.append('tool_call', { tool, is_error: isError });
  }

  skillEnd(entry: SkillEndEntry): void {
    this.append('skill_end', {
      duration_s: Math.round(entry.durationS * 100) / 100,
      rounds: entry.rounds,
      tool_calls: entry.toolCalls,
      truncated: entry.truncated,
      error: entry.error,
      messages: entry.messages,
    });
  }

  private append(event: string, fields: Record<string, unknown>): void {
    const line = JSON.stringify({
      ts: formatLocalTimestamp(this.now()),
      event,
      run_id: this.runId,
      ...fields,
    });

    try {
      mkdirSync(this.logDir, { recursive: true });
      appendFileSync(this.logPath, `${line}\n`, 'utf-8');
    } catch (error) {
      console.warn(`[RunLog] Failed to write ${event}: ${errorMessage(error)}`);
    }
  }
}
