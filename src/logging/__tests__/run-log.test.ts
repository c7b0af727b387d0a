import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, readFileSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { RunLogger, formatLocalDate, formatLocalTimestamp } from '../run-log.js';

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'skein-log-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

describe('formatLocalDate', () => {
  it('should zero-pad month and day', () => {
    expect(formatLocalDate(new Date(2026, 2, 4, 23, 59))).toBe('2026-03-04');
  });
});

describe('formatLocalTimestamp', () => {
  it('should carry the local time and a UTC offset', () => {
    expect(formatLocalTimestamp(new Date(2026, 9, 19, 14, 5, 7, 42))).toMatch(
      /^2026-10-19T14:05:07\.042[+-]\d{2}:\d{2}$/
    );
  });
});

describe('RunLogger', () => {
  const now = new Date(2026, 9, 19, 8, 30);

  it('should append one JSON line per event to the day file', () => {
    const logger = new RunLogger(join(dir, 'logs'), () => now);

    logger.skillStart({ skill: 'inbox', provider: 'ollama', model: 'llama3.1', hasMcp: true });
    logger.toolCall('read_file', true);
    logger.skillEnd({
      durationS: 1.23456,
      rounds: 1,
      toolCalls: 1,
      truncated: false,
      error: null,
      messages: [{ role: 'user', content: 'hi' }],
    });

    expect(logger.logPath).toBe(join(dir, 'logs', '2026-10-19.jsonl'));
    const lines = readFileSync(logger.logPath, 'utf-8').trim().split('\n').map((l) => JSON.parse(l));
    expect(lines).toHaveLength(3);
    expect(lines[0]).toMatchObject({
      event: 'skill_start',
      run_id: logger.runId,
      skill: 'inbox',
      provider: 'ollama',
      model: 'llama3.1',
      has_mcp: true,
    });
    expect(lines[1]).toMatchObject({ event: 'tool_call', tool: 'read_file', is_error: true });
    expect(lines[2]).toMatchObject({
      event: 'skill_end',
      duration_s: 1.23,
      rounds: 1,
      tool_calls: 1,
      truncated: false,
      error: null,
      messages: [{ role: 'user', content: 'hi' }],
    });
  });

  it('should give each logger its own run id', () => {
    expect(new RunLogger(dir).runId).not.toBe(new RunLogger(dir).runId);
  });

  it('should warn instead of throwing when the log cannot be written', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const blocker = join(dir, 'not-a-dir');
    writeFileSync(blocker, '');
    const logger = new RunLogger(blocker, () => now);

    expect(() => logger.toolCall('list_directory', false)).not.toThrow();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0][0])).toMatch(/^\[RunLog\] Failed to write tool_call: /);
  });
});
