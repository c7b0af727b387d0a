import chalk from 'chalk';
import type { Agent } from '../config/agents.js';
import type { Skill } from '../skills/types.js';

/** Where command output goes; stdout carries results, stderr diagnostics */
export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

export const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/** Left-aligned columns separated by two spaces, header in bold */
export function formatTable(title: string, headers: string[], rows: string[][]): string[] {
  const widths = headers.map((header, col) =>
    Math.max(header.length, ...rows.map((row) => (row[col] ?? '').length))
  );
  const render = (cells: string[]) =>
    cells.map((cell, col) => (col === cells.length - 1 ? cell : cell.padEnd(widths[col]))).join('  ');

  return [
    chalk.bold(title),
    chalk.bold(render(headers)),
    ...rows.map((row) => render(row)),
  ];
}

export function skillsTable(skills: Skill[], title: string): string[] {
  const sorted = [...skills].sort((a, b) => a.name.localeCompare(b.name));
  return formatTable(title, ['Skill', 'Description'], sorted.map((s) => [s.name, s.description]));
}

export function agentsTable(agents: Agent[], skillCounts: Map<string, number>, defaultAgent: string): string[] {
  const sorted = [...agents].sort((a, b) => a.name.localeCompare(b.name));
  return formatTable(
    'Registered Agents',
    ['Agent', 'Mode', 'Skills', 'Working Dir'],
    sorted.map((agent) => [
      agent.name === defaultAgent ? `${agent.name} *` : agent.name,
      agent.mode,
      String(skillCounts.get(agent.name) ?? 0),
      agent.workingDir,
    ])
  );
}
