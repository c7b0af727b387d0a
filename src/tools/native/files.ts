/**
 * File Tools
 *
 * write_file, read_file and list_directory. Relative paths resolve against
 * the run's working directory.
 */

import { mkdir, readFile, readdir, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import { z } from 'zod';
import type { NativeTool, NativeToolResult } from './types.js';
import { parseParams } from './params.js';
import { errorMessage } from '../../utils/errors.js';

const WriteFileParams = z.object({
  path: z.string().min(1),
  content: z.string(),
});

const ReadFileParams = z.object({
  path: z.string().min(1),
});

const ListDirectoryParams = z.object({
  path: z.string().default('.'),
});

export class WriteFileTool implements NativeTool {
  readonly name = 'write_file';
  readonly description = 'Write content to a file. Creates parent directories if needed. Paths are relative to the working directory.';

  readonly inputSchema = {
    type: 'object',
    properties: {
      path: { type: 'string', description: 'File path relative to the working directory' },
      content: { type: 'string', description: 'Content to write' },
    },
    required: ['path', 'content'],
  };

  constructor(private readonly workingDir: string) {}

  async execute(params: Record<string, unknown>): Promise<NativeToolResult> {
    const parsed = parseParams(WriteFileParams, params);
    if (!parsed.ok) {
      return { success: false, error: parsed.error };
    }

    const target = resolve(this.workingDir, parsed.value.path);
    try {
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, parsed.value.content, 'utf-8');
      return { success: true, output: `Wrote ${parsed.value.content.length} characters to ${parsed.value.path}` };
    } catch (error) {
      return { success: false, error: errorMessage(error) };
    }
  }
}

export class ReadFileTool implements NativeTool {
  readonly name = 'read_file';
  readonly description = 'Read the contents of a file. Paths are relative to the working directory.';

  readonly inputSchema = {
    type: 'object',
    properties: {
      path: { type: 'string', description: 'File path relative to the working directory' },
    },
    required: ['path'],
  };

  constructor(private readonly workingDir: string) {}

  async execute(params: Record<string, unknown>): Promise<NativeToolResult> {
    const parsed = parseParams(ReadFileParams, params);
    if (!parsed.ok) {
      return { success: false, error: parsed.error };
    }

    try {
      const content = await readFile(resolve(this.workingDir, parsed.value.path), 'utf-8');
      return { success: true, output: content };
    } catch (error) {
      return { success: false, error: errorMessage(error) };
    }
  }
}

export class ListDirectoryTool implements NativeTool {
  readonly name = 'list_directory';
  readonly description = 'List files and directories. Directories are marked with a trailing slash.';

  readonly inputSchema = {
    type: 'object',
    properties: {
      path: {
        type: 'string',
        description: 'Directory path relative to the working directory (default: ".")',
      },
    },
  };

  constructor(private readonly workingDir: string) {}

  async execute(params: Record<string, unknown>): Promise<NativeToolResult> {
    const parsed = parseParams(ListDirectoryParams, params);
    if (!parsed.ok) {
      return { success: false, error: parsed.error };
    }

    try {
      const entries = await readdir(resolve(this.workingDir, parsed.value.path), { withFileTypes: true });
      const names = entries
        .map((entry) => (entry.isDirectory() ? `${entry.name}/` : entry.name))
        .sort((a, b) => a.localeCompare(b));
      return { success: true, output: names.join('\n') };
    } catch (error) {
      return { success: false, error: errorMessage(error) };
    }
  }
}
