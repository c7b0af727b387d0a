export type { NativeTool, NativeToolResult } from './types.js';
export { WriteFileTool, ReadFileTool, ListDirectoryTool } from './files.js';
export { FetchUrlTool } from './fetch-url.js';
export { RunCommandTool, formatCommandOutput, DEFAULT_COMMAND_TIMEOUT_MS, type RunCommandOptions } from './run-command.js';

import type { NativeTool } from './types.js';
import { WriteFileTool, ReadFileTool, ListDirectoryTool } from './files.js';
import { FetchUrlTool } from './fetch-url.js';
import { RunCommandTool, type RunCommandOptions } from './run-command.js';

/** The fixed built-in catalog, in declaration order. */
export function createBuiltinTools(options: RunCommandOptions): NativeTool[] {
  return [
    new WriteFileTool(options.workingDir),
    new ReadFileTool(options.workingDir),
    new ListDirectoryTool(options.workingDir),
    new FetchUrlTool(),
    new RunCommandTool(options),
  ];
}
