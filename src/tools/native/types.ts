/**
 * Native Tool Interface
 *
 * Defines the contract for built-in tools. Results are always text; a failed
 * execution carries its message in `error`.
 */

export interface NativeToolResult {
  success: boolean;
  output?: string;
  error?: string;
}

export interface NativeTool {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: Record<string, unknown>;

  execute(params: Record<string, unknown>): Promise<NativeToolResult>;
}
