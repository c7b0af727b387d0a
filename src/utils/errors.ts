// Error taxonomy for setup and run failures.
// Tool failures are not errors here: they become tool results.

export enum ErrorCode {
  CONFIG = 'config',
  CREDENTIALS = 'credentials',
  MCP_CONNECT = 'mcp_connect',
  NOT_FOUND = 'not_found',
  PROVIDER = 'provider',
  INTERRUPTED = 'interrupted',
}

export class SkeinError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'SkeinError';
  }

  static config(message: string, details?: unknown): SkeinError {
    return new SkeinError(ErrorCode.CONFIG, message, details);
  }

  static credentials(message: string): SkeinError {
    return new SkeinError(ErrorCode.CREDENTIALS, message);
  }

  static mcpConnect(message: string, details?: unknown): SkeinError {
    return new SkeinError(ErrorCode.MCP_CONNECT, message, details);
  }

  static notFound(message: string): SkeinError {
    return new SkeinError(ErrorCode.NOT_FOUND, message);
  }

  static provider(message: string, details?: unknown): SkeinError {
    return new SkeinError(ErrorCode.PROVIDER, message, details);
  }

  static interrupted(): SkeinError {
    return new SkeinError(ErrorCode.INTERRUPTED, 'Interrupted');
  }
}

export function isSkeinError(error: unknown): error is SkeinError {
  return error instanceof SkeinError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
