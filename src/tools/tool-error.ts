/**
 * Structured tool error taxonomy.
 * Every failure a tool raises is one of these; the registry turns them into `{ error }` payloads.
 */

export type ToolErrorCode =
  | 'validation' // Missing/malformed arguments
  | 'path_escape' // Resolved path falls outside the workspace root
  | 'io' // Read/write/permission failures
  | 'process' // Shell could not be spawned
  | 'timeout' // Process exceeded its deadline and was killed
  | 'network' // Connect failure, request timeout, bad scheme
  | 'parse' // Malformed tool-call arguments or patch specification
  | 'internal'; // Unexpected error in tool implementation

export class ToolError extends Error {
  constructor(
    public readonly code: ToolErrorCode,
    message: string,
    public readonly retryable: boolean = false,
    public readonly hint?: string
  ) {
    super(message);
    this.name = 'ToolError';
  }

  /** Message as it goes back to the model. */
  toPayloadMessage(): string {
    return this.hint ? `${this.message} (hint: ${this.hint})` : this.message;
  }

  /**
   * Create from a generic error, inferring the code from Node errno values.
   */
  static fromError(err: unknown, defaultCode: ToolErrorCode = 'internal'): ToolError {
    if (err instanceof ToolError) return err;

    const message = err instanceof Error ? err.message : String(err);
    const errno = errnoCode(err);

    if (errno === 'ENOENT' || errno === 'ENOTDIR' || errno === 'EISDIR') {
      return new IOError(message);
    }
    if (errno === 'EACCES' || errno === 'EPERM' || errno === 'EROFS' || errno === 'EEXIST') {
      return new IOError(message);
    }
    if (errno === 'ETIMEDOUT') return new NetworkError(message, true);
    if (errno === 'ECONNREFUSED' || errno === 'ECONNRESET' || errno === 'ENOTFOUND') {
      return new NetworkError(message, true);
    }
    if (err instanceof SyntaxError) return new ParseError(message);

    return new ToolError(defaultCode, message);
  }
}

export class ValidationError extends ToolError {
  constructor(message: string, hint?: string) {
    super('validation', message, false, hint);
    this.name = 'ValidationError';
  }
}

export class PathEscapeError extends ToolError {
  constructor(
    public readonly target: string,
    public readonly root: string
  ) {
    super('path_escape', `Path escapes workspace root: ${target} is outside ${root}`);
    this.name = 'PathEscapeError';
  }
}

export class IOError extends ToolError {
  constructor(message: string) {
    super('io', message);
    this.name = 'IOError';
  }
}

export class ProcessError extends ToolError {
  constructor(message: string) {
    super('process', message);
    this.name = 'ProcessError';
  }
}

export class TimeoutError extends ToolError {
  constructor(public readonly timeoutSec: number) {
    super('timeout', `timeout after ${timeoutSec}s`, true);
    this.name = 'TimeoutError';
  }
}

export class NetworkError extends ToolError {
  constructor(message: string, retryable = false) {
    super('network', message, retryable);
    this.name = 'NetworkError';
  }
}

export class ParseError extends ToolError {
  constructor(message: string) {
    super('parse', message);
    this.name = 'ParseError';
  }
}

export function errnoCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  const code = err.code;
  return typeof code === 'string' ? code : undefined;
}
