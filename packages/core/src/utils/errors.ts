/**
 * Error types for fatal run failures
 *
 * Per-task log failures are never thrown; only pod discovery and pattern
 * compilation abort a run.
 */

/**
 * Thrown when a kubectl invocation used for discovery fails
 */
export class ExternalToolError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode: number,
    public readonly stderr: string = ''
  ) {
    super(message);
    this.name = 'ExternalToolError';
  }
}

/**
 * Thrown when a pod name pattern is not a valid regular expression
 */
export class PatternCompileError extends Error {
  constructor(
    message: string,
    public readonly pattern: string
  ) {
    super(message);
    this.name = 'PatternCompileError';
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
