import { PipelineError, type PipelineErrorCode } from '@linewright/contracts';

export type CliErrorCode =
  | 'INVALID_ARGUMENT'
  | 'MISSING_REQUIRED'
  | 'UNKNOWN_COMMAND'
  | 'COMMAND_FAILED'
  // Passed through from the layout pipeline
  | PipelineErrorCode;

/** Exit code for usage mistakes. */
export const EXIT_USAGE = 1;
/** Exit code for a document that could not be fetched, parsed or laid out. */
export const EXIT_PIPELINE = 2;

export class CliError extends Error {
  readonly code: CliErrorCode;
  readonly details?: unknown;
  readonly exitCode: number;

  constructor(code: CliErrorCode, message: string, details?: unknown, exitCode = EXIT_USAGE) {
    super(message);
    Object.setPrototypeOf(this, CliError.prototype);
    this.name = 'CliError';
    this.code = code;
    this.details = details;
    this.exitCode = exitCode;
  }
}

export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) return error;

  if (error instanceof PipelineError) {
    return new CliError(error.code, error.message, error.details, EXIT_PIPELINE);
  }

  if (error instanceof Error) {
    return new CliError('COMMAND_FAILED', error.message, {
      name: error.name,
    });
  }

  return new CliError('COMMAND_FAILED', 'Unknown error', {
    error,
  });
}
