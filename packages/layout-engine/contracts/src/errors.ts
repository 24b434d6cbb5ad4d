export type PipelineErrorCode =
  | 'TRANSPORT_ERROR'
  | 'PARSE_ERROR'
  | 'FONT_UNAVAILABLE'
  | 'INVALID_CONFIG'
  | 'INVARIANT_VIOLATION';

/**
 * Error raised anywhere in the fetch → parse → layout → paint pipeline.
 * A load that throws one of these leaves the previous display list in place.
 */
export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly details?: unknown;

  constructor(code: PipelineErrorCode, message: string, details?: unknown) {
    super(message);
    Object.setPrototypeOf(this, PipelineError.prototype);
    this.name = 'PipelineError';
    this.code = code;
    this.details = details;
  }
}

export function toPipelineError(error: unknown, fallbackCode: PipelineErrorCode = 'TRANSPORT_ERROR'): PipelineError {
  if (error instanceof PipelineError) return error;

  if (error instanceof Error) {
    return new PipelineError(fallbackCode, error.message, {
      name: error.name,
    });
  }

  return new PipelineError(fallbackCode, 'Unknown error', {
    error,
  });
}
