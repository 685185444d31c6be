/** Extra structured context attached to a pipeline error. */
export interface PipelineErrorDetails {
  readonly [key: string]: unknown;
}

/** Machine-readable error codes. */
export type PipelineErrorCode = 'PARSE_ERROR' | 'RECORD_FORMAT' | 'FIELD_RANGE' | 'STAGE_ERROR' | 'RECORD_STORE';

/**
 * Base class for every error the engine raises.
 *
 * All failures are fatal to the current run; nothing is retried.
 */
export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly details?: PipelineErrorDetails;

  constructor(message: string, options: { code: PipelineErrorCode; details?: PipelineErrorDetails; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = options.code;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/** Narrow an unknown thrown value to a `PipelineError`. */
export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}
