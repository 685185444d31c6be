import { PipelineError } from './PipelineError.js';

/** A `<` source or `>` sink could not be read or written. */
export class RecordStoreError extends PipelineError {
  readonly path: string;

  constructor(path: string, operation: 'read' | 'write', cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super(`Cannot ${operation} records at '${path}'${reason}`, {
      code: 'RECORD_STORE',
      details: { path, operation },
      cause,
    });
    this.path = path;
  }
}
