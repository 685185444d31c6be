import { PipelineError } from './PipelineError.js';

/** An input line cannot become an 80-byte record: too long, or carries a non-ASCII character. */
export class RecordFormatError extends PipelineError {
  /** 1-based input line, when the record came from text input. */
  readonly line?: number;

  constructor(reason: string, options?: { line?: number; length?: number; character?: string }) {
    const prefix = options?.line !== undefined ? `Input line ${String(options.line)}: ` : '';
    super(`${prefix}${reason}`, {
      code: 'RECORD_FORMAT',
      details: { line: options?.line, length: options?.length, character: options?.character },
    });
    this.line = options?.line;
  }
}
