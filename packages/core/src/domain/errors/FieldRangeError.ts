import { PipelineError } from './PipelineError.js';

/** A field address falls outside the 80-byte record. */
export class FieldRangeError extends PipelineError {
  readonly offset: number;
  readonly length: number;

  constructor(offset: number, length: number, width: number) {
    super(`Field ${String(offset)},${String(length)} exceeds record width ${String(width)}`, {
      code: 'FIELD_RANGE',
      details: { offset, length, width },
    });
    this.offset = offset;
    this.length = length;
  }
}
