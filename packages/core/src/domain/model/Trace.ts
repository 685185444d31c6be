import type { FixedRecord } from './FixedRecord.js';

/**
 * One input record's journey: `pipePoints[0]` holds the input record and
 * `pipePoints[k]` what left stage `k`. Always `stageCount + 1` entries; an
 * entry is empty once the record has been filtered out.
 */
export interface RecordTrace {
  readonly recordIndex: number;
  readonly input: FixedRecord;
  readonly pipePoints: readonly (readonly FixedRecord[])[];
}

/**
 * The end-of-input emission of one stage and its way downstream.
 *
 * `pipePoints[0]` is the emission itself (global pipe point `stageIndex + 1`);
 * each later entry is what left the next stage, up to the last pipe point.
 */
export interface FlushTrace {
  readonly stageIndex: number;
  readonly pipePoints: readonly (readonly FixedRecord[])[];
}

/** Everything the debugger needs to replay one record-at-a-time execution. */
export interface ExecutionTrace {
  /** One label per stage, e.g. `FILTER 18,10 = "SALES"`. */
  readonly stageLabels: readonly string[];
  readonly recordTraces: readonly RecordTrace[];
  readonly flushTraces: readonly FlushTrace[];
  readonly output: readonly FixedRecord[];
}

/** Global pipe-point index of entry `offset` of a flush trace. */
export function flushPipePoint(flush: FlushTrace, offset: number): number {
  return flush.stageIndex + 1 + offset;
}

/** Number of pipe points in a trace (stages + 1). */
export function pipePointCount(trace: ExecutionTrace): number {
  return trace.stageLabels.length + 1;
}
