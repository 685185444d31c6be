import type { FixedRecord } from '../model/FixedRecord.js';
import type { Pipeline } from '../model/Pipeline.js';
import { BatchExecutor } from './BatchExecutor.js';
import { RecordAtATimeExecutor } from './RecordAtATimeExecutor.js';

/** Which evaluation strategy runs a pipeline. */
export type ExecutorKind = 'batch' | 'rat';

/** End-of-input emission of one stage. */
export interface FlushSummary {
  readonly stageIndex: number;
  readonly label: string;
  readonly emitted: number;
}

/** Records that left the last stage, in order, plus what each stage flushed. */
export interface ExecutionResult {
  readonly output: readonly FixedRecord[];
  readonly flushes: readonly FlushSummary[];
}

/** Runs one pipeline over an already-materialized record sequence. */
export interface PipelineExecutor {
  readonly kind: ExecutorKind;
  execute(records: readonly FixedRecord[], pipeline: Pipeline): ExecutionResult;
}

/** Build a fresh executor of the given kind. */
export function createExecutor(kind: ExecutorKind): PipelineExecutor {
  return kind === 'batch' ? new BatchExecutor() : new RecordAtATimeExecutor();
}
