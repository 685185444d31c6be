import type { FixedRecord } from '../model/FixedRecord.js';
import type { Pipeline } from '../model/Pipeline.js';
import type { ExecutionTrace, FlushTrace, RecordTrace } from '../model/Trace.js';
import type { ExecutionResult, FlushSummary, PipelineExecutor } from './executors.js';
import { StageChain } from './StageChain.js';

/** Result of a record-at-a-time run with its pipe-point trace. */
export interface TracedExecution extends ExecutionResult {
  readonly trace: ExecutionTrace;
}

/**
 * Record-at-a-time evaluation: one input record and all of its descendants
 * leave the last stage before the next input record is admitted. After the
 * last record, stages flush in declaration order and each emission is
 * threaded through the remaining stages like any other record.
 *
 * Produces the same output, in the same order, as `BatchExecutor`.
 */
export class RecordAtATimeExecutor implements PipelineExecutor {
  readonly kind = 'rat' as const;

  execute(records: readonly FixedRecord[], pipeline: Pipeline): ExecutionResult {
    const { output, flushes } = this.run(records, pipeline, false);
    return { output, flushes };
  }

  /** Execute and keep every pipe point of every record and flush. */
  trace(records: readonly FixedRecord[], pipeline: Pipeline): TracedExecution {
    return this.run(records, pipeline, true);
  }

  private run(records: readonly FixedRecord[], pipeline: Pipeline, keepTrace: boolean): TracedExecution {
    const chain = new StageChain(pipeline.stages);
    const labels = chain.labels;
    const output: FixedRecord[] = [];
    const recordTraces: RecordTrace[] = [];
    const flushTraces: FlushTrace[] = [];
    const flushes: FlushSummary[] = [];

    records.forEach((input, recordIndex) => {
      const pipePoints: FixedRecord[][] = [];
      const exited = chain.thread([input], 0, keepTrace ? (_, at) => pipePoints.push([...at]) : undefined);
      output.push(...exited);
      if (keepTrace) recordTraces.push({ recordIndex, input, pipePoints });
    });

    for (let stageIndex = 0; stageIndex < chain.length; stageIndex++) {
      const emitted = chain.endOfInput(stageIndex);
      if (emitted.length === 0) continue;

      flushes.push({ stageIndex, label: labels[stageIndex] ?? '', emitted: emitted.length });
      const pipePoints: FixedRecord[][] = [];
      const exited = chain.thread(emitted, stageIndex + 1, keepTrace ? (_, at) => pipePoints.push([...at]) : undefined);
      output.push(...exited);
      if (keepTrace) flushTraces.push({ stageIndex, pipePoints });
    }

    return {
      output,
      flushes,
      trace: { stageLabels: labels, recordTraces, flushTraces, output },
    };
  }
}

