import type { FixedRecord } from '../model/FixedRecord.js';
import type { Pipeline } from '../model/Pipeline.js';
import type { ExecutionResult, FlushSummary, PipelineExecutor } from './executors.js';
import { StageChain } from './StageChain.js';

/**
 * Whole-batch evaluation: every record goes through stage 1, the full result
 * through stage 2, and so on. Stage flushes then run in declaration order,
 * each emission passing through the stages after it.
 */
export class BatchExecutor implements PipelineExecutor {
  readonly kind = 'batch' as const;

  execute(records: readonly FixedRecord[], pipeline: Pipeline): ExecutionResult {
    const chain = new StageChain(pipeline.stages);
    let current: FixedRecord[] = [...records];

    for (let index = 0; index < chain.length; index++) {
      current = chain.stepAll(index, current);
    }

    const output = current;
    const flushes: FlushSummary[] = [];
    const labels = chain.labels;

    for (let index = 0; index < chain.length; index++) {
      const emitted = chain.endOfInput(index);
      if (emitted.length === 0) continue;

      flushes.push({ stageIndex: index, label: labels[index] ?? '', emitted: emitted.length });
      let downstream = [...emitted];
      for (let next = index + 1; next < chain.length; next++) {
        downstream = chain.stepAll(next, downstream);
      }
      output.push(...downstream);
    }

    return { output, flushes };
  }
}
