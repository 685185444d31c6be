import type { FixedRecord } from '../../domain/model/FixedRecord.js';
import type { MultiPipelineSpec, Pipeline } from '../../domain/model/Pipeline.js';
import type { PipelineSummary, RunSummary } from '../../domain/events/DomainEvents.js';
import type { ExecutionTrace } from '../../domain/model/Trace.js';
import type { ExecutorKind } from '../../domain/services/executors.js';
import { createExecutor } from '../../domain/services/executors.js';
import { RecordAtATimeExecutor } from '../../domain/services/RecordAtATimeExecutor.js';
import { isPipelineError } from '../../domain/errors/PipelineError.js';
import type { EngineContext } from '../EngineContext.js';
import { PipelineFeed } from '../PipelineFeed.js';

/** Output of a multi-pipeline run. `output` is the last pipeline's output. */
export interface MultiPipelineResult {
  readonly runId: string;
  readonly output: readonly FixedRecord[];
  readonly pipelines: readonly PipelineSummary[];
  /** Record-at-a-time trace of the last pipeline, when requested. */
  readonly trace?: ExecutionTrace;
}

export interface RunPipelinesOptions {
  /** Also trace the last pipeline over its resolved input. Default: `false`. */
  readonly trace?: boolean;
}

/**
 * Use case: run every pipeline of a specification in order with one strategy.
 * Inputs and `>` sinks are resolved by a `PipelineFeed`.
 */
export class RunPipelines {
  constructor(private readonly ctx: EngineContext) {}

  execute(
    spec: MultiPipelineSpec,
    input: readonly FixedRecord[],
    kind: ExecutorKind,
    options: RunPipelinesOptions = {},
  ): MultiPipelineResult {
    const runId = crypto.randomUUID();
    const startedAt = Date.now();
    const { eventBus, logger } = this.ctx;

    eventBus.emit({
      type: 'run:started',
      runId,
      executor: kind,
      pipelineCount: spec.pipelines.length,
      inputCount: input.length,
      timestamp: startedAt,
    });

    try {
      const pipelines: PipelineSummary[] = [];
      const feed = new PipelineFeed(input, this.ctx.recordStore);
      let lastInput: readonly FixedRecord[] = input;

      for (const pipeline of spec.pipelines) {
        const records = feed.inputFor(pipeline);
        lastInput = records;
        const summary = this.runOne(runId, pipeline, records, kind);
        feed.complete(pipeline, summary.output);
        pipelines.push(summary.pipeline);
      }
      const output = feed.output;

      const summary: RunSummary = {
        executor: kind,
        inputCount: input.length,
        outputCount: output.length,
        pipelines,
        elapsedMs: Date.now() - startedAt,
      };
      logger.debug('Run completed', { runId, ...summary });
      eventBus.emit({ type: 'run:completed', runId, summary, timestamp: Date.now() });

      const last = spec.pipelines[spec.pipelines.length - 1];
      if (options.trace && last) {
        const { trace } = new RecordAtATimeExecutor().trace(lastInput, last);
        return { runId, output, pipelines, trace };
      }
      return { runId, output, pipelines };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Run failed', { runId, error: message });
      eventBus.emit({
        type: 'run:failed',
        runId,
        code: isPipelineError(error) ? error.code : undefined,
        error: message,
        timestamp: Date.now(),
      });
      throw error;
    }
  }

  private runOne(
    runId: string,
    pipeline: Pipeline,
    records: readonly FixedRecord[],
    kind: ExecutorKind,
  ): { output: readonly FixedRecord[]; pipeline: PipelineSummary } {
    const { eventBus, logger } = this.ctx;

    eventBus.emit({
      type: 'pipeline:started',
      runId,
      pipelineIndex: pipeline.index,
      stageCount: pipeline.stages.length,
      inputCount: records.length,
      timestamp: Date.now(),
    });

    const result = createExecutor(kind).execute(records, pipeline);

    for (const flush of result.flushes) {
      eventBus.emit({
        type: 'stage:flushed',
        runId,
        pipelineIndex: pipeline.index,
        stageIndex: flush.stageIndex,
        label: flush.label,
        emitted: flush.emitted,
        timestamp: Date.now(),
      });
    }

    const summary: PipelineSummary = {
      index: pipeline.index,
      inputCount: records.length,
      outputCount: result.output.length,
      sink: pipeline.sink,
    };
    logger.debug('Pipeline completed', { runId, ...summary });
    eventBus.emit({ type: 'pipeline:completed', runId, summary, timestamp: Date.now() });

    return { output: result.output, pipeline: summary };
  }
}
