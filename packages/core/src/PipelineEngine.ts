import type { Logger } from 'winston';
import type { FixedRecord } from './domain/model/FixedRecord.js';
import { recordsFromText } from './domain/model/FixedRecord.js';
import type { MultiPipelineSpec, Pipeline } from './domain/model/Pipeline.js';
import type { RecordStore } from './domain/ports/RecordStore.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import type { ExecutorKind } from './domain/services/executors.js';
import type { TracedExecution } from './domain/services/RecordAtATimeExecutor.js';
import { RecordAtATimeExecutor } from './domain/services/RecordAtATimeExecutor.js';
import { EngineContext } from './application/EngineContext.js';
import { DebugSession } from './application/DebugSession.js';
import { PipelineFeed } from './application/PipelineFeed.js';
import { RunPipelines } from './application/usecases/RunPipelines.js';
import type { MultiPipelineResult } from './application/usecases/RunPipelines.js';
import { InMemoryRecordStore } from './infrastructure/stores/InMemoryRecordStore.js';
import { createLogger } from './infrastructure/logging/createLogger.js';

/** Configuration for a pipeline engine. */
export interface PipelineEngineConfig {
  /** Strategy used by `execute()`. Default: `'batch'`. */
  readonly executor?: ExecutorKind;
  /** Resolves `<` sources and `>` sinks. Default: `InMemoryRecordStore`. */
  readonly recordStore?: RecordStore;
  /** Default: `createLogger('engine')`. */
  readonly logger?: Logger;
  /** When `true`, `execute()` also returns the record-at-a-time trace of the last pipeline. Default: `false`. */
  readonly traceByDefault?: boolean;
}

/** Records as values or as raw text, one record per line. */
export type EngineInput = readonly FixedRecord[] | string;

/** DSL text or an already-parsed specification. */
export type EngineSpec = string | MultiPipelineSpec;

/**
 * Facade over the record pipeline core: parse → execute (batch or
 * record-at-a-time) → output, plus a stepping debugger.
 *
 * @example
 * ```typescript
 * const engine = new PipelineEngine({ executor: 'rat' });
 * const { output } = engine.execute(inputText, 'FILTER 0,5 = "ALPHA"\nUPPER');
 * ```
 */
export class PipelineEngine {
  private readonly ctx: EngineContext;

  constructor(config: PipelineEngineConfig = {}) {
    this.ctx = new EngineContext(
      config.executor ?? 'batch',
      config.recordStore ?? new InMemoryRecordStore(),
      config.logger ?? createLogger('engine'),
      config.traceByDefault ?? false,
    );
  }

  get executor(): ExecutorKind {
    return this.ctx.executor;
  }

  get recordStore(): RecordStore {
    return this.ctx.recordStore;
  }

  /** Parse DSL text. Throws `ParseError` with the offending line. */
  parse(text: string): MultiPipelineSpec {
    const spec = this.ctx.parser.parse(text);
    this.ctx.logger.debug('Parsed pipelines', {
      pipelines: spec.pipelines.map((p) => p.stages.map((s) => s.source)),
    });
    return spec;
  }

  /** Run with the whole-batch strategy. */
  runBatch(input: EngineInput, spec: EngineSpec): MultiPipelineResult {
    return this.run(input, spec, 'batch');
  }

  /** Run with the record-at-a-time strategy. Same output as `runBatch()`. */
  runRecordAtATime(input: EngineInput, spec: EngineSpec): MultiPipelineResult {
    return this.run(input, spec, 'rat');
  }

  /** Run with the configured strategy; traces the last pipeline when `traceByDefault` is set. */
  execute(input: EngineInput, spec: EngineSpec): MultiPipelineResult {
    return this.run(input, spec, this.ctx.executor, this.ctx.traceByDefault);
  }

  /**
   * Record-at-a-time run of a single pipeline keeping every pipe point.
   * The pipeline reads what it would read in a full run; see `debug()`.
   */
  trace(input: EngineInput, pipeline: Pipeline | string, pipelineIndex = 0): TracedExecution {
    const target = this.prepare(input, pipeline, pipelineIndex);
    return new RecordAtATimeExecutor().trace(target.records, target.pipeline);
  }

  /**
   * Open a stepping session. For DSL text with several pipelines,
   * `pipelineIndex` chooses the one to step through (default: the first).
   *
   * The chosen pipeline steps over the records a full run would hand it: its
   * `<` source, or the output of the pipelines before it, which are run
   * first (writing their `>` sinks) for that purpose.
   */
  debug(input: EngineInput, pipeline: Pipeline | string, pipelineIndex = 0): DebugSession {
    const target = this.prepare(input, pipeline, pipelineIndex);
    return new DebugSession(target.pipeline, target.records, this.ctx.eventBus, this.ctx.logger);
  }

  /** Subscribe to an engine event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Unsubscribe from an engine event. Returns `this` for chaining. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to all events. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler. Returns `this` for chaining. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }

  private run(input: EngineInput, spec: EngineSpec, kind: ExecutorKind, trace = false): MultiPipelineResult {
    return new RunPipelines(this.ctx).execute(this.resolveSpec(spec), this.resolveInput(input), kind, { trace });
  }

  private resolveInput(input: EngineInput): readonly FixedRecord[] {
    return typeof input === 'string' ? recordsFromText(input) : input;
  }

  private resolveSpec(spec: EngineSpec): MultiPipelineSpec {
    return typeof spec === 'string' ? this.parse(spec) : spec;
  }

  private prepare(
    input: EngineInput,
    pipeline: Pipeline | string,
    index: number,
  ): { pipeline: Pipeline; records: readonly FixedRecord[] } {
    const feed = new PipelineFeed(this.resolveInput(input), this.ctx.recordStore);
    if (typeof pipeline !== 'string') {
      return { pipeline, records: feed.inputFor(pipeline) };
    }

    const spec = this.parse(pipeline);
    const chosen = spec.pipelines[index];
    if (!chosen) {
      throw new RangeError(`No pipeline at index ${String(index)}; found ${String(spec.pipelines.length)}`);
    }

    const executor = new RecordAtATimeExecutor();
    for (const upstream of spec.pipelines.slice(0, index)) {
      feed.complete(upstream, executor.execute(feed.inputFor(upstream), upstream).output);
    }
    return { pipeline: chosen, records: feed.inputFor(chosen) };
  }
}
