import type { Logger } from 'winston';
import type { FixedRecord } from '../domain/model/FixedRecord.js';
import type { Pipeline } from '../domain/model/Pipeline.js';
import type { ExecutionTrace } from '../domain/model/Trace.js';
import type { DebugPosition, DebugState, Watch, WatchReading } from '../domain/model/DebugState.js';
import { createDebugState } from '../domain/model/DebugState.js';
import { RecordAtATimeExecutor } from '../domain/services/RecordAtATimeExecutor.js';
import * as debug from '../domain/services/Debugger.js';
import type { EventBus } from './EventBus.js';

/** A watch and what it shows at the current position. */
export interface WatchSnapshot extends Watch {
  readonly reading: WatchReading;
}

/** Everything a front end needs to render one debugger position. */
export interface DebugSnapshot {
  readonly position: DebugPosition;
  readonly pausedAtBreakpoint: boolean;
  /** `Record 2 of 8`, `Flush 1 of 2`, or empty before the start and after the end. */
  readonly stepLabel: string;
  readonly stageLabels: readonly string[];
  /** Records sitting on the current pipe point. */
  readonly records: readonly FixedRecord[];
  readonly watches: readonly WatchSnapshot[];
  readonly breakpoints: readonly number[];
  /** Records that have left the last stage so far. */
  readonly output: readonly FixedRecord[];
  readonly steps: number;
}

/**
 * Stateful stepping handle over one pipeline and one input.
 *
 * The whole record-at-a-time execution is traced up front; every operation
 * then moves through that trace and returns a fresh snapshot.
 *
 * @example
 * ```typescript
 * const session = engine.debug(input, 'LOCATE /ERR/\nCOUNT');
 * session.addBreakpoint(1);
 * const snapshot = session.runToBreakpoint();
 * ```
 */
export class DebugSession {
  readonly sessionId = crypto.randomUUID();
  private trace: ExecutionTrace;
  private state: DebugState = createDebugState();
  private pipeline: Pipeline;
  private finishedReported = false;

  constructor(
    pipeline: Pipeline,
    input: readonly FixedRecord[],
    private readonly eventBus: EventBus,
    private readonly logger: Logger,
  ) {
    this.pipeline = pipeline;
    this.trace = new RecordAtATimeExecutor().trace(input, pipeline).trace;
    this.state = debug.initialize(this.state, this.trace);
    this.reportIfFinished();
  }

  /** Number of stages; valid pipe points are `0..stageCount`. */
  get stageCount(): number {
    return this.pipeline.stages.length;
  }

  get isFinished(): boolean {
    return this.state.position.kind === 'finished';
  }

  snapshot(): DebugSnapshot {
    const { position } = this.state;
    return {
      position,
      pausedAtBreakpoint: this.state.pausedAtBreakpoint,
      stepLabel: debug.stepLabel(position, this.trace),
      stageLabels: this.trace.stageLabels,
      records: debug.currentRecords(position, this.trace),
      watches: this.state.watches.map((watch) => ({
        ...watch,
        reading: debug.readPipePoint(position, watch.position, this.trace),
      })),
      breakpoints: this.state.breakpoints,
      output: debug.outputSoFar(position, this.trace),
      steps: this.state.steps,
    };
  }

  /** Advance one pipe point, ignoring breakpoints. */
  step(): DebugSnapshot {
    this.state = debug.step(this.state, this.trace);
    this.reportIfFinished();
    return this.snapshot();
  }

  /** Step until a breakpoint is reached or the run finishes. Always moves at least once. */
  runToBreakpoint(): DebugSnapshot {
    this.state = debug.runToBreakpoint(this.state, this.trace);
    if (this.state.pausedAtBreakpoint) {
      this.logger.debug('Paused at breakpoint', { sessionId: this.sessionId, position: this.state.position });
      this.eventBus.emit({
        type: 'debug:paused',
        sessionId: this.sessionId,
        position: this.state.position,
        timestamp: Date.now(),
      });
    }
    this.reportIfFinished();
    return this.snapshot();
  }

  /** Back to the first position. Watches and breakpoints are kept. */
  reset(): DebugSnapshot {
    this.state = debug.reset(this.state, this.trace);
    this.finishedReported = false;
    this.reportIfFinished();
    return this.snapshot();
  }

  /** Re-trace with a new pipeline and input, dropping watches and breakpoints past its last pipe point. */
  reinitialize(pipeline: Pipeline, input: readonly FixedRecord[]): DebugSnapshot {
    this.pipeline = pipeline;
    this.trace = new RecordAtATimeExecutor().trace(input, pipeline).trace;
    this.state = debug.initialize(debug.retainPositions(this.state, pipeline.stages.length), this.trace);
    this.finishedReported = false;
    this.reportIfFinished();
    return this.snapshot();
  }

  addWatch(position: number): DebugSnapshot {
    this.state = debug.addWatch(this.state, position, this.stageCount);
    return this.snapshot();
  }

  removeWatch(id: number): DebugSnapshot {
    this.state = debug.removeWatch(this.state, id);
    return this.snapshot();
  }

  addBreakpoint(position: number): DebugSnapshot {
    this.state = debug.addBreakpoint(this.state, position, this.stageCount);
    return this.snapshot();
  }

  removeBreakpoint(position: number): DebugSnapshot {
    this.state = debug.removeBreakpoint(this.state, position);
    return this.snapshot();
  }

  private reportIfFinished(): void {
    if (this.finishedReported || this.state.position.kind !== 'finished') return;
    this.finishedReported = true;
    this.eventBus.emit({
      type: 'debug:finished',
      sessionId: this.sessionId,
      steps: this.state.steps,
      outputCount: this.trace.output.length,
      timestamp: Date.now(),
    });
  }
}
