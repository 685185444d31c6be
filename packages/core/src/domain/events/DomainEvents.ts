import type { ExecutorKind } from '../services/executors.js';
import type { PipelineSink } from '../model/Pipeline.js';
import type { DebugPosition } from '../model/DebugState.js';
import type { PipelineErrorCode } from '../errors/PipelineError.js';

/** Per-pipeline counters of a completed run. */
export interface PipelineSummary {
  readonly index: number;
  readonly inputCount: number;
  readonly outputCount: number;
  readonly sink: PipelineSink;
}

/** Counters for a whole multi-pipeline run. */
export interface RunSummary {
  readonly executor: ExecutorKind;
  readonly inputCount: number;
  readonly outputCount: number;
  readonly pipelines: readonly PipelineSummary[];
  readonly elapsedMs: number;
}

/** Emitted when `execute()` (or one of the explicit strategies) begins. */
export interface RunStartedEvent {
  readonly type: 'run:started';
  readonly runId: string;
  readonly executor: ExecutorKind;
  readonly pipelineCount: number;
  readonly inputCount: number;
  readonly timestamp: number;
}

/** Emitted when one pipeline of the specification begins, with its resolved input. */
export interface PipelineStartedEvent {
  readonly type: 'pipeline:started';
  readonly runId: string;
  readonly pipelineIndex: number;
  readonly stageCount: number;
  readonly inputCount: number;
  readonly timestamp: number;
}

/** Emitted for every stage whose end-of-input emission was non-empty. */
export interface StageFlushedEvent {
  readonly type: 'stage:flushed';
  readonly runId: string;
  readonly pipelineIndex: number;
  readonly stageIndex: number;
  readonly label: string;
  readonly emitted: number;
  readonly timestamp: number;
}

/** Emitted when one pipeline has produced its output (and written it, for a file sink). */
export interface PipelineCompletedEvent {
  readonly type: 'pipeline:completed';
  readonly runId: string;
  readonly summary: PipelineSummary;
  readonly timestamp: number;
}

/** Emitted after the last pipeline completes. */
export interface RunCompletedEvent {
  readonly type: 'run:completed';
  readonly runId: string;
  readonly summary: RunSummary;
  readonly timestamp: number;
}

/** Emitted when a run aborts; the error is rethrown to the caller afterwards. */
export interface RunFailedEvent {
  readonly type: 'run:failed';
  readonly runId: string;
  /** Pipeline error code, or `undefined` for errors from outside the engine. */
  readonly code?: PipelineErrorCode;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted when `runToBreakpoint()` stops on a breakpoint. */
export interface DebugPausedEvent {
  readonly type: 'debug:paused';
  readonly sessionId: string;
  readonly position: DebugPosition;
  readonly timestamp: number;
}

/** Emitted the first time a debug session reaches `finished` after an initialize or reset. */
export interface DebugFinishedEvent {
  readonly type: 'debug:finished';
  readonly sessionId: string;
  readonly steps: number;
  readonly outputCount: number;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | RunStartedEvent
  | PipelineStartedEvent
  | StageFlushedEvent
  | PipelineCompletedEvent
  | RunCompletedEvent
  | RunFailedEvent
  | DebugPausedEvent
  | DebugFinishedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
