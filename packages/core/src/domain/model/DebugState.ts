import type { FixedRecord } from './FixedRecord.js';

/**
 * Where a debug session stands.
 *
 * - `notStarted` → first pipe point of the first record (or of the first flush, or `finished`)
 * - `atPipePoint` → next pipe point of the record | pipe point 0 of the next record | flush phase | `finished`
 * - `atFlush` → next pipe point of the flush | first pipe point of the next flush | `finished`
 * - `finished` → (terminal until reset)
 *
 * `pipePoint` is always the global pipe-point index: 0 is the input of the
 * first stage and `stageCount` the output of the last.
 */
export type DebugPosition =
  | { readonly kind: 'notStarted' }
  | { readonly kind: 'atPipePoint'; readonly recordIndex: number; readonly pipePoint: number }
  | { readonly kind: 'atFlush'; readonly flushIndex: number; readonly pipePoint: number }
  | { readonly kind: 'finished' };

/** A persistent subscription to one pipe point. */
export interface Watch {
  readonly id: number;
  /** Display label: `w1`, `w2`, ... */
  readonly label: string;
  readonly position: number;
}

/** What a watch shows at the current position. */
export type WatchReading =
  | { readonly kind: 'records'; readonly records: readonly FixedRecord[] }
  | { readonly kind: 'notReached' }
  /** Above the stage a flush started from, or after the run finished. */
  | { readonly kind: 'notApplicable' };

/** Immutable debugger state, advanced by the pure transitions in `Debugger.ts`. */
export interface DebugState {
  readonly position: DebugPosition;
  /** Set when `runToBreakpoint` stopped on a breakpoint; cleared by every other move. */
  readonly pausedAtBreakpoint: boolean;
  readonly watches: readonly Watch[];
  /** Pipe-point positions, ascending, without duplicates. */
  readonly breakpoints: readonly number[];
  readonly nextWatchId: number;
  /** Steps taken since the last initialize or reset. */
  readonly steps: number;
}

export const NOT_STARTED: DebugPosition = { kind: 'notStarted' };
export const FINISHED: DebugPosition = { kind: 'finished' };

/** A fresh state with no watches or breakpoints. */
export function createDebugState(): DebugState {
  return { position: NOT_STARTED, pausedAtBreakpoint: false, watches: [], breakpoints: [], nextWatchId: 1, steps: 0 };
}

/** The pipe point a position sits on, if any. */
export function pipePointOf(position: DebugPosition): number | undefined {
  return position.kind === 'atPipePoint' || position.kind === 'atFlush' ? position.pipePoint : undefined;
}
