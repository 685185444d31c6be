import type { FixedRecord } from '../model/FixedRecord.js';
import type { ExecutionTrace } from '../model/Trace.js';
import { flushPipePoint, pipePointCount } from '../model/Trace.js';
import type { DebugPosition, DebugState, WatchReading } from '../model/DebugState.js';
import { FINISHED, pipePointOf } from '../model/DebugState.js';

function lastPipePoint(trace: ExecutionTrace): number {
  return pipePointCount(trace) - 1;
}

function flushStart(trace: ExecutionTrace, flushIndex: number): DebugPosition {
  const flush = trace.flushTraces[flushIndex];
  if (!flush) return FINISHED;
  return { kind: 'atFlush', flushIndex, pipePoint: flushPipePoint(flush, 0) };
}

/** First position after initialize or reset. */
export function initialPosition(trace: ExecutionTrace): DebugPosition {
  if (trace.recordTraces.length > 0) {
    return { kind: 'atPipePoint', recordIndex: 0, pipePoint: 0 };
  }
  return flushStart(trace, 0);
}

/** The position one pipe point further along the record-at-a-time step sequence. */
export function nextPosition(position: DebugPosition, trace: ExecutionTrace): DebugPosition {
  const last = lastPipePoint(trace);

  switch (position.kind) {
    case 'notStarted':
      return initialPosition(trace);
    case 'atPipePoint':
      if (position.pipePoint < last) {
        return { ...position, pipePoint: position.pipePoint + 1 };
      }
      if (position.recordIndex + 1 < trace.recordTraces.length) {
        return { kind: 'atPipePoint', recordIndex: position.recordIndex + 1, pipePoint: 0 };
      }
      return flushStart(trace, 0);
    case 'atFlush':
      if (position.pipePoint < last) {
        return { ...position, pipePoint: position.pipePoint + 1 };
      }
      return flushStart(trace, position.flushIndex + 1);
    case 'finished':
      return FINISHED;
  }
}

/** Move to the first position. Keeps watches and breakpoints. */
export function initialize(state: DebugState, trace: ExecutionTrace): DebugState {
  return { ...state, position: initialPosition(trace), pausedAtBreakpoint: false, steps: 0 };
}

/** Same as `initialize`: back to the start, watches and breakpoints kept, pause cleared. */
export const reset = initialize;

/** Advance exactly one pipe point, ignoring breakpoints. */
export function step(state: DebugState, trace: ExecutionTrace): DebugState {
  if (state.position.kind === 'finished') {
    return { ...state, pausedAtBreakpoint: false };
  }
  return { ...state, position: nextPosition(state.position, trace), pausedAtBreakpoint: false, steps: state.steps + 1 };
}

/**
 * Step until a breakpoint position is reached or the run finishes.
 *
 * Always takes at least one step, so a session paused on a breakpoint moves past it.
 */
export function runToBreakpoint(state: DebugState, trace: ExecutionTrace): DebugState {
  const breakpoints = new Set(state.breakpoints);
  let current = state;

  do {
    current = step(current, trace);
    const pipePoint = pipePointOf(current.position);
    if (pipePoint !== undefined && breakpoints.has(pipePoint)) {
      return { ...current, pausedAtBreakpoint: true };
    }
  } while (current.position.kind !== 'finished');

  return current;
}

function assertPosition(position: number, stageCount: number): void {
  if (!Number.isInteger(position) || position < 0 || position > stageCount) {
    throw new RangeError(`Pipe point ${String(position)} is outside 0..${String(stageCount)}`);
  }
}

/** Add a watch on a pipe point (0..stageCount). */
export function addWatch(state: DebugState, position: number, stageCount: number): DebugState {
  assertPosition(position, stageCount);
  const id = state.nextWatchId;
  return {
    ...state,
    watches: [...state.watches, { id, label: `w${String(id)}`, position }],
    nextWatchId: id + 1,
  };
}

export function removeWatch(state: DebugState, id: number): DebugState {
  return { ...state, watches: state.watches.filter((w) => w.id !== id) };
}

/** Mark a pipe point as a breakpoint. Adding the same position twice has no effect. */
export function addBreakpoint(state: DebugState, position: number, stageCount: number): DebugState {
  assertPosition(position, stageCount);
  if (state.breakpoints.includes(position)) return state;
  return { ...state, breakpoints: [...state.breakpoints, position].sort((a, b) => a - b) };
}

export function removeBreakpoint(state: DebugState, position: number): DebugState {
  return { ...state, breakpoints: state.breakpoints.filter((b) => b !== position) };
}

/** Drop watches and breakpoints past the last pipe point of a pipeline with `stageCount` stages. */
export function retainPositions(state: DebugState, stageCount: number): DebugState {
  return {
    ...state,
    watches: state.watches.filter((w) => w.position <= stageCount),
    breakpoints: state.breakpoints.filter((b) => b <= stageCount),
  };
}

/** The records sitting on the current pipe point (empty when none). */
export function currentRecords(position: DebugPosition, trace: ExecutionTrace): readonly FixedRecord[] {
  const reading = readPipePoint(position, pipePointOf(position) ?? -1, trace);
  return reading.kind === 'records' ? reading.records : [];
}

/** What pipe point `pipePoint` holds at `position`. */
export function readPipePoint(position: DebugPosition, pipePoint: number, trace: ExecutionTrace): WatchReading {
  switch (position.kind) {
    case 'notStarted':
      return { kind: 'notReached' };
    case 'finished':
      return { kind: 'notApplicable' };
    case 'atPipePoint': {
      if (pipePoint < 0 || pipePoint > position.pipePoint) return { kind: 'notReached' };
      const records = trace.recordTraces[position.recordIndex]?.pipePoints[pipePoint];
      return records ? { kind: 'records', records } : { kind: 'notReached' };
    }
    case 'atFlush': {
      const flush = trace.flushTraces[position.flushIndex];
      if (!flush) return { kind: 'notApplicable' };
      const origin = flushPipePoint(flush, 0);
      if (pipePoint < origin) return { kind: 'notApplicable' };
      if (pipePoint > position.pipePoint) return { kind: 'notReached' };
      const records = flush.pipePoints[pipePoint - origin];
      return records ? { kind: 'records', records } : { kind: 'notReached' };
    }
  }
}

/** `Record 2 of 8` or `Flush 1 of 2`; empty before the start and after the end. */
export function stepLabel(position: DebugPosition, trace: ExecutionTrace): string {
  switch (position.kind) {
    case 'atPipePoint':
      return `Record ${String(position.recordIndex + 1)} of ${String(trace.recordTraces.length)}`;
    case 'atFlush':
      return `Flush ${String(position.flushIndex + 1)} of ${String(trace.flushTraces.length)}`;
    default:
      return '';
  }
}

/** Records that have left the last stage by the time `position` is reached. */
export function outputSoFar(position: DebugPosition, trace: ExecutionTrace): FixedRecord[] {
  const last = lastPipePoint(trace);
  const output: FixedRecord[] = [];

  switch (position.kind) {
    case 'notStarted':
      return output;
    case 'finished':
      return [...trace.output];
    case 'atPipePoint':
      trace.recordTraces.forEach((record, i) => {
        if (i < position.recordIndex || (i === position.recordIndex && position.pipePoint === last)) {
          output.push(...(record.pipePoints[last] ?? []));
        }
      });
      return output;
    case 'atFlush':
      for (const record of trace.recordTraces) {
        output.push(...(record.pipePoints[last] ?? []));
      }
      trace.flushTraces.forEach((flush, i) => {
        if (i < position.flushIndex || (i === position.flushIndex && position.pipePoint === last)) {
          output.push(...(flush.pipePoints[flush.pipePoints.length - 1] ?? []));
        }
      });
      return output;
  }
}
