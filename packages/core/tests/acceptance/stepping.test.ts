import { describe, it, expect, vi } from 'vitest';
import { PipelineEngine } from '../../src/PipelineEngine.js';
import { recordsFromText } from '../../src/domain/model/FixedRecord.js';
import type { FixedRecord } from '../../src/domain/model/FixedRecord.js';
import { parsePipelines } from '../../src/domain/services/PipelineParser.js';
import { InMemoryRecordStore } from '../../src/infrastructure/stores/InMemoryRecordStore.js';

function lines(records: readonly FixedRecord[]): string[] {
  return records.map((r) => r.trimmed());
}

const INPUT = recordsFromText('alpha 1\nbeta 2\nalpha 3\ndelta 4');
const DSL = 'LOCATE /alpha/\nUPPER\nCOUNT';

describe('stepping contract', () => {
  it('visits m*(S+1) record pipe points before the flush phase', () => {
    const engine = new PipelineEngine();
    const session = engine.debug(INPUT, DSL);
    let snapshot = session.snapshot();
    let recordPoints = 0;

    while (snapshot.position.kind === 'atPipePoint') {
      recordPoints++;
      snapshot = session.step();
    }

    expect(recordPoints).toBe(4 * (3 + 1));
    expect(snapshot.position).toEqual({ kind: 'atFlush', flushIndex: 0, pipePoint: 3 });
    expect(snapshot.stepLabel).toBe('Flush 1 of 1');
    expect(lines(snapshot.records)).toEqual(['2']);
  });

  it('accumulates the same output as runBatch', () => {
    const engine = new PipelineEngine();
    const dsl = 'LOCATE /alpha/\nUPPER';
    const session = engine.debug(INPUT, dsl);

    while (!session.isFinished) session.step();

    expect(lines(session.snapshot().output)).toEqual(lines(engine.runBatch(INPUT, dsl).output));
    expect(lines(session.snapshot().output)).toEqual(['ALPHA 1', 'ALPHA 3']);
  });

  it('shows the current record and stage labels in a snapshot', () => {
    const session = new PipelineEngine().debug(INPUT, DSL);
    session.step();
    const snapshot = session.step();

    expect(snapshot.position).toEqual({ kind: 'atPipePoint', recordIndex: 0, pipePoint: 2 });
    expect(snapshot.stepLabel).toBe('Record 1 of 4');
    expect(snapshot.stageLabels).toEqual(['LOCATE /alpha/', 'UPPER', 'COUNT']);
    expect(lines(snapshot.records)).toEqual(['ALPHA 1']);
    expect(snapshot.steps).toBe(2);
  });

  it('reports watch readings as the record moves', () => {
    const session = new PipelineEngine().debug(INPUT, DSL);
    session.addWatch(0);
    const snapshot = session.addWatch(2);

    expect(snapshot.watches).toEqual([
      { id: 1, label: 'w1', position: 0, reading: { kind: 'records', records: recordsFromText('alpha 1') } },
      { id: 2, label: 'w2', position: 2, reading: { kind: 'notReached' } },
    ]);

    const later = session.step();
    session.step();
    const atTwo = session.snapshot();
    expect(later.watches[1]?.reading).toEqual({ kind: 'notReached' });
    expect(atTwo.watches[1]?.reading).toEqual({ kind: 'records', records: recordsFromText('ALPHA 1') });
  });

  it('never runs past a breakpoint it has not passed', () => {
    const session = new PipelineEngine().debug(INPUT, DSL);
    session.addBreakpoint(2);

    const stops: string[] = [];
    let snapshot = session.runToBreakpoint();
    while (snapshot.pausedAtBreakpoint) {
      stops.push(snapshot.stepLabel);
      snapshot = session.runToBreakpoint();
    }

    expect(stops).toEqual(['Record 1 of 4', 'Record 2 of 4', 'Record 3 of 4', 'Record 4 of 4']);
    expect(snapshot.position).toEqual({ kind: 'finished' });
  });

  it('steps exactly one pipe point even when a breakpoint sits further on', () => {
    const session = new PipelineEngine().debug(INPUT, DSL);
    session.addBreakpoint(3);

    const snapshot = session.step();
    expect(snapshot.position).toEqual({ kind: 'atPipePoint', recordIndex: 0, pipePoint: 1 });
    expect(snapshot.pausedAtBreakpoint).toBe(false);
  });

  it('resets to the start keeping watches and breakpoints', () => {
    const session = new PipelineEngine().debug(INPUT, DSL);
    session.addWatch(1);
    session.addBreakpoint(1);
    session.runToBreakpoint();
    const snapshot = session.reset();

    expect(snapshot.position).toEqual({ kind: 'atPipePoint', recordIndex: 0, pipePoint: 0 });
    expect(snapshot.steps).toBe(0);
    expect(snapshot.breakpoints).toEqual([1]);
    expect(snapshot.watches.map((w) => w.label)).toEqual(['w1']);
    expect(snapshot.output).toEqual([]);
  });

  it('reinitializes with a shorter pipeline and drops positions past its end', () => {
    const session = new PipelineEngine().debug(INPUT, DSL);
    session.addWatch(3);
    session.addBreakpoint(1);
    session.addBreakpoint(3);

    const pipeline = parsePipelines('TAKE 1').pipelines[0];
    if (!pipeline) throw new Error('No pipeline');
    const snapshot = session.reinitialize(pipeline, recordsFromText('only'));

    expect(session.stageCount).toBe(1);
    expect(snapshot.watches).toEqual([]);
    expect(snapshot.breakpoints).toEqual([1]);
    expect(snapshot.stepLabel).toBe('Record 1 of 1');
  });

  it('publishes paused and finished events', () => {
    const engine = new PipelineEngine();
    const paused = vi.fn();
    const finished = vi.fn();
    engine.on('debug:paused', paused).on('debug:finished', finished);

    const session = engine.debug(INPUT, DSL);
    session.addBreakpoint(3);
    session.runToBreakpoint();

    expect(paused).toHaveBeenCalledOnce();
    expect(paused.mock.calls[0]?.[0]).toMatchObject({
      type: 'debug:paused',
      sessionId: session.sessionId,
      position: { kind: 'atPipePoint', recordIndex: 0, pipePoint: 3 },
    });

    while (!session.isFinished) session.step();
    session.step();

    expect(finished).toHaveBeenCalledOnce();
    expect(finished.mock.calls[0]?.[0]).toMatchObject({ type: 'debug:finished', steps: 17, outputCount: 1 });
  });

  it('selects a pipeline of a multi-pipeline text by index', () => {
    const session = new PipelineEngine().debug(INPUT, 'UPPER\n?\nLOCATE /beta/\nLOWER', 1);
    expect(session.snapshot().stageLabels).toEqual(['LOCATE /beta/', 'LOWER']);
  });

  it('steps a later pipeline over the output of the one before it', () => {
    const engine = new PipelineEngine();
    const dsl = 'LOCATE /alpha/\n?\nCOUNT';
    const session = engine.debug(INPUT, dsl, 1);

    expect(session.snapshot().stepLabel).toBe('Record 1 of 2');
    expect(lines(session.snapshot().records)).toEqual(['alpha 1']);

    while (!session.isFinished) session.step();

    expect(lines(session.snapshot().output)).toEqual(['2']);
    expect(lines(session.snapshot().output)).toEqual(lines(engine.runBatch(INPUT, dsl).output));
  });

  it('steps a pipeline over its own file source', () => {
    const engine = new PipelineEngine({
      recordStore: new InMemoryRecordStore({ 'x.txt': recordsFromText('x1\nx2') }),
    });
    const dsl = '< x.txt\nCOUNT';
    const session = engine.debug('a\nb\nc\nd', dsl);

    expect(session.snapshot().stepLabel).toBe('Record 1 of 2');
    while (!session.isFinished) session.step();

    expect(lines(session.snapshot().output)).toEqual(['2']);
    expect(lines(session.snapshot().output)).toEqual(lines(engine.runBatch('a\nb\nc\nd', dsl).output));
  });

  it('runs earlier pipelines so a later one can read their file sink', () => {
    const store = new InMemoryRecordStore();
    const engine = new PipelineEngine({ recordStore: store });
    const session = engine.debug(INPUT, 'UPPER\n> up.txt\n?\n< up.txt\nTAKE 1', 1);

    expect(store.has('up.txt')).toBe(true);
    while (!session.isFinished) session.step();
    expect(lines(session.snapshot().output)).toEqual(['ALPHA 1']);
  });

  it('traces a later pipeline over its resolved input', () => {
    const { trace } = new PipelineEngine().trace(INPUT, 'LOCATE /alpha/\n?\nUPPER', 1);

    expect(trace.recordTraces.map((r) => r.input.trimmed())).toEqual(['alpha 1', 'alpha 3']);
    expect(lines(trace.output)).toEqual(['ALPHA 1', 'ALPHA 3']);
  });

  it('rejects watches outside the pipeline', () => {
    const session = new PipelineEngine().debug(INPUT, DSL);
    expect(() => session.addWatch(4)).toThrow('Pipe point 4 is outside 0..3');
  });
});
