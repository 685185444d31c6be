import { describe, it, expect } from 'vitest';
import { FixedRecord, recordsFromText } from '../../../src/domain/model/FixedRecord.js';
import type { Pipeline } from '../../../src/domain/model/Pipeline.js';
import { parsePipelines } from '../../../src/domain/services/PipelineParser.js';
import { BatchExecutor } from '../../../src/domain/services/BatchExecutor.js';
import { RecordAtATimeExecutor } from '../../../src/domain/services/RecordAtATimeExecutor.js';
import { createExecutor } from '../../../src/domain/services/executors.js';
import { StageError } from '../../../src/domain/errors/StageError.js';

function pipeline(text: string): Pipeline {
  const parsed = parsePipelines(text).pipelines[0];
  if (!parsed) throw new Error('No pipeline');
  return parsed;
}

function lines(records: readonly FixedRecord[]): string[] {
  return records.map((r) => r.trimmed());
}

const input = recordsFromText('alpha 1\nbeta 2\nalpha 3\ngamma 4');

describe('BatchExecutor', () => {
  const executor = new BatchExecutor();

  it('should run an empty pipeline as the identity', () => {
    expect(lines(executor.execute(input, pipeline('')).output)).toEqual(['alpha 1', 'beta 2', 'alpha 3', 'gamma 4']);
  });

  it('should thread records through each stage in order', () => {
    const result = executor.execute(input, pipeline('LOCATE /alpha/\nUPPER'));
    expect(lines(result.output)).toEqual(['ALPHA 1', 'ALPHA 3']);
    expect(result.flushes).toEqual([]);
  });

  it('should pass a flush through downstream stages', () => {
    const result = executor.execute(input, pipeline('COUNT\nDUPLICATE 2'));
    expect(lines(result.output)).toEqual(['4', '4']);
    expect(result.flushes).toEqual([{ stageIndex: 0, label: 'COUNT', emitted: 1 }]);
  });

  it('should flush stages in declaration order', () => {
    const result = executor.execute(input, pipeline('LOCATE /alpha/\nCOUNT\nLITERAL "TOTAL"'));
    expect(lines(result.output)).toEqual(['TOTAL', '2']);
  });
});

describe('RecordAtATimeExecutor', () => {
  const executor = new RecordAtATimeExecutor();

  it('should produce the same output as the batch executor', () => {
    const text = 'LITERAL "HEAD"\nTAKE 3\nDUPLICATE 2\nCOUNT';
    expect(lines(executor.execute(input, pipeline(text)).output)).toEqual(['6']);
  });

  it('should trace every pipe point of every record', () => {
    const { trace, output } = executor.trace(input.slice(0, 2), pipeline('LOCATE /beta/\nUPPER'));

    expect(trace.stageLabels).toEqual(['LOCATE /beta/', 'UPPER']);
    expect(trace.recordTraces).toHaveLength(2);
    expect(trace.recordTraces[0]?.pipePoints.map(lines)).toEqual([['alpha 1'], [], []]);
    expect(trace.recordTraces[1]?.pipePoints.map(lines)).toEqual([['beta 2'], ['beta 2'], ['BETA 2']]);
    expect(trace.flushTraces).toEqual([]);
    expect(lines(output)).toEqual(['BETA 2']);
  });

  it('should trace flushes from the stage after the flushing one', () => {
    const { trace } = executor.trace(input, pipeline('COUNT\nLITERAL "N"\nUPPER'));

    expect(trace.flushTraces).toHaveLength(1);
    expect(trace.flushTraces[0]?.stageIndex).toBe(0);
    expect(trace.flushTraces[0]?.pipePoints.map(lines)).toEqual([['4'], ['N', '4'], ['N', '4']]);
    expect(lines(trace.output)).toEqual(['N', '4']);
  });

  it('should not trace stages whose flush is empty', () => {
    const { trace } = executor.trace(input, pipeline('LITERAL "H"\nCOUNT'));
    expect(trace.flushTraces.map((f) => f.stageIndex)).toEqual([1]);
  });
});

describe('createExecutor', () => {
  it('should build the requested strategy', () => {
    expect(createExecutor('batch').kind).toBe('batch');
    expect(createExecutor('rat').kind).toBe('rat');
  });

  it('should wrap stage failures with the stage and line', () => {
    const bad: Pipeline = {
      index: 0,
      source: { kind: 'upstream' },
      sink: { kind: 'console' },
      stages: [
        { kind: 'console', line: 1, source: 'CONSOLE' },
        {
          kind: 'select',
          copies: [{ sourceOffset: 70, length: 20, destOffset: 0 }],
          line: 2,
          source: 'SELECT 70,20',
        },
      ],
    };

    for (const kind of ['batch', 'rat'] as const) {
      const run = () => createExecutor(kind).execute(input, bad);
      expect(run).toThrow(StageError);
      expect(run).toThrow('Stage 2 SELECT 70,20 (line 2): Field 70,20 exceeds record width 80');
    }
  });
});

describe('executors with an empty input', () => {
  it('should still emit deferred records', () => {
    const none: FixedRecord[] = [];
    const text = 'LITERAL "ONLY"\nCOUNT';
    expect(lines(new BatchExecutor().execute(none, pipeline(text)).output)).toEqual(['1']);
    expect(lines(new RecordAtATimeExecutor().execute(none, pipeline(text)).output)).toEqual(['1']);
  });
});
