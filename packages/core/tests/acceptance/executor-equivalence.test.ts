import { describe, it, expect } from 'vitest';
import { PipelineEngine } from '../../src/PipelineEngine.js';
import { recordsFromText } from '../../src/domain/model/FixedRecord.js';
import type { FixedRecord } from '../../src/domain/model/FixedRecord.js';

const PIPELINES = [
  '',
  'CONSOLE',
  'FILTER 0,5 = "north"',
  'FILTER 0,5 != "north"\nUPPER',
  'LOCATE /7/\nREVERSE',
  'NLOCATE 6,3 /ab/',
  'CHANGE /o/00/\nSELECT 0,8; 20,5,40',
  'TAKE 2\nDUPLICATE 3',
  'SKIP 1\nTAKE 2\nLOWER',
  'DUPLICATE\nSKIP 3',
  'COUNT',
  'COUNT\nDUPLICATE 2\nCOUNT',
  'LITERAL "HEADER"\nCONSOLE',
  'TAKE 0\nLITERAL "EMPTY"',
  'LITERAL "A"\nCOUNT\nLITERAL "B"\nDUPLICATE 2',
  'HOLE\nCOUNT',
  'LOCATE /south/\nCOUNT\nCHANGE /1/one/',
  'DUPLICATE 2\nTAKE 3\nLITERAL "T"\nSKIP 1\nCOUNT\nUPPER',
];

const INPUTS: Record<string, string> = {
  empty: '',
  single: 'north abc 7 one',
  several: ['north abc 1', 'south xyz 7', 'east  ab7 3', 'north ab  9', 'west  foo 7'].join('\n'),
};

function lines(records: readonly FixedRecord[]): string[] {
  return records.map((r) => r.trimmed());
}

describe('executor equivalence', () => {
  const engine = new PipelineEngine();

  for (const dsl of PIPELINES) {
    for (const [name, text] of Object.entries(INPUTS)) {
      it(`batch, record-at-a-time and stepping agree for [${dsl.replace(/\n/g, ' | ')}] on ${name} input`, () => {
        const input = recordsFromText(text);
        const batch = engine.runBatch(input, dsl).output;
        const rat = engine.runRecordAtATime(input, dsl).output;

        const session = engine.debug(input, dsl);
        let snapshot = session.snapshot();
        while (snapshot.position.kind !== 'finished') {
          snapshot = session.step();
        }

        expect(lines(rat)).toEqual(lines(batch));
        expect(lines(snapshot.output)).toEqual(lines(batch));
        for (const record of [...batch, ...rat]) {
          expect(record.text).toHaveLength(80);
        }
      });
    }
  }

  it('should keep every pipe-point record 80 characters wide', () => {
    const input = recordsFromText(INPUTS.several ?? '');
    const trace = engine.trace(input, 'CHANGE /o/oooooooooooooooooooooooooooooooooooooooooooooooooo/\nREVERSE\nCOUNT').trace;

    const all = [
      ...trace.recordTraces.flatMap((t) => t.pipePoints.flat()),
      ...trace.flushTraces.flatMap((t) => t.pipePoints.flat()),
    ];
    expect(all.length).toBeGreaterThan(0);
    for (const record of all) {
      expect(record.text).toHaveLength(80);
    }
  });
});
