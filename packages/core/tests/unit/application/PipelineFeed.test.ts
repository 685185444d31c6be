import { describe, it, expect } from 'vitest';
import { PipelineFeed } from '../../../src/application/PipelineFeed.js';
import { InMemoryRecordStore } from '../../../src/infrastructure/stores/InMemoryRecordStore.js';
import { recordsFromText } from '../../../src/domain/model/FixedRecord.js';
import type { FixedRecord } from '../../../src/domain/model/FixedRecord.js';
import { parsePipelines } from '../../../src/domain/services/PipelineParser.js';
import type { Pipeline } from '../../../src/domain/model/Pipeline.js';

function lines(records: readonly FixedRecord[]): string[] {
  return records.map((r) => r.trimmed());
}

function pipelinesOf(dsl: string): readonly Pipeline[] {
  return parsePipelines(dsl).pipelines;
}

describe('PipelineFeed', () => {
  const primary = recordsFromText('p1\np2');

  it('should hand the primary input to the first pipeline and upstream output afterwards', () => {
    const [first, second] = pipelinesOf('UPPER\n?\nLOWER');
    if (!first || !second) throw new Error('Expected two pipelines');
    const feed = new PipelineFeed(primary, new InMemoryRecordStore());

    expect(lines(feed.inputFor(first))).toEqual(['p1', 'p2']);
    feed.complete(first, recordsFromText('UP'));
    expect(lines(feed.inputFor(second))).toEqual(['UP']);
    expect(lines(feed.output)).toEqual(['UP']);
  });

  it('should write a file sink and feed the primary input to the next pipeline', () => {
    const [first, second] = pipelinesOf('UPPER\n> out.txt\n?\nLOWER');
    if (!first || !second) throw new Error('Expected two pipelines');
    const store = new InMemoryRecordStore();
    const feed = new PipelineFeed(primary, store);

    feed.complete(first, recordsFromText('P1'));

    expect(lines(store.read('out.txt'))).toEqual(['P1']);
    expect(lines(feed.inputFor(second))).toEqual(['p1', 'p2']);
  });

  it('should read a declared file source from the store', () => {
    const [first] = pipelinesOf('< in.txt\nCOUNT');
    if (!first) throw new Error('Expected a pipeline');
    const feed = new PipelineFeed(primary, new InMemoryRecordStore({ 'in.txt': recordsFromText('f1') }));

    expect(lines(feed.inputFor(first))).toEqual(['f1']);
  });
});
