import type { FixedRecord } from '../domain/model/FixedRecord.js';
import type { Pipeline, PipelineSink } from '../domain/model/Pipeline.js';
import type { RecordStore } from '../domain/ports/RecordStore.js';

/**
 * Tracks what each pipeline of a specification reads and where its output goes.
 *
 * Pipeline k+1 reads pipeline k's output. When pipeline k wrote to a file it
 * reads the primary input instead. A declared `<` source always wins.
 */
export class PipelineFeed {
  private upstream: readonly FixedRecord[];
  private previousSink: PipelineSink | undefined;

  constructor(
    private readonly primary: readonly FixedRecord[],
    private readonly recordStore: RecordStore,
  ) {
    this.upstream = primary;
  }

  /** Records `pipeline` reads when it runs next. */
  inputFor(pipeline: Pipeline): readonly FixedRecord[] {
    if (pipeline.source.kind === 'file') {
      return this.recordStore.read(pipeline.source.path);
    }
    return this.previousSink?.kind === 'file' ? this.primary : this.upstream;
  }

  /** Hand `pipeline`'s output downstream, writing it to its `>` sink if it has one. */
  complete(pipeline: Pipeline, output: readonly FixedRecord[]): void {
    if (pipeline.sink.kind === 'file') {
      this.recordStore.write(pipeline.sink.path, output);
    }
    this.upstream = output;
    this.previousSink = pipeline.sink;
  }

  /** Output of the most recently completed pipeline, or the primary input before any. */
  get output(): readonly FixedRecord[] {
    return this.upstream;
  }
}
