import type { StageCommand } from './Command.js';

/** Where a pipeline gets its records. */
export type PipelineSource =
  /** The previous pipeline's output, or the primary input for the first pipeline. */
  | { readonly kind: 'upstream' }
  | { readonly kind: 'file'; readonly path: string };

/** Where a pipeline's output goes. */
export type PipelineSink = { readonly kind: 'console' } | { readonly kind: 'file'; readonly path: string };

/** One source, an ordered list of stages, one sink. No stages means identity. */
export interface Pipeline {
  /** Zero-based position in the multi-pipeline specification. */
  readonly index: number;
  readonly source: PipelineSource;
  readonly stages: readonly StageCommand[];
  readonly sink: PipelineSink;
}

/** Ordered, non-empty list of pipelines separated by `?` lines in the DSL. */
export interface MultiPipelineSpec {
  readonly pipelines: readonly Pipeline[];
}

/** An identity pipeline reading upstream and writing to the console. */
export function emptyPipeline(index = 0): Pipeline {
  return { index, source: { kind: 'upstream' }, stages: [], sink: { kind: 'console' } };
}
