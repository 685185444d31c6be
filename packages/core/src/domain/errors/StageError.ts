import { PipelineError } from './PipelineError.js';

/** Failure raised while a stage was evaluating; points at the stage and its DSL line. */
export class StageError extends PipelineError {
  readonly stageIndex: number;
  readonly stageLabel: string;
  readonly line?: number;

  constructor(stageIndex: number, stageLabel: string, line: number | undefined, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const where = line !== undefined ? ` (line ${String(line)})` : '';
    super(`Stage ${String(stageIndex + 1)} ${stageLabel}${where}: ${reason}`, {
      code: 'STAGE_ERROR',
      details: { stageIndex, stageLabel, line },
      cause,
    });
    this.stageIndex = stageIndex;
    this.stageLabel = stageLabel;
    this.line = line;
  }
}
