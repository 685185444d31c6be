import type { StageCommand } from '../model/Command.js';
import type { FixedRecord } from '../model/FixedRecord.js';
import { StageError } from '../errors/StageError.js';
import { isPipelineError } from '../errors/PipelineError.js';
import type { Stage } from './stages/Stage.js';
import { createStages } from './stages/createStage.js';

/** Called with every pipe point a batch of records reaches while being threaded. */
export type PipePointObserver = (pipePoint: number, records: readonly FixedRecord[]) => void;

/**
 * Fresh stage instances for one execution, with error context added to
 * anything a stage throws.
 */
export class StageChain {
  private readonly stages: readonly Stage[];

  constructor(private readonly commands: readonly StageCommand[]) {
    this.stages = createStages(commands);
  }

  get length(): number {
    return this.stages.length;
  }

  get labels(): string[] {
    return this.stages.map((s) => s.label);
  }

  /** Apply stage `index` to one record. */
  step(index: number, record: FixedRecord): readonly FixedRecord[] {
    const stage = this.stageAt(index);
    try {
      return stage.step(record);
    } catch (error) {
      throw this.wrap(index, stage, error);
    }
  }

  /** Apply stage `index` to every record in order, concatenating the outputs. */
  stepAll(index: number, records: readonly FixedRecord[]): FixedRecord[] {
    const output: FixedRecord[] = [];
    for (const record of records) {
      output.push(...this.step(index, record));
    }
    return output;
  }

  /** Collect the deferred emission of stage `index`. */
  endOfInput(index: number): readonly FixedRecord[] {
    const stage = this.stageAt(index);
    try {
      return stage.endOfInput();
    } catch (error) {
      throw this.wrap(index, stage, error);
    }
  }

  /**
   * Thread records through stages `from..length-1`, boundary by boundary.
   *
   * The observer sees the records at pipe point `from` first and then at every
   * following pipe point, including those where nothing is left.
   */
  thread(records: readonly FixedRecord[], from: number, observe?: PipePointObserver): FixedRecord[] {
    let inFlight = [...records];
    observe?.(from, inFlight);

    for (let index = from; index < this.stages.length; index++) {
      inFlight = this.stepAll(index, inFlight);
      observe?.(index + 1, inFlight);
    }

    return inFlight;
  }

  private stageAt(index: number): Stage {
    const stage = this.stages[index];
    if (!stage) {
      throw new RangeError(`No stage at index ${String(index)}`);
    }
    return stage;
  }

  private wrap(index: number, stage: Stage, error: unknown): Error {
    if (isPipelineError(error) && error.code === 'STAGE_ERROR') return error;
    return new StageError(index, stage.label, this.commands[index]?.line, error);
  }
}
