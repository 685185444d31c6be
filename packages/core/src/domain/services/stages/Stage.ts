import type { FixedRecord } from '../../model/FixedRecord.js';

/**
 * A DSL command bound to runtime state.
 *
 * `step` realizes the command's cardinality (zero, one or many records out per
 * record in). `endOfInput` is called exactly once per execution, after the
 * last record has passed this stage, and returns any deferred emission.
 * Instances are built fresh for every execution and never shared.
 */
export interface Stage {
  /** Command text as written in the DSL, used in traces and errors. */
  readonly label: string;
  step(record: FixedRecord): readonly FixedRecord[];
  endOfInput(): readonly FixedRecord[];
}

/** Stage with no end-of-input emission. */
export abstract class BaseStage implements Stage {
  constructor(readonly label: string) {}

  abstract step(record: FixedRecord): readonly FixedRecord[];

  endOfInput(): readonly FixedRecord[] {
    return [];
  }
}
