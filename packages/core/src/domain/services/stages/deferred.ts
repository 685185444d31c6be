import { FixedRecord } from '../../model/FixedRecord.js';
import { BaseStage } from './Stage.js';
import type { Stage } from './Stage.js';

/** COUNT: emits nothing per record and one left-justified count record at end of input. */
export class CountStage extends BaseStage {
  private count = 0;

  step(): readonly FixedRecord[] {
    this.count++;
    return [];
  }

  override endOfInput(): readonly FixedRecord[] {
    return [FixedRecord.fit(String(this.count))];
  }
}

/**
 * LITERAL: emits its record once, ahead of the first record that reaches it,
 * then passes records through. When no record ever arrives the literal is
 * emitted at end of input instead.
 */
export class LiteralStage implements Stage {
  private emitted = false;
  private readonly literal: FixedRecord;

  constructor(
    readonly label: string,
    text: string,
  ) {
    this.literal = FixedRecord.fit(text);
  }

  step(record: FixedRecord): readonly FixedRecord[] {
    if (this.emitted) return [record];
    this.emitted = true;
    return [this.literal, record];
  }

  endOfInput(): readonly FixedRecord[] {
    if (this.emitted) return [];
    this.emitted = true;
    return [this.literal];
  }
}
