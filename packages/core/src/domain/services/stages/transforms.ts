import { FixedRecord } from '../../model/FixedRecord.js';
import type { FieldCopy } from '../../model/FixedRecord.js';
import { BaseStage } from './Stage.js';

/** CONSOLE and `>`: records pass unchanged; writing them out is the collaborator's job. */
export class PassthroughStage extends BaseStage {
  step(record: FixedRecord): readonly FixedRecord[] {
    return [record];
  }
}

/** SELECT: recombines fields into a fresh blank record. */
export class SelectStage extends BaseStage {
  constructor(
    label: string,
    private readonly copies: readonly FieldCopy[],
  ) {
    super(label);
  }

  step(record: FixedRecord): readonly FixedRecord[] {
    return [FixedRecord.compose(record, this.copies)];
  }
}

/** CHANGE: replaces every occurrence of `from`, left to right, then re-fits to 80 bytes. */
export class ChangeStage extends BaseStage {
  constructor(
    label: string,
    private readonly from: string,
    private readonly to: string,
  ) {
    super(label);
  }

  step(record: FixedRecord): readonly FixedRecord[] {
    if (!record.text.includes(this.from)) return [record];
    return [FixedRecord.fit(record.text.split(this.from).join(this.to))];
  }
}

export type CaseMode = 'upper' | 'lower' | 'reverse';

/** UPPER, LOWER and REVERSE. REVERSE works on the text without its trailing padding. */
export class CaseStage extends BaseStage {
  constructor(
    label: string,
    private readonly mode: CaseMode,
  ) {
    super(label);
  }

  step(record: FixedRecord): readonly FixedRecord[] {
    switch (this.mode) {
      case 'upper':
        return [FixedRecord.fit(record.text.toUpperCase())];
      case 'lower':
        return [FixedRecord.fit(record.text.toLowerCase())];
      case 'reverse':
        return [FixedRecord.fit([...record.trimmed()].reverse().join(''))];
    }
  }
}

/** DUPLICATE k: k identical copies of every record. */
export class DuplicateStage extends BaseStage {
  constructor(
    label: string,
    private readonly copies: number,
  ) {
    super(label);
  }

  step(record: FixedRecord): readonly FixedRecord[] {
    return Array.from({ length: this.copies }, () => record);
  }
}
