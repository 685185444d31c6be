import type { FixedRecord, FieldRange } from '../../model/FixedRecord.js';
import type { FilterOperator } from '../../model/Command.js';
import { BaseStage } from './Stage.js';

/** FILTER: keeps records whose field equals (`=`) or differs from (`!=`) a value. */
export class FilterStage extends BaseStage {
  constructor(
    label: string,
    private readonly range: FieldRange,
    private readonly operator: FilterOperator,
    private readonly value: string,
  ) {
    super(label);
  }

  step(record: FixedRecord): readonly FixedRecord[] {
    const equal = record.fieldEquals(this.range.offset, this.range.length, this.value);
    return equal === (this.operator === '=') ? [record] : [];
  }
}

/** LOCATE / NLOCATE: keeps records that contain (or, inverted, lack) a substring. */
export class LocateStage extends BaseStage {
  constructor(
    label: string,
    private readonly pattern: string,
    private readonly keepMatches: boolean,
    private readonly range?: FieldRange,
  ) {
    super(label);
  }

  step(record: FixedRecord): readonly FixedRecord[] {
    return record.contains(this.pattern, this.range) === this.keepMatches ? [record] : [];
  }
}

/** TAKE n: passes the first n records that reach this stage. */
export class TakeStage extends BaseStage {
  private seen = 0;

  constructor(
    label: string,
    private readonly limit: number,
  ) {
    super(label);
  }

  step(record: FixedRecord): readonly FixedRecord[] {
    this.seen++;
    return this.seen <= this.limit ? [record] : [];
  }
}

/** SKIP n: drops the first n records that reach this stage. */
export class SkipStage extends BaseStage {
  private seen = 0;

  constructor(
    label: string,
    private readonly limit: number,
  ) {
    super(label);
  }

  step(record: FixedRecord): readonly FixedRecord[] {
    this.seen++;
    return this.seen > this.limit ? [record] : [];
  }
}

/** HOLE: absorbs everything. */
export class HoleStage extends BaseStage {
  step(): readonly FixedRecord[] {
    return [];
  }
}
