import { FieldRangeError } from '../errors/FieldRangeError.js';
import { RecordFormatError } from '../errors/RecordFormatError.js';

/** Width of every record, in bytes (one punch card). */
export const RECORD_WIDTH = 80;

const BLANK = ' '.repeat(RECORD_WIDTH);

/** One `(sourceOffset, length, destOffset)` copy used to recombine fields into a new record. */
export interface FieldCopy {
  readonly sourceOffset: number;
  readonly length: number;
  readonly destOffset: number;
}

/** A contiguous byte range inside a record. */
export interface FieldRange {
  readonly offset: number;
  readonly length: number;
}

/** Return the first non-ASCII character in `text`, or `undefined` when it is pure ASCII. */
function findNonAscii(text: string): string | undefined {
  for (const char of text) {
    if ((char.codePointAt(0) ?? 0) > 0x7f) return char;
  }
  return undefined;
}

function assertRange(offset: number, length: number): void {
  if (!Number.isInteger(offset) || !Number.isInteger(length) || offset < 0 || length < 0 || offset + length > RECORD_WIDTH) {
    throw new FieldRangeError(offset, length, RECORD_WIDTH);
  }
}

/**
 * An immutable fixed-width line of exactly 80 ASCII characters.
 *
 * Fields are addressed by zero-based offset and length. Every operation that
 * changes content returns a new record; the width invariant holds for every
 * instance.
 *
 * @example
 * ```typescript
 * const record = FixedRecord.parse('SMITH   JOHN      SALES');
 * record.field(0, 8);                 // 'SMITH   '
 * record.fieldEquals(18, 10, 'SALES'); // true
 * ```
 */
export class FixedRecord {
  private constructor(readonly text: string) {}

  /** A record of 80 spaces. */
  static blank(): FixedRecord {
    return new FixedRecord(BLANK);
  }

  /**
   * Strict constructor for input lines: pads short lines with spaces and rejects
   * lines longer than 80 characters or containing non-ASCII characters.
   *
   * @param lineNumber - 1-based input line, reported in the error.
   */
  static parse(line: string, lineNumber?: number): FixedRecord {
    if (line.length > RECORD_WIDTH) {
      throw new RecordFormatError(
        `Record is ${String(line.length)} characters long; the limit is ${String(RECORD_WIDTH)}`,
        { line: lineNumber, length: line.length },
      );
    }
    const character = findNonAscii(line);
    if (character !== undefined) {
      throw new RecordFormatError(`Record contains non-ASCII character '${character}'`, { line: lineNumber, character });
    }
    return new FixedRecord(line.padEnd(RECORD_WIDTH, ' '));
  }

  /** Constructor for synthesized records: pads or truncates to 80 characters. */
  static fit(text: string): FixedRecord {
    const character = findNonAscii(text);
    if (character !== undefined) {
      throw new RecordFormatError(`Record contains non-ASCII character '${character}'`, { character });
    }
    return new FixedRecord(text.slice(0, RECORD_WIDTH).padEnd(RECORD_WIDTH, ' '));
  }

  /** Build a fresh record by copying fields of `source` into blank destination columns. */
  static compose(source: FixedRecord, copies: readonly FieldCopy[]): FixedRecord {
    let output = FixedRecord.blank();
    for (const copy of copies) {
      output = output.withField(copy.destOffset, copy.length, source.field(copy.sourceOffset, copy.length));
    }
    return output;
  }

  /** Read `length` characters starting at `offset`. */
  field(offset: number, length: number): string {
    assertRange(offset, length);
    return this.text.slice(offset, offset + length);
  }

  /** Return a copy with the field replaced by `value`, padded or truncated to `length`. */
  withField(offset: number, length: number, value: string): FixedRecord {
    assertRange(offset, length);
    const replacement = value.slice(0, length).padEnd(length, ' ');
    return FixedRecord.fit(this.text.slice(0, offset) + replacement + this.text.slice(offset + length));
  }

  /** Compare a field to `value`, ignoring surrounding spaces on both sides. */
  fieldEquals(offset: number, length: number, value: string): boolean {
    return this.field(offset, length).trim() === value.trim();
  }

  /** Whether `pattern` occurs in the whole record, or in `range` when given. */
  contains(pattern: string, range?: FieldRange): boolean {
    const haystack = range ? this.field(range.offset, range.length) : this.text;
    return haystack.includes(pattern);
  }

  /** The record text without trailing spaces. */
  trimmed(): string {
    return this.text.trimEnd();
  }

  isBlank(): boolean {
    return this.text === BLANK;
  }

  equals(other: FixedRecord): boolean {
    return this.text === other.text;
  }

  toString(): string {
    return this.text;
  }
}

/**
 * Split text input into records: one per non-empty line, `\r\n` tolerated.
 * A bad line raises `RecordFormatError` naming its 1-based line number.
 */
export function recordsFromText(text: string): FixedRecord[] {
  const records: FixedRecord[] = [];
  const lines = text.split('\n');

  lines.forEach((raw, i) => {
    const line = raw.endsWith('\r') ? raw.slice(0, -1) : raw;
    if (line === '') return;
    records.push(FixedRecord.parse(line, i + 1));
  });

  return records;
}

/** Render records as text lines with trailing spaces trimmed. */
export function recordsToText(records: readonly FixedRecord[]): string {
  return records.map((r) => r.trimmed()).join('\n');
}
