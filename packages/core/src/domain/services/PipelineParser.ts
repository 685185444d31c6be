import type { Command, FilterOperator, StageCommand } from '../model/Command.js';
import type { FieldCopy, FieldRange } from '../model/FixedRecord.js';
import { RECORD_WIDTH } from '../model/FixedRecord.js';
import type { MultiPipelineSpec, Pipeline, PipelineSink, PipelineSource } from '../model/Pipeline.js';
import { emptyPipeline } from '../model/Pipeline.js';
import { ParseError } from '../errors/ParseError.js';

/** A line consisting solely of this token ends a pipeline. */
export const PIPELINE_TERMINATOR = '?';

/** Thrown by argument helpers; turned into a `ParseError` carrying the line. */
class ArgumentError extends Error {}

const INTEGER = /^\d+$/;
const RANGE_PREFIX = /^(\d+)\s*,\s*(\d+)\s*(.*)$/s;
const FILTER_ARGS = /^(.*?)\s*(!=|=)\s*(.*)$/s;
const KEYWORD = /^[A-Za-z]+(?![A-Za-z0-9])/;
const NON_PRINTABLE = /[^\x20-\x7e]/;

/** Largest DUPLICATE count; one record's copies must fit in an array. */
const MAX_DUPLICATES = 2 ** 32 - 1;

function parseInteger(text: string, what: string): number {
  const trimmed = text.trim();
  if (!INTEGER.test(trimmed)) {
    throw new ArgumentError(`${what} must be a non-negative integer, got '${trimmed}'`);
  }
  const value = Number(trimmed);
  if (!Number.isSafeInteger(value)) {
    throw new ArgumentError(`${what} is too large: '${trimmed}'`);
  }
  return value;
}

function assertPrintable(text: string, what: string): string {
  if (NON_PRINTABLE.test(text)) {
    throw new ArgumentError(`${what} must be printable ASCII`);
  }
  return text;
}

function checkRange(offset: number, length: number, what: string): void {
  if (length <= 0) {
    throw new ArgumentError(`${what} length must be greater than 0`);
  }
  if (offset + length > RECORD_WIDTH) {
    throw new ArgumentError(
      `${what} ${String(offset)},${String(length)} extends past column ${String(RECORD_WIDTH)}`,
    );
  }
}

function parseRange(text: string): FieldRange {
  const parts = text.split(',');
  if (parts.length !== 2) {
    throw new ArgumentError(`Expected offset,length but got '${text.trim()}'`);
  }
  const offset = parseInteger(parts[0] ?? '', 'Offset');
  const length = parseInteger(parts[1] ?? '', 'Length');
  checkRange(offset, length, 'Field');
  return { offset, length };
}

function parseQuoted(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith('"')) {
    throw new ArgumentError(`Value must be a quoted string: ${trimmed === '' ? '(missing)' : trimmed}`);
  }
  const close = trimmed.indexOf('"', 1);
  if (close === -1) {
    throw new ArgumentError(`Unterminated quoted string: ${trimmed}`);
  }
  const trailing = trimmed.slice(close + 1).trim();
  if (trailing !== '') {
    throw new ArgumentError(`Unexpected text after quoted string: ${trailing}`);
  }
  return trimmed.slice(1, close);
}

/** Split `/a/b/` style arguments: the first character is the delimiter and closes each part. */
function parseDelimited(text: string, parts: number): string[] {
  const trimmed = text.trim();
  const delimiter = trimmed.charAt(0);
  if (delimiter === '') {
    throw new ArgumentError('Missing delimited pattern');
  }
  if (/[A-Za-z0-9\s]/.test(delimiter)) {
    throw new ArgumentError(`Pattern delimiter must not be alphanumeric: '${delimiter}'`);
  }

  const values: string[] = [];
  let start = 1;
  for (let i = 0; i < parts; i++) {
    const end = trimmed.indexOf(delimiter, start);
    if (end === -1) {
      throw new ArgumentError(`Unterminated pattern: missing closing '${delimiter}'`);
    }
    values.push(trimmed.slice(start, end));
    start = end + 1;
  }

  const trailing = trimmed.slice(start).trim();
  if (trailing !== '') {
    throw new ArgumentError(`Unexpected text after pattern: ${trailing}`);
  }
  return values;
}

function assertNoArguments(keyword: string, rest: string): void {
  if (rest.trim() !== '') {
    throw new ArgumentError(`${keyword} takes no arguments`);
  }
}

function parseSelectCopies(rest: string): FieldCopy[] {
  const copies: FieldCopy[] = [];
  let cursor = 0;

  for (const spec of rest.split(';')) {
    const trimmed = spec.trim();
    if (trimmed === '') continue;

    const parts = trimmed.split(',');
    if (parts.length !== 2 && parts.length !== 3) {
      throw new ArgumentError(`SELECT field '${trimmed}' requires offset,length[,destination]`);
    }
    const sourceOffset = parseInteger(parts[0] ?? '', 'Source offset');
    const length = parseInteger(parts[1] ?? '', 'Length');
    const destOffset = parts[2] !== undefined ? parseInteger(parts[2], 'Destination offset') : cursor;
    checkRange(sourceOffset, length, 'Source field');
    checkRange(destOffset, length, 'Destination field');

    copies.push({ sourceOffset, length, destOffset });
    cursor = destOffset + length;
  }

  if (copies.length === 0) {
    throw new ArgumentError('SELECT requires at least one field');
  }
  return copies;
}

/**
 * Domain service that turns DSL text into a `MultiPipelineSpec`.
 *
 * Keywords are case-insensitive. Lines may carry a leading `PIPE` keyword
 * and/or a `|` continuation marker; `#` starts a comment line; a line of
 * just `?` ends the current pipeline.
 */
export class PipelineParser {
  parse(text: string): MultiPipelineSpec {
    const groups: Command[][] = [[]];

    text.split('\n').forEach((raw, i) => {
      const lineNumber = i + 1;
      const trimmed = raw.trim();
      if (trimmed === '' || trimmed.startsWith('#')) return;

      if (trimmed === PIPELINE_TERMINATOR) {
        groups.push([]);
        return;
      }

      const body = this.stripMarkers(trimmed);
      if (body === '') return;

      const current = groups[groups.length - 1];
      current?.push(this.parseCommand(body, lineNumber));
    });

    // A trailing terminator does not open a new pipeline.
    if (groups.length > 1 && groups[groups.length - 1]?.length === 0) {
      groups.pop();
    }

    return { pipelines: groups.map((commands, index) => this.buildPipeline(commands, index)) };
  }

  /** Parse a single command line, e.g. `FILTER 18,10 = "SALES"`. */
  parseCommand(body: string, lineNumber: number): Command {
    const source = body.trim();
    try {
      return this.parseCommandBody(source, lineNumber);
    } catch (error) {
      if (error instanceof ArgumentError) {
        throw new ParseError(lineNumber, source, error.message);
      }
      throw error;
    }
  }

  private stripMarkers(line: string): string {
    let body = line;
    const pipeKeyword = /^PIPE(?:\s+|$)/i.exec(body);
    if (pipeKeyword) {
      body = body.slice(pipeKeyword[0].length);
    }
    if (body.startsWith('|')) {
      body = body.slice(1);
    }
    return body.trim();
  }

  private parseCommandBody(source: string, line: number): Command {
    const first = source.charAt(0);
    if (first === '<' || first === '>') {
      const path = source.slice(1).trim();
      if (path === '') {
        throw new ArgumentError(`'${first}' requires a file name`);
      }
      return first === '<' ? { kind: 'readFile', path, line, source } : { kind: 'writeFile', path, line, source };
    }

    const keywordMatch = KEYWORD.exec(source);
    if (!keywordMatch) {
      throw new ArgumentError(`Unknown command: ${source.split(/\s+/)[0] ?? source}`);
    }
    const keyword = keywordMatch[0].toUpperCase();
    const rest = source.slice(keywordMatch[0].length);

    switch (keyword) {
      case 'CONSOLE':
        assertNoArguments(keyword, rest);
        return { kind: 'console', line, source };
      case 'FILTER':
        return { kind: 'filter', ...this.parseFilterArguments(rest), line, source };
      case 'LOCATE':
      case 'NLOCATE': {
        const rangeMatch = RANGE_PREFIX.exec(rest.trim());
        const range = rangeMatch ? parseRange(`${rangeMatch[1] ?? ''},${rangeMatch[2] ?? ''}`) : undefined;
        const [pattern = ''] = parseDelimited(rangeMatch ? (rangeMatch[3] ?? '') : rest, 1);
        if (pattern === '') {
          throw new ArgumentError(`${keyword} pattern must not be empty`);
        }
        assertPrintable(pattern, `${keyword} pattern`);
        const kind = keyword === 'LOCATE' ? 'locate' : 'nlocate';
        return range ? { kind, pattern, range, line, source } : { kind, pattern, line, source };
      }
      case 'CHANGE': {
        const [from = '', to = ''] = parseDelimited(rest, 2);
        if (from === '') {
          throw new ArgumentError('CHANGE search string must not be empty');
        }
        assertPrintable(from, 'CHANGE search string');
        assertPrintable(to, 'CHANGE replacement');
        return { kind: 'change', from, to, line, source };
      }
      case 'SELECT':
        return { kind: 'select', copies: parseSelectCopies(rest), line, source };
      case 'UPPER':
      case 'LOWER':
      case 'REVERSE':
        assertNoArguments(keyword, rest);
        return { kind: keyword === 'UPPER' ? 'upper' : keyword === 'LOWER' ? 'lower' : 'reverse', line, source };
      case 'TAKE':
      case 'SKIP': {
        if (rest.trim() === '') {
          throw new ArgumentError(`${keyword} requires a number`);
        }
        const count = parseInteger(rest, `${keyword} count`);
        return { kind: keyword === 'TAKE' ? 'take' : 'skip', count, line, source };
      }
      case 'DUPLICATE': {
        const copies = rest.trim() === '' ? 2 : parseInteger(rest, 'DUPLICATE count');
        if (copies < 1) {
          throw new ArgumentError('DUPLICATE count must be at least 1');
        }
        if (copies > MAX_DUPLICATES) {
          throw new ArgumentError(`DUPLICATE count must be at most ${String(MAX_DUPLICATES)}`);
        }
        return { kind: 'duplicate', copies, line, source };
      }
      case 'COUNT':
      case 'HOLE':
        assertNoArguments(keyword, rest);
        return { kind: keyword === 'COUNT' ? 'count' : 'hole', line, source };
      case 'LITERAL': {
        const text = assertPrintable(parseQuoted(rest), 'LITERAL text');
        return { kind: 'literal', text, line, source };
      }
      default:
        throw new ArgumentError(`Unknown command: ${keywordMatch[0]}`);
    }
  }

  private parseFilterArguments(rest: string): { range: FieldRange; operator: FilterOperator; value: string } {
    const match = FILTER_ARGS.exec(rest.trim());
    if (!match) {
      throw new ArgumentError('FILTER requires = or != operator');
    }
    const range = parseRange(match[1] ?? '');
    const operator: FilterOperator = match[2] === '!=' ? '!=' : '=';
    const value = assertPrintable(parseQuoted(match[3] ?? ''), 'FILTER value');
    return { range, operator, value };
  }

  private buildPipeline(commands: readonly Command[], index: number): Pipeline {
    if (commands.length === 0) return emptyPipeline(index);

    let source: PipelineSource = { kind: 'upstream' };
    let sink: PipelineSink = { kind: 'console' };
    const stages: StageCommand[] = [];

    for (const [position, command] of commands.entries()) {
      if (command.kind === 'readFile') {
        if (position !== 0) {
          throw new ParseError(command.line, command.source, "'<' must be the first command of a pipeline");
        }
        source = { kind: 'file', path: command.path };
        continue;
      }
      if (command.kind === 'writeFile') {
        if (position !== commands.length - 1) {
          throw new ParseError(command.line, command.source, "'>' must be the last command of a pipeline");
        }
        sink = { kind: 'file', path: command.path };
      }
      stages.push(command);
    }

    return { index, source, stages, sink };
  }
}

/** Parse DSL text with a fresh `PipelineParser`. */
export function parsePipelines(text: string): MultiPipelineSpec {
  return new PipelineParser().parse(text);
}
