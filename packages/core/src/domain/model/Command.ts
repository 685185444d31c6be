import type { FieldCopy, FieldRange } from './FixedRecord.js';

/** Where a command came from in the DSL text. */
interface CommandBase {
  /** 1-based DSL line. */
  readonly line: number;
  /** The command text as written, without continuation markers. */
  readonly source: string;
}

export interface ConsoleCommand extends CommandBase {
  readonly kind: 'console';
}

/** `< path`: reads the pipeline's input from the record store. Head of a pipeline only. */
export interface ReadFileCommand extends CommandBase {
  readonly kind: 'readFile';
  readonly path: string;
}

/** `> path`: writes the pipeline's output to the record store. Tail of a pipeline only. */
export interface WriteFileCommand extends CommandBase {
  readonly kind: 'writeFile';
  readonly path: string;
}

export type FilterOperator = '=' | '!=';

export interface FilterCommand extends CommandBase {
  readonly kind: 'filter';
  readonly range: FieldRange;
  readonly operator: FilterOperator;
  readonly value: string;
}

export interface LocateCommand extends CommandBase {
  readonly kind: 'locate' | 'nlocate';
  readonly pattern: string;
  /** Restricts the search to one field; the whole record when absent. */
  readonly range?: FieldRange;
}

export interface ChangeCommand extends CommandBase {
  readonly kind: 'change';
  readonly from: string;
  readonly to: string;
}

export interface SelectCommand extends CommandBase {
  readonly kind: 'select';
  readonly copies: readonly FieldCopy[];
}

export interface CaseCommand extends CommandBase {
  readonly kind: 'upper' | 'lower' | 'reverse';
}

export interface CountedCommand extends CommandBase {
  readonly kind: 'take' | 'skip';
  readonly count: number;
}

export interface DuplicateCommand extends CommandBase {
  readonly kind: 'duplicate';
  readonly copies: number;
}

export interface LiteralCommand extends CommandBase {
  readonly kind: 'literal';
  readonly text: string;
}

export interface NullaryCommand extends CommandBase {
  readonly kind: 'count' | 'hole';
}

/** Closed set of DSL commands produced by the parser. */
export type Command =
  | ConsoleCommand
  | ReadFileCommand
  | WriteFileCommand
  | FilterCommand
  | LocateCommand
  | ChangeCommand
  | SelectCommand
  | CaseCommand
  | CountedCommand
  | DuplicateCommand
  | LiteralCommand
  | NullaryCommand;

export type CommandKind = Command['kind'];

/** Commands that can run as a stage (everything except the `<` source). */
export type StageCommand = Exclude<Command, ReadFileCommand>;

/** Short upper-case label used in traces and error messages, e.g. `FILTER` or `>`. */
export function commandLabel(command: Command): string {
  switch (command.kind) {
    case 'readFile':
      return '<';
    case 'writeFile':
      return '>';
    default:
      return command.kind.toUpperCase();
  }
}
