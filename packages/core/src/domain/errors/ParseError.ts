import { PipelineError } from './PipelineError.js';

/** Malformed DSL: unknown keyword, bad number or range, unterminated pattern or quote. */
export class ParseError extends PipelineError {
  /** 1-based DSL line number. */
  readonly line: number;
  /** The offending line, trimmed. */
  readonly lineText: string;
  readonly reason: string;

  constructor(line: number, lineText: string, reason: string) {
    super(`Line ${String(line)}: ${reason}`, { code: 'PARSE_ERROR', details: { line, lineText, reason } });
    this.line = line;
    this.lineText = lineText;
    this.reason = reason;
  }
}
