/** Where the CLI reads paths from and writes its text. Injected so tests run in process. */
export interface CliIO {
  /** Directory relative paths are resolved against. */
  readonly cwd: string;
  /** Force colours on or off; auto-detected when absent. */
  readonly color?: boolean;
  out(text: string): void;
  err(text: string): void;
}

export function processIO(): CliIO {
  return {
    cwd: process.cwd(),
    out: (text) => process.stdout.write(text),
    err: (text) => process.stderr.write(text),
  };
}
