import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { CliIO } from '../src/program.js';

/** Captured stdout and stderr of an in-process CLI run. */
export interface CapturedIO extends CliIO {
  readonly stdout: string[];
  readonly stderr: string[];
}

export function captureIO(cwd: string): CapturedIO {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    cwd,
    color: false,
    stdout,
    stderr,
    out: (text) => stdout.push(text),
    err: (text) => stderr.push(text),
  };
}

export interface Workspace {
  readonly dir: string;
  write(name: string, content: string): void;
  cleanup(): void;
}

export function createWorkspace(): Workspace {
  const dir = mkdtempSync(join(tmpdir(), 'recpipe-cli-'));
  return {
    dir,
    write: (name, content) => writeFileSync(join(dir, name), content),
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}
