import { Command, CommanderError } from 'commander';
import chalk, { Chalk } from 'chalk';
import type { ChalkInstance } from 'chalk';
import { ParseError } from '@recpipe/core';
import { createCommandContext } from './context.js';
import type { CliIO } from './io.js';
import { processIO } from './io.js';
import { registerRunCommand } from './commands/run.js';
import { registerTraceCommand } from './commands/trace.js';
import { registerCheckCommand } from './commands/check.js';

export type { CliIO } from './io.js';
export { processIO } from './io.js';

const VERSION = '0.1.0';

function formatError(error: unknown, colors: ChalkInstance): string {
  if (error instanceof ParseError) {
    return `${colors.red(`Error: ${error.message}`)}\n${colors.gray(`  ${String(error.line)} | ${error.lineText}`)}\n`;
  }
  const message = error instanceof Error ? error.message : String(error);
  return `${colors.red(`Error: ${message}`)}\n`;
}

/**
 * Build the `recpipe` program. Commander's own errors throw a
 * `CommanderError` instead of exiting; command failures go through `onFailure`.
 */
export function createProgram(io: CliIO, onFailure: (exitCode: number) => void): Command {
  const colors = io.color === undefined ? chalk : new Chalk({ level: io.color ? 1 : 0 });
  const ctx = createCommandContext(io, colors, (error) => {
    io.err(formatError(error, colors));
    onFailure(1);
  });

  const program = new Command()
    .name('recpipe')
    .description('Run and step through fixed-width record pipelines')
    .version(VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.out(text),
      writeErr: (text) => io.err(text),
    });

  registerRunCommand(program, ctx);
  registerTraceCommand(program, ctx);
  registerCheckCommand(program, ctx);

  return program;
}

/** Run the CLI with user arguments (no `node` or script path) and return the exit code. */
export function runCli(args: readonly string[], io: CliIO = processIO()): number {
  let exitCode = 0;
  const program = createProgram(io, (code) => {
    exitCode = code;
  });

  try {
    program.parse([...args], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  return exitCode;
}
