import { InvalidArgumentError } from 'commander';
import type { Command } from 'commander';
import type { DebugSession, DebugSnapshot } from '@recpipe/core';
import type { CommandContext } from '../context.js';
import { renderSnapshot } from '../render.js';

interface TraceOptions {
  readonly watch?: number[];
  readonly break?: number[];
  readonly run?: boolean;
  readonly pipeline: number;
}

function parseNonNegative(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return Number(value);
}

function parsePositive(value: string): number {
  const parsed = parseNonNegative(value);
  if (parsed === 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function collectPosition(value: string, previous: number[] | undefined): number[] {
  return [...(previous ?? []), parseNonNegative(value)];
}

function drive(session: DebugSession, untilBreakpoint: boolean, visit: (snapshot: DebugSnapshot) => void): void {
  let snapshot = session.snapshot();
  if (!untilBreakpoint) visit(snapshot);

  while (snapshot.position.kind !== 'finished') {
    snapshot = untilBreakpoint ? session.runToBreakpoint() : session.step();
    visit(snapshot);
  }
}

/**
 * `recpipe trace <pipeline> <input>`: step the record-at-a-time executor and
 * print every visited pipe point, or only breakpoint stops with `--run`.
 */
export function registerTraceCommand(program: Command, ctx: CommandContext): void {
  program
    .command('trace')
    .description('Step through a pipeline record by record')
    .argument('<pipeline>', 'Pipeline DSL file')
    .argument('<input>', 'Input file, one record per line')
    .option('-w, --watch <position>', 'Watch a pipe point (repeatable)', collectPosition)
    .option('-b, --break <position>', 'Set a breakpoint on a pipe point (repeatable)', collectPosition)
    .option('--run', 'Run from breakpoint to breakpoint instead of single steps')
    .option('-p, --pipeline <index>', 'Pipeline to trace, 1-based', parsePositive, 1)
    .action((pipelinePath: string, inputPath: string, options: TraceOptions) => {
      try {
        const engine = ctx.createEngine('rat');
        const input = ctx.store.read(inputPath);
        const session = engine.debug(input, ctx.readPipeline(pipelinePath), options.pipeline - 1);

        for (const position of options.watch ?? []) session.addWatch(position);
        for (const position of options.break ?? []) session.addBreakpoint(position);

        drive(session, options.run ?? false, (snapshot) => {
          ctx.io.out(`${renderSnapshot(snapshot, ctx.chalk)}\n`);
        });
      } catch (error) {
        ctx.fail(error);
      }
    });
}
