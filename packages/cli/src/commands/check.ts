import type { Command } from 'commander';
import { parsePipelines } from '@recpipe/core';
import type { CommandContext } from '../context.js';
import { renderSpec } from '../render.js';

/** `recpipe check <pipeline>`: parse a DSL file and list its pipelines and stages. */
export function registerCheckCommand(program: Command, ctx: CommandContext): void {
  program
    .command('check')
    .description('Parse a pipeline file and list its stages')
    .argument('<pipeline>', 'Pipeline DSL file')
    .action((pipelinePath: string) => {
      try {
        const spec = parsePipelines(ctx.readPipeline(pipelinePath));
        ctx.io.out(`${renderSpec(spec, ctx.chalk)}\n`);
      } catch (error) {
        ctx.fail(error);
      }
    });
}
