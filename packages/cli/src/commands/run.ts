import { Option } from 'commander';
import type { Command } from 'commander';
import { recordsToText } from '@recpipe/core';
import type { ExecutorKind } from '@recpipe/core';
import type { CommandContext } from '../context.js';

interface RunOptions {
  readonly output?: string;
  readonly executor: ExecutorKind;
  readonly quiet?: boolean;
}

/** `recpipe run <pipeline> <input>`: execute every pipeline of a DSL file over an input file. */
export function registerRunCommand(program: Command, ctx: CommandContext): void {
  program
    .command('run')
    .description('Run a pipeline file over an input file')
    .argument('<pipeline>', 'Pipeline DSL file')
    .argument('<input>', 'Input file, one record per line')
    .option('-o, --output <file>', 'Write output records to a file instead of stdout')
    .addOption(
      new Option('-e, --executor <kind>', 'Evaluation strategy').choices(['batch', 'rat']).default('batch'),
    )
    .option('-q, --quiet', 'Do not print the summary line')
    .action((pipelinePath: string, inputPath: string, options: RunOptions) => {
      try {
        const engine = ctx.createEngine(options.executor);
        const input = ctx.store.read(inputPath);
        const result = engine.execute(input, ctx.readPipeline(pipelinePath));

        if (options.output) {
          ctx.store.write(options.output, result.output);
        } else if (result.output.length > 0) {
          ctx.io.out(`${recordsToText(result.output)}\n`);
        }

        if (!options.quiet) {
          ctx.io.err(
            ctx.chalk.gray(`Processed ${String(input.length)} -> ${String(result.output.length)} records\n`),
          );
        }
      } catch (error) {
        ctx.fail(error);
      }
    });
}
