import type { ChalkInstance } from 'chalk';
import { commandLabel } from '@recpipe/core';
import type { DebugSnapshot, FixedRecord, MultiPipelineSpec, Pipeline, WatchReading } from '@recpipe/core';

function recordList(records: readonly FixedRecord[]): string {
  return records.length === 0 ? '(none)' : records.map((r) => r.trimmed()).join(' | ');
}

function describeReading(reading: WatchReading, chalk: ChalkInstance): string {
  switch (reading.kind) {
    case 'records':
      return recordList(reading.records);
    case 'notReached':
      return chalk.gray('not reached');
    case 'notApplicable':
      return chalk.gray('not applicable');
  }
}

/**
 * One debugger position as text: a header line with the step label and pipe
 * point, followed by one indented line per watch.
 */
export function renderSnapshot(snapshot: DebugSnapshot, chalk: ChalkInstance): string {
  const { position } = snapshot;
  const lines: string[] = [];

  if (position.kind === 'atPipePoint' || position.kind === 'atFlush') {
    const marker = snapshot.pausedAtBreakpoint ? chalk.yellow('* ') : '  ';
    lines.push(
      `${marker}${chalk.bold(snapshot.stepLabel)}, pipe point ${String(position.pipePoint)}: ${recordList(snapshot.records)}`,
    );
  } else if (position.kind === 'finished') {
    lines.push(
      chalk.green(`Finished after ${String(snapshot.steps)} steps: ${String(snapshot.output.length)} output records`),
    );
  }

  for (const watch of snapshot.watches) {
    lines.push(`    ${watch.label} [${String(watch.position)}]: ${describeReading(watch.reading, chalk)}`);
  }

  return lines.join('\n');
}

function describePipeline(pipeline: Pipeline): string {
  const source = pipeline.source.kind === 'file' ? `< ${pipeline.source.path}` : 'upstream';
  const sink = pipeline.sink.kind === 'file' ? `> ${pipeline.sink.path}` : 'console';
  const count = pipeline.stages.length;
  return `Pipeline ${String(pipeline.index + 1)} (${source} -> ${sink}): ${String(count)} ${count === 1 ? 'stage' : 'stages'}`;
}

/** The parsed structure of a DSL file, one block per pipeline. */
export function renderSpec(spec: MultiPipelineSpec, chalk: ChalkInstance): string {
  const lines: string[] = [];

  for (const pipeline of spec.pipelines) {
    lines.push(chalk.bold(describePipeline(pipeline)));
    pipeline.stages.forEach((stage, i) => {
      lines.push(`  ${String(i + 1)}. ${commandLabel(stage).padEnd(9)} ${chalk.gray(`line ${String(stage.line)}`)}  ${stage.source}`);
    });
  }

  return lines.join('\n');
}
