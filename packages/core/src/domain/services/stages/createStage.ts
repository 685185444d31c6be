import type { StageCommand } from '../../model/Command.js';
import type { Stage } from './Stage.js';
import { FilterStage, HoleStage, LocateStage, SkipStage, TakeStage } from './selection.js';
import { CaseStage, ChangeStage, DuplicateStage, PassthroughStage, SelectStage } from './transforms.js';
import { CountStage, LiteralStage } from './deferred.js';

/** Bind a command to fresh runtime state. */
export function createStage(command: StageCommand): Stage {
  const label = command.source;

  switch (command.kind) {
    case 'console':
    case 'writeFile':
      return new PassthroughStage(label);
    case 'filter':
      return new FilterStage(label, command.range, command.operator, command.value);
    case 'locate':
    case 'nlocate':
      return new LocateStage(label, command.pattern, command.kind === 'locate', command.range);
    case 'take':
      return new TakeStage(label, command.count);
    case 'skip':
      return new SkipStage(label, command.count);
    case 'hole':
      return new HoleStage(label);
    case 'select':
      return new SelectStage(label, command.copies);
    case 'change':
      return new ChangeStage(label, command.from, command.to);
    case 'upper':
    case 'lower':
    case 'reverse':
      return new CaseStage(label, command.kind);
    case 'duplicate':
      return new DuplicateStage(label, command.copies);
    case 'count':
      return new CountStage(label);
    case 'literal':
      return new LiteralStage(label, command.text);
  }
}

/** Fresh stage instances for one execution of a pipeline. */
export function createStages(commands: readonly StageCommand[]): Stage[] {
  return commands.map(createStage);
}
