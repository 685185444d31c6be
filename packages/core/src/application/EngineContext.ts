import type { Logger } from 'winston';
import type { RecordStore } from '../domain/ports/RecordStore.js';
import type { ExecutorKind } from '../domain/services/executors.js';
import { PipelineParser } from '../domain/services/PipelineParser.js';
import { EventBus } from './EventBus.js';

/**
 * Shared collaborators for every use case run by one `PipelineEngine`.
 *
 * Internal: created by the engine from its config and handed to the use
 * cases in `application/usecases/`.
 */
export class EngineContext {
  readonly eventBus: EventBus;
  readonly parser = new PipelineParser();

  constructor(
    readonly executor: ExecutorKind,
    readonly recordStore: RecordStore,
    readonly logger: Logger,
    readonly traceByDefault: boolean,
  ) {
    this.eventBus = new EventBus(logger);
  }
}
