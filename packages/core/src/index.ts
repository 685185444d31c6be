// Main entry point
export { PipelineEngine } from './PipelineEngine.js';
export type { PipelineEngineConfig, EngineInput, EngineSpec } from './PipelineEngine.js';

// Domain model
export { FixedRecord, RECORD_WIDTH, recordsFromText, recordsToText } from './domain/model/FixedRecord.js';
export type { FieldCopy, FieldRange } from './domain/model/FixedRecord.js';
export type {
  Command,
  CommandKind,
  StageCommand,
  ConsoleCommand,
  ReadFileCommand,
  WriteFileCommand,
  FilterCommand,
  FilterOperator,
  LocateCommand,
  ChangeCommand,
  SelectCommand,
  CaseCommand,
  CountedCommand,
  DuplicateCommand,
  LiteralCommand,
  NullaryCommand,
} from './domain/model/Command.js';
export { commandLabel } from './domain/model/Command.js';
export type { Pipeline, PipelineSource, PipelineSink, MultiPipelineSpec } from './domain/model/Pipeline.js';
export { emptyPipeline } from './domain/model/Pipeline.js';
export type { ExecutionTrace, RecordTrace, FlushTrace } from './domain/model/Trace.js';
export { flushPipePoint, pipePointCount } from './domain/model/Trace.js';
export type { DebugPosition, DebugState, Watch, WatchReading } from './domain/model/DebugState.js';
export { createDebugState, pipePointOf } from './domain/model/DebugState.js';

// Domain services
export { PipelineParser, parsePipelines, PIPELINE_TERMINATOR } from './domain/services/PipelineParser.js';
export type { Stage } from './domain/services/stages/Stage.js';
export { createStage, createStages } from './domain/services/stages/createStage.js';
export { StageChain } from './domain/services/StageChain.js';
export type { PipePointObserver } from './domain/services/StageChain.js';
export { BatchExecutor } from './domain/services/BatchExecutor.js';
export { RecordAtATimeExecutor } from './domain/services/RecordAtATimeExecutor.js';
export type { TracedExecution } from './domain/services/RecordAtATimeExecutor.js';
export { createExecutor } from './domain/services/executors.js';
export type { ExecutorKind, ExecutionResult, FlushSummary, PipelineExecutor } from './domain/services/executors.js';
export * as Debugger from './domain/services/Debugger.js';

// Errors
export { PipelineError, isPipelineError } from './domain/errors/PipelineError.js';
export type { PipelineErrorCode, PipelineErrorDetails } from './domain/errors/PipelineError.js';
export { ParseError } from './domain/errors/ParseError.js';
export { RecordFormatError } from './domain/errors/RecordFormatError.js';
export { FieldRangeError } from './domain/errors/FieldRangeError.js';
export { StageError } from './domain/errors/StageError.js';
export { RecordStoreError } from './domain/errors/RecordStoreError.js';

// Application
export { EventBus } from './application/EventBus.js';
export { DebugSession } from './application/DebugSession.js';
export type { DebugSnapshot, WatchSnapshot } from './application/DebugSession.js';
export { RunPipelines } from './application/usecases/RunPipelines.js';
export { PipelineFeed } from './application/PipelineFeed.js';
export type { MultiPipelineResult, RunPipelinesOptions } from './application/usecases/RunPipelines.js';

// Ports (for custom implementations)
export type { RecordStore } from './domain/ports/RecordStore.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  PipelineSummary,
  RunSummary,
  RunStartedEvent,
  PipelineStartedEvent,
  StageFlushedEvent,
  PipelineCompletedEvent,
  RunCompletedEvent,
  RunFailedEvent,
  DebugPausedEvent,
  DebugFinishedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters
export { InMemoryRecordStore } from './infrastructure/stores/InMemoryRecordStore.js';
export { FileRecordStore } from './infrastructure/stores/FileRecordStore.js';
export type { FileRecordStoreOptions } from './infrastructure/stores/FileRecordStore.js';
export { createLogger } from './infrastructure/logging/createLogger.js';
export { loggingConfig } from './config/logging.js';
export type { LogService } from './config/logging.js';
