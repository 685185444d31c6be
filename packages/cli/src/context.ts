import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { ChalkInstance } from 'chalk';
import { FileRecordStore, PipelineEngine, RecordStoreError, createLogger } from '@recpipe/core';
import type { ExecutorKind } from '@recpipe/core';
import type { CliIO } from './io.js';

/** What every command needs: output channels, colours and a way to build an engine. */
export interface CommandContext {
  readonly io: CliIO;
  readonly chalk: ChalkInstance;
  /** Record store rooted at the working directory. */
  readonly store: FileRecordStore;
  createEngine(executor?: ExecutorKind): PipelineEngine;
  /** Read a DSL file relative to the working directory. */
  readPipeline(path: string): string;
  /** Report an error and mark the run as failed. */
  fail(error: unknown): void;
}

export function createCommandContext(
  io: CliIO,
  chalk: ChalkInstance,
  fail: (error: unknown) => void,
): CommandContext {
  const store = new FileRecordStore({ baseDir: io.cwd });

  return {
    io,
    chalk,
    store,
    createEngine: (executor) => new PipelineEngine({ executor, recordStore: store, logger: createLogger('cli') }),
    readPipeline: (path) => {
      try {
        return readFileSync(resolve(io.cwd, path), 'utf-8');
      } catch (error) {
        throw new RecordStoreError(path, 'read', error);
      }
    },
    fail,
  };
}
