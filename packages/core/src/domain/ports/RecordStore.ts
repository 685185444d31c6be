import type { FixedRecord } from '../model/FixedRecord.js';

/**
 * Port that resolves the file names of `<` sources and `>` sinks to record
 * sequences. Synchronous: a run completes within one call.
 *
 * Implementations raise `RecordStoreError` when a name cannot be read or written.
 */
export interface RecordStore {
  read(path: string): readonly FixedRecord[];
  write(path: string, records: readonly FixedRecord[]): void;
}
