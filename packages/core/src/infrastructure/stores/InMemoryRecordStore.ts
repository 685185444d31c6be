import type { RecordStore } from '../../domain/ports/RecordStore.js';
import type { FixedRecord } from '../../domain/model/FixedRecord.js';
import { RecordStoreError } from '../../domain/errors/RecordStoreError.js';

/** Non-persistent record store. Used as the default when no custom `RecordStore` is provided. */
export class InMemoryRecordStore implements RecordStore {
  private readonly files = new Map<string, readonly FixedRecord[]>();

  constructor(initial?: Readonly<Record<string, readonly FixedRecord[]>>) {
    for (const [path, records] of Object.entries(initial ?? {})) {
      this.files.set(path, [...records]);
    }
  }

  read(path: string): readonly FixedRecord[] {
    const records = this.files.get(path);
    if (!records) {
      throw new RecordStoreError(path, 'read', new Error('No such file'));
    }
    return records;
  }

  write(path: string, records: readonly FixedRecord[]): void {
    this.files.set(path, [...records]);
  }

  /** Whether something was written under `path`. */
  has(path: string): boolean {
    return this.files.has(path);
  }
}
