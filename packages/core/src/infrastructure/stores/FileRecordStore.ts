import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import type { RecordStore } from '../../domain/ports/RecordStore.js';
import type { FixedRecord } from '../../domain/model/FixedRecord.js';
import { recordsFromText, recordsToText } from '../../domain/model/FixedRecord.js';
import { RecordStoreError } from '../../domain/errors/RecordStoreError.js';

export interface FileRecordStoreOptions {
  /** Directory relative names are resolved against. Default: `process.cwd()`. */
  readonly baseDir?: string;
  /** Encoding for reading and writing. Default: `'utf-8'`. */
  readonly encoding?: BufferEncoding;
}

/**
 * Record store backed by plain text files, one record per line. Node.js only.
 *
 * Files are read whole; a line that is not a valid record fails the read with
 * the `RecordFormatError` naming the line. Written files end with a newline.
 */
export class FileRecordStore implements RecordStore {
  private readonly baseDir: string;
  private readonly encoding: BufferEncoding;

  constructor(options?: FileRecordStoreOptions) {
    this.baseDir = options?.baseDir ?? process.cwd();
    this.encoding = options?.encoding ?? 'utf-8';
  }

  read(path: string): readonly FixedRecord[] {
    let content: string;
    try {
      content = readFileSync(this.resolvePath(path), { encoding: this.encoding });
    } catch (error) {
      throw new RecordStoreError(path, 'read', error);
    }
    return recordsFromText(content);
  }

  write(path: string, records: readonly FixedRecord[]): void {
    const target = this.resolvePath(path);
    try {
      mkdirSync(dirname(target), { recursive: true });
      writeFileSync(target, records.length > 0 ? `${recordsToText(records)}\n` : '', { encoding: this.encoding });
    } catch (error) {
      throw new RecordStoreError(path, 'write', error);
    }
  }

  /** Absolute path of a store-relative name. */
  resolvePath(path: string): string {
    return resolve(this.baseDir, path);
  }
}
