import { describe, it, expect } from 'vitest';
import { InMemoryRecordStore } from '../../../src/infrastructure/stores/InMemoryRecordStore.js';
import { recordsFromText } from '../../../src/domain/model/FixedRecord.js';
import { RecordStoreError } from '../../../src/domain/errors/RecordStoreError.js';

describe('InMemoryRecordStore', () => {
  it('should return what was written', () => {
    const store = new InMemoryRecordStore();
    const records = recordsFromText('A\nB');

    store.write('out.txt', records);

    expect(store.has('out.txt')).toBe(true);
    expect(store.read('out.txt')).toEqual(records);
  });

  it('should be seeded from an initial map', () => {
    const store = new InMemoryRecordStore({ 'in.txt': recordsFromText('X') });
    expect(store.has('in.txt')).toBe(true);
    expect(store.read('in.txt').map((r) => r.trimmed())).toEqual(['X']);
  });

  it('should overwrite on a second write', () => {
    const store = new InMemoryRecordStore();
    store.write('out.txt', recordsFromText('OLD'));
    store.write('out.txt', recordsFromText('NEW'));
    expect(store.read('out.txt').map((r) => r.trimmed())).toEqual(['NEW']);
  });

  it('should throw RecordStoreError for unknown names', () => {
    const store = new InMemoryRecordStore();
    expect(() => store.read('missing.txt')).toThrow(RecordStoreError);
    expect(() => store.read('missing.txt')).toThrow("Cannot read records at 'missing.txt': No such file");
  });
});
