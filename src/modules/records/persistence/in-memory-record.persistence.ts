import { Injectable } from '@nestjs/common';
import { SortOrder } from 'src/shared/enums';
import { SoftDeleteRecord, copyRecord } from '../soft-delete-record';
import { matchesCriteria } from '../visibility/visibility-policy';
import { RecordPersistence, ScanQuery } from './record-persistence';

@Injectable()
export class InMemoryRecordPersistence implements RecordPersistence {
  // Map iteration order is insertion order, which is also id order
  private readonly records = new Map<string, SoftDeleteRecord>();
  private lastId = 0;

  async nextId(): Promise<string> {
    this.lastId += 1;
    return String(this.lastId);
  }

  async load(id: string): Promise<SoftDeleteRecord | null> {
    const record = this.records.get(id);
    return record ? copyRecord(record) : null;
  }

  async save(record: SoftDeleteRecord): Promise<void> {
    this.records.set(record.id, copyRecord(record));
  }

  async *scan(query: ScanQuery): AsyncIterable<SoftDeleteRecord> {
    const snapshot = [...this.records.values()];
    if (query.order === SortOrder.DESC) {
      snapshot.reverse();
    }

    for (const record of snapshot) {
      if (matchesCriteria(record, query.where)) {
        yield copyRecord(record);
      }
    }
  }

  async erase(id: string): Promise<void> {
    this.records.delete(id);
  }
}
