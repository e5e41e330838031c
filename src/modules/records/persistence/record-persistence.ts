import { SortOrder } from 'src/shared/enums';
import { SoftDeleteRecord } from '../soft-delete-record';
import { VisibilityCriteria } from '../visibility/visibility-policy';

export const RECORD_PERSISTENCE = Symbol('RECORD_PERSISTENCE');

export interface ScanQuery {
  where: VisibilityCriteria;
  order: SortOrder;
}

/**
 * Storage contract the record store is written against. Implementations may
 * throw on storage faults; the store turns those into StorageUnavailable.
 * Each call reads or writes one record atomically.
 */
export interface RecordPersistence {
  /** Allocates the next id. Callers serialize allocation. */
  nextId(): Promise<string>;
  load(id: string): Promise<SoftDeleteRecord | null>;
  save(record: SoftDeleteRecord): Promise<void>;
  /** Lazily yields records in id order, reading from storage as it goes. */
  scan(query: ScanQuery): AsyncIterable<SoftDeleteRecord>;
  erase(id: string): Promise<void>;
}
