import { Result, err, ok } from 'src/common/types/result';
import { QueryMode } from 'src/shared/enums';
import { RecordStoreError, RecordStoreFailure, storageUnavailable } from './errors/record-store.errors';
import { RecordPersistence, ScanQuery } from './persistence/record-persistence';
import { SoftDeleteRecord } from './soft-delete-record';
import { isVisible } from './visibility/visibility-policy';

export interface SequenceWindow {
  offset: number;
  limit?: number;
}

/**
 * Lazy view over the visible records of a store. Nothing is read until the
 * sequence is iterated, and every iteration starts a fresh scan.
 */
export class RecordSequence implements AsyncIterable<SoftDeleteRecord> {
  constructor(
    private readonly persistence: RecordPersistence,
    private readonly mode: QueryMode,
    private readonly query: ScanQuery,
    private readonly window: SequenceWindow,
  ) {}

  async *[Symbol.asyncIterator](): AsyncGenerator<SoftDeleteRecord> {
    const { offset, limit } = this.window;
    let skipped = 0;
    let emitted = 0;

    try {
      for await (const record of this.persistence.scan(this.query)) {
        if (!isVisible(record, this.mode)) {
          continue;
        }
        if (skipped < offset) {
          skipped++;
          continue;
        }

        yield record;
        emitted++;
        if (limit !== undefined && emitted >= limit) {
          return;
        }
      }
    } catch (error) {
      if (error instanceof RecordStoreFailure) {
        throw error;
      }
      throw new RecordStoreFailure(storageUnavailable(error));
    }
  }

  async collect(): Promise<Result<SoftDeleteRecord[], RecordStoreError>> {
    const records: SoftDeleteRecord[] = [];
    try {
      for await (const record of this) {
        records.push(record);
      }
    } catch (error) {
      if (error instanceof RecordStoreFailure) {
        return err(error.error);
      }
      return err(storageUnavailable(error));
    }
    return ok(records);
  }
}
