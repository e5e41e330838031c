import { Inject, Injectable, Logger } from '@nestjs/common';
import { Result, err, ok } from 'src/common/types/result';
import { KeyedMutex } from 'src/common/utils/keyed-mutex';
import { QueryMode, SortOrder } from 'src/shared/enums';
import {
  RecordStoreError,
  invalidArgument,
  notFound,
  storageUnavailable,
} from './errors/record-store.errors';
import { RECORD_PERSISTENCE, RecordPersistence } from './persistence/record-persistence';
import { RecordSequence } from './record-sequence';
import {
  RecordPayload,
  SoftDeleteRecord,
  copyRecord,
  isRecordIdInRange,
  isWellFormedRecordId,
} from './soft-delete-record';
import { isVisible, visibilityCriteria } from './visibility/visibility-policy';

export interface ListOptions {
  order?: SortOrder;
  offset?: number;
  limit?: number;
}

type StoreResult<T> = Result<T, RecordStoreError>;

// Record ids are all digits, so this key never collides with a per-record lock
const CREATE_LOCK = 'create';

/**
 * Owns every record and its `deleted` flag. Reads take an explicit query mode;
 * nothing here toggles shared filter state. Operations on one id are
 * serialized, and each returns a fresh copy of the record.
 */
@Injectable()
export class RecordStoreService {
  private readonly logger = new Logger(RecordStoreService.name);
  private readonly locks = new KeyedMutex();

  constructor(
    @Inject(RECORD_PERSISTENCE)
    private readonly persistence: RecordPersistence,
  ) {}

  async create(payload: RecordPayload): Promise<StoreResult<SoftDeleteRecord>> {
    try {
      const record = await this.locks.runExclusive(CREATE_LOCK, async () => {
        const created: SoftDeleteRecord = {
          id: await this.persistence.nextId(),
          deleted: false,
          payload: structuredClone(payload),
        };
        await this.persistence.save(created);
        return created;
      });

      this.logger.debug(`Created record ${record.id}`);
      return ok(copyRecord(record));
    } catch (error) {
      return this.storageFailure('create', error);
    }
  }

  async get(id: string, mode: QueryMode = QueryMode.ACTIVE_ONLY): Promise<StoreResult<SoftDeleteRecord>> {
    const idError = this.checkId(id);
    if (idError) {
      return err(idError);
    }

    try {
      return await this.locks.runExclusive<StoreResult<SoftDeleteRecord>>(id, async () => {
        const record = await this.persistence.load(id);
        // A record hidden by the mode is reported exactly like a missing one
        if (!record || !isVisible(record, mode)) {
          return err(notFound(id));
        }
        return ok(record);
      });
    } catch (error) {
      return this.storageFailure('load', error);
    }
  }

  list(mode: QueryMode = QueryMode.ACTIVE_ONLY, options: ListOptions = {}): StoreResult<RecordSequence> {
    const { order = SortOrder.ASC, offset = 0, limit } = options;

    if (!Number.isInteger(offset) || offset < 0) {
      return err(invalidArgument('offset must be a non-negative integer'));
    }
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
      return err(invalidArgument('limit must be a positive integer'));
    }

    const query = { where: visibilityCriteria(mode), order };
    return ok(new RecordSequence(this.persistence, mode, query, { offset, limit }));
  }

  softDelete(id: string): Promise<StoreResult<SoftDeleteRecord>> {
    return this.setDeleted(id, true);
  }

  restore(id: string): Promise<StoreResult<SoftDeleteRecord>> {
    return this.setDeleted(id, false);
  }

  async hardDelete(id: string): Promise<StoreResult<void>> {
    const idError = this.checkId(id);
    if (idError) {
      return err(idError);
    }

    try {
      return await this.locks.runExclusive<StoreResult<void>>(id, async () => {
        const record = await this.persistence.load(id);
        if (!record) {
          return err(notFound(id));
        }
        await this.persistence.erase(id);
        this.logger.debug(`Erased record ${id}`);
        return ok(undefined);
      });
    } catch (error) {
      return this.storageFailure('erase', error);
    }
  }

  private async setDeleted(id: string, deleted: boolean): Promise<StoreResult<SoftDeleteRecord>> {
    const idError = this.checkId(id);
    if (idError) {
      return err(idError);
    }

    const operation = deleted ? 'soft-delete' : 'restore';
    try {
      return await this.locks.runExclusive<StoreResult<SoftDeleteRecord>>(id, async () => {
        const current = await this.persistence.load(id);
        if (!current) {
          return err(notFound(id));
        }
        // Idempotent: a record already in the target state is returned as is
        if (current.deleted === deleted) {
          return ok(current);
        }

        const updated: SoftDeleteRecord = { ...current, deleted };
        await this.persistence.save(updated);
        this.logger.debug(`Record ${id}: ${operation} applied`);
        return ok(updated);
      });
    } catch (error) {
      return this.storageFailure(operation, error);
    }
  }

  private checkId(id: string): RecordStoreError | null {
    if (!isWellFormedRecordId(id)) {
      return invalidArgument(`Malformed record id: ${id}`);
    }
    // Out-of-range ids cannot exist, and must not reach a backend that would round or reject them
    if (!isRecordIdInRange(id)) {
      return notFound(id);
    }
    return null;
  }

  private storageFailure(operation: string, error: unknown): StoreResult<never> {
    const failure = storageUnavailable(error);
    this.logger.error(`Failed to ${operation} record: ${failure.message}`);
    return err(failure);
  }
}
