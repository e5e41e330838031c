import { FindOptionsWhere, LessThan, MoreThan, Repository } from 'typeorm';
import { SortOrder } from 'src/shared/enums';
import { RecordEntity } from '../entities/record.entity';
import { SoftDeleteRecord } from '../soft-delete-record';
import { RecordPersistence, ScanQuery } from './record-persistence';

function toRecord(entity: RecordEntity): SoftDeleteRecord {
  return {
    id: String(entity.id),
    deleted: entity.deleted,
    payload: entity.payload,
  };
}

/**
 * RecordPersistence backed by a TypeORM repository. Scans page through the
 * table by primary key so a long listing never holds more than one batch.
 */
export class TypeOrmRecordPersistence implements RecordPersistence {
  constructor(
    private readonly repository: Repository<RecordEntity>,
    private readonly batchSize: number,
  ) {}

  async nextId(): Promise<string> {
    const lastId = await this.repository.maximum('id');
    return String((lastId ?? 0) + 1);
  }

  async load(id: string): Promise<SoftDeleteRecord | null> {
    const entity = await this.repository.findOne({ where: { id: Number(id) } });
    return entity ? toRecord(entity) : null;
  }

  async save(record: SoftDeleteRecord): Promise<void> {
    const entity = this.repository.create({
      id: Number(record.id),
      deleted: record.deleted,
      payload: record.payload,
    });
    await this.repository.save(entity);
  }

  async *scan(query: ScanQuery): AsyncIterable<SoftDeleteRecord> {
    const ascending = query.order === SortOrder.ASC;
    let cursor: number | null = null;

    while (true) {
      const where: FindOptionsWhere<RecordEntity> = {};
      if (query.where.deleted !== undefined) {
        where.deleted = query.where.deleted;
      }
      if (cursor !== null) {
        where.id = ascending ? MoreThan(cursor) : LessThan(cursor);
      }

      const batch = await this.repository.find({
        where,
        order: { id: ascending ? 'ASC' : 'DESC' },
        take: this.batchSize,
      });

      for (const entity of batch) {
        yield toRecord(entity);
      }

      if (batch.length < this.batchSize) {
        return;
      }
      cursor = batch[batch.length - 1].id;
    }
  }

  async erase(id: string): Promise<void> {
    await this.repository.delete({ id: Number(id) });
  }
}
