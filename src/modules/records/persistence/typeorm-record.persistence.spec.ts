import { Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { QueryMode, SortOrder } from 'src/shared/enums';
import { RecordEntity } from '../entities/record.entity';
import { RecordStoreErrorKind } from '../errors/record-store.errors';
import { RecordStoreService } from '../record-store.service';
import { ScanQuery } from './record-persistence';
import { TypeOrmRecordPersistence } from './typeorm-record.persistence';

// In-process SQLite (sql.js) stands in for PostgreSQL
describe('TypeOrmRecordPersistence', () => {
  let dataSource: DataSource;
  let persistence: TypeOrmRecordPersistence;

  const drain = async (query: ScanQuery): Promise<string[]> => {
    const ids: string[] = [];
    for await (const record of persistence.scan(query)) {
      ids.push(record.id);
    }
    return ids;
  };

  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  beforeEach(async () => {
    dataSource = new DataSource({
      type: 'sqljs',
      entities: [RecordEntity],
      synchronize: true,
    });
    await dataSource.initialize();
    // A tiny batch size forces scans across several pages
    persistence = new TypeOrmRecordPersistence(dataSource.getRepository(RecordEntity), 2);
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  async function seed(count: number, deletedIds: string[] = []): Promise<void> {
    for (let i = 0; i < count; i++) {
      const id = await persistence.nextId();
      await persistence.save({ id, deleted: deletedIds.includes(id), payload: { index: i } });
    }
  }

  it('allocates ids after the highest stored id', async () => {
    expect(await persistence.nextId()).toBe('1');

    await seed(3);

    expect(await persistence.nextId()).toBe('4');
  });

  it('round-trips the flag and JSON payload', async () => {
    await persistence.save({ id: '1', deleted: false, payload: { name: 'A', tags: ['x', 'y'] } });

    expect(await persistence.load('1')).toEqual({
      id: '1',
      deleted: false,
      payload: { name: 'A', tags: ['x', 'y'] },
    });
    expect(await persistence.load('2')).toBeNull();
  });

  it('updates an existing row in place', async () => {
    await seed(1);
    await persistence.save({ id: '1', deleted: true, payload: { index: 0 } });

    expect(await persistence.load('1')).toEqual({ id: '1', deleted: true, payload: { index: 0 } });
    expect(await dataSource.getRepository(RecordEntity).count()).toBe(1);
  });

  it('pages through every row in both directions', async () => {
    await seed(5, ['2', '5']);

    expect(await drain({ where: {}, order: SortOrder.ASC })).toEqual(['1', '2', '3', '4', '5']);
    expect(await drain({ where: {}, order: SortOrder.DESC })).toEqual(['5', '4', '3', '2', '1']);
    expect(await drain({ where: { deleted: false }, order: SortOrder.ASC })).toEqual(['1', '3', '4']);
    expect(await drain({ where: { deleted: true }, order: SortOrder.DESC })).toEqual(['5', '2']);
  });

  it('erases rows', async () => {
    await seed(2);
    await persistence.erase('1');

    expect(await persistence.load('1')).toBeNull();
    expect(await drain({ where: {}, order: SortOrder.ASC })).toEqual(['2']);
  });

  it('backs the record store through a delete and restore cycle', async () => {
    const store = new RecordStoreService(persistence);

    const created = await store.create({ name: 'A' });
    expect(created).toEqual({ ok: true, value: { id: '1', deleted: false, payload: { name: 'A' } } });

    await store.softDelete('1');
    const active = store.list(QueryMode.ACTIVE_ONLY);
    const all = store.list(QueryMode.INCLUDE_DELETED);
    if (!active.ok || !all.ok) {
      throw new Error('list options were rejected');
    }

    expect(await active.value.collect()).toEqual({ ok: true, value: [] });
    expect(await all.value.collect()).toEqual({
      ok: true,
      value: [{ id: '1', deleted: true, payload: { name: 'A' } }],
    });

    await store.restore('1');
    expect(await store.get('1')).toEqual({
      ok: true,
      value: { id: '1', deleted: false, payload: { name: 'A' } },
    });
  });

  it('never resolves an out-of-range id to a stored record', async () => {
    const store = new RecordStoreService(persistence);
    await persistence.save({ id: '2147483647', deleted: false, payload: { name: 'last' } });

    expect(await store.get('2147483647')).toEqual({
      ok: true,
      value: { id: '2147483647', deleted: false, payload: { name: 'last' } },
    });
    expect(await store.get('9007199254740993')).toEqual({
      ok: false,
      error: { kind: RecordStoreErrorKind.NOT_FOUND, id: '9007199254740993' },
    });
    expect(await store.softDelete('3000000000')).toEqual({
      ok: false,
      error: { kind: RecordStoreErrorKind.NOT_FOUND, id: '3000000000' },
    });
    expect(await store.get('2147483647')).toMatchObject({ ok: true, value: { deleted: false } });
  });
});
