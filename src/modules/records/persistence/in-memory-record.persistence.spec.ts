import { SortOrder } from 'src/shared/enums';
import { SoftDeleteRecord } from '../soft-delete-record';
import { InMemoryRecordPersistence } from './in-memory-record.persistence';
import { ScanQuery } from './record-persistence';

async function drain(persistence: InMemoryRecordPersistence, query: ScanQuery): Promise<string[]> {
  const ids: string[] = [];
  for await (const record of persistence.scan(query)) {
    ids.push(record.id);
  }
  return ids;
}

describe('InMemoryRecordPersistence', () => {
  let persistence: InMemoryRecordPersistence;

  beforeEach(async () => {
    persistence = new InMemoryRecordPersistence();
    const seed: SoftDeleteRecord[] = [
      { id: await persistence.nextId(), deleted: false, payload: { name: 'A' } },
      { id: await persistence.nextId(), deleted: true, payload: { name: 'B' } },
      { id: await persistence.nextId(), deleted: false, payload: { name: 'C' } },
    ];
    for (const record of seed) {
      await persistence.save(record);
    }
  });

  it('allocates increasing ids even after an erase', async () => {
    await persistence.erase('3');

    expect(await persistence.nextId()).toBe('4');
  });

  it('returns null for unknown ids', async () => {
    expect(await persistence.load('9')).toBeNull();
  });

  it('stores a copy of what it is given', async () => {
    const record: SoftDeleteRecord = { id: '1', deleted: false, payload: { nested: { n: 1 } } };
    await persistence.save(record);
    record.payload.nested = 'replaced';

    expect(await persistence.load('1')).toEqual({ id: '1', deleted: false, payload: { nested: { n: 1 } } });
  });

  it('scans in insertion order and applies criteria', async () => {
    expect(await drain(persistence, { where: {}, order: SortOrder.ASC })).toEqual(['1', '2', '3']);
    expect(await drain(persistence, { where: { deleted: false }, order: SortOrder.ASC })).toEqual([
      '1',
      '3',
    ]);
    expect(await drain(persistence, { where: { deleted: true }, order: SortOrder.DESC })).toEqual(['2']);
    expect(await drain(persistence, { where: {}, order: SortOrder.DESC })).toEqual(['3', '2', '1']);
  });

  it('keeps the position of a record that is updated in place', async () => {
    await persistence.save({ id: '1', deleted: true, payload: { name: 'A' } });

    expect(await drain(persistence, { where: {}, order: SortOrder.ASC })).toEqual(['1', '2', '3']);
  });
});
