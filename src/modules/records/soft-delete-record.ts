export type RecordPayload = Record<string, unknown>;

/**
 * A stored item with its lifecycle flag. `deleted` alone decides visibility;
 * soft-deleting never removes the row.
 */
export interface SoftDeleteRecord {
  readonly id: string;
  readonly deleted: boolean;
  readonly payload: RecordPayload;
}

// Ids are positive decimal integers allocated by the persistence backend
export const RECORD_ID_PATTERN = /^[1-9][0-9]*$/;

// Upper bound of the PostgreSQL `integer` id column; no record can carry a larger id
export const MAX_RECORD_ID = 2147483647;

export function isWellFormedRecordId(id: string): boolean {
  return RECORD_ID_PATTERN.test(id);
}

/** Whether a well-formed id falls inside the range ids are allocated from. */
export function isRecordIdInRange(id: string): boolean {
  return id.length <= String(MAX_RECORD_ID).length && Number(id) <= MAX_RECORD_ID;
}

export function copyRecord(record: SoftDeleteRecord): SoftDeleteRecord {
  return {
    id: record.id,
    deleted: record.deleted,
    payload: structuredClone(record.payload),
  };
}
