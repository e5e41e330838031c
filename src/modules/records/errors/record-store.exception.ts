import { Result } from 'src/common/types/result';
import { RecordStoreError, describeRecordStoreError } from './record-store.errors';

/**
 * Raised at the HTTP edge when a store call returns an error value;
 * RecordStoreExceptionFilter turns it into a response.
 */
export class RecordStoreException extends Error {
  constructor(readonly error: RecordStoreError) {
    super(describeRecordStoreError(error));
    this.name = 'RecordStoreException';
  }
}

export function unwrapOrThrow<T>(result: Result<T, RecordStoreError>): T {
  if (!result.ok) {
    throw new RecordStoreException(result.error);
  }
  return result.value;
}
