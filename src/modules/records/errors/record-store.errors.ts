export enum RecordStoreErrorKind {
  NOT_FOUND = 'not_found',
  STORAGE_UNAVAILABLE = 'storage_unavailable',
  INVALID_ARGUMENT = 'invalid_argument',
}

export interface RecordNotFoundError {
  kind: RecordStoreErrorKind.NOT_FOUND;
  id: string;
}

export interface StorageUnavailableError {
  kind: RecordStoreErrorKind.STORAGE_UNAVAILABLE;
  message: string;
}

export interface InvalidArgumentError {
  kind: RecordStoreErrorKind.INVALID_ARGUMENT;
  message: string;
}

export type RecordStoreError = RecordNotFoundError | StorageUnavailableError | InvalidArgumentError;

export const notFound = (id: string): RecordNotFoundError => ({
  kind: RecordStoreErrorKind.NOT_FOUND,
  id,
});

export const storageUnavailable = (cause: unknown): StorageUnavailableError => ({
  kind: RecordStoreErrorKind.STORAGE_UNAVAILABLE,
  message: cause instanceof Error ? cause.message : 'Unknown storage error',
});

export const invalidArgument = (message: string): InvalidArgumentError => ({
  kind: RecordStoreErrorKind.INVALID_ARGUMENT,
  message,
});

export function describeRecordStoreError(error: RecordStoreError): string {
  switch (error.kind) {
    case RecordStoreErrorKind.NOT_FOUND:
      return `Record ${error.id} not found`;
    case RecordStoreErrorKind.STORAGE_UNAVAILABLE:
      return `Storage unavailable: ${error.message}`;
    case RecordStoreErrorKind.INVALID_ARGUMENT:
      return error.message;
  }
}

/**
 * Carries a store error through channels that can only reject, such as
 * async iteration over a record sequence.
 */
export class RecordStoreFailure extends Error {
  constructor(readonly error: RecordStoreError) {
    super(describeRecordStoreError(error));
    this.name = 'RecordStoreFailure';
  }
}
