import { QueryMode } from 'src/shared/enums';
import { SoftDeleteRecord } from '../soft-delete-record';

/**
 * Filter a backend can push into its own query. An absent `deleted` means
 * no restriction.
 */
export interface VisibilityCriteria {
  deleted?: boolean;
}

export function isVisible(record: Pick<SoftDeleteRecord, 'deleted'>, mode: QueryMode): boolean {
  switch (mode) {
    case QueryMode.ACTIVE_ONLY:
      return !record.deleted;
    case QueryMode.INCLUDE_DELETED:
      return true;
    case QueryMode.DELETED_ONLY:
      return record.deleted;
  }
}

export function visibilityCriteria(mode: QueryMode): VisibilityCriteria {
  switch (mode) {
    case QueryMode.ACTIVE_ONLY:
      return { deleted: false };
    case QueryMode.INCLUDE_DELETED:
      return {};
    case QueryMode.DELETED_ONLY:
      return { deleted: true };
  }
}

export function matchesCriteria(
  record: Pick<SoftDeleteRecord, 'deleted'>,
  criteria: VisibilityCriteria,
): boolean {
  return criteria.deleted === undefined || record.deleted === criteria.deleted;
}
