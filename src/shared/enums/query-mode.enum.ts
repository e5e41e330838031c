export enum QueryMode {
  ACTIVE_ONLY = 'active_only', // Hide soft-deleted records (default)
  INCLUDE_DELETED = 'include_deleted', // Active and soft-deleted records
  DELETED_ONLY = 'deleted_only', // Only soft-deleted records (trash view)
}
