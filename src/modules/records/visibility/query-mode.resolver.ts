import { QueryMode } from 'src/shared/enums';

const TRUE_TOKENS = new Set(['true', '1', 'yes', 'on']);

function isTruthyFlag(raw: unknown): boolean {
  if (raw === true) {
    return true;
  }
  if (typeof raw === 'string') {
    return TRUE_TOKENS.has(raw.trim().toLowerCase());
  }
  return false;
}

/**
 * Maps an untrusted `showDeleted` value to a query mode. Anything that is not
 * a recognised "true" falls back to ACTIVE_ONLY instead of erroring.
 */
export function resolveQueryMode(raw: unknown): QueryMode {
  return isTruthyFlag(raw) ? QueryMode.INCLUDE_DELETED : QueryMode.ACTIVE_ONLY;
}

export interface ListModeFlags {
  showDeleted?: unknown;
  onlyDeleted?: unknown;
}

// onlyDeleted wins over showDeleted
export function resolveListQueryMode(flags: ListModeFlags): QueryMode {
  if (isTruthyFlag(flags.onlyDeleted)) {
    return QueryMode.DELETED_ONLY;
  }
  return resolveQueryMode(flags.showDeleted);
}
