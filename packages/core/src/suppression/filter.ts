// packages/core/src/suppression/filter.ts

import type { EntryRecord } from '../types/entry.js';

/** Drop records whose name is suppressed. Pure; keeps the relative order of the rest. */
export function filterSuppressed(
  records: readonly EntryRecord[],
  suppressed: ReadonlySet<string>,
): EntryRecord[] {
  return records.filter((record) => !suppressed.has(record.name));
}
