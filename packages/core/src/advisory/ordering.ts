// packages/core/src/advisory/ordering.ts

import type { EntryRecord } from '../types/entry.js';
import { bytesToMb, formatDay } from '../utils/format.js';

/**
 * Order entries the way the advisor sees them: largest first, and among
 * equal sizes the least recently modified first. Big, stale entries land at
 * the top of the list.
 */
export function orderForAdvisory(records: readonly EntryRecord[]): EntryRecord[] {
  return [...records].sort(
    (a, b) => b.sizeBytes - a.sizeBytes || a.modifiedAt.getTime() - b.modifiedAt.getTime(),
  );
}

/** `📄 File: report.pdf | Size: 1.5 MB | Modified: 2024-01-05 | Extension: .pdf` */
export function renderEntryLine(record: EntryRecord): string {
  const kind = record.isDirectory ? '📁 Folder' : '📄 File';
  return [
    `${kind}: ${record.name}`,
    `Size: ${bytesToMb(record.sizeBytes)} MB`,
    `Modified: ${formatDay(record.modifiedAt)}`,
    `Extension: ${record.extension || 'none'}`,
  ].join(' | ');
}

export function renderEntryList(records: readonly EntryRecord[]): string {
  return orderForAdvisory(records).map(renderEntryLine).join('\n');
}
