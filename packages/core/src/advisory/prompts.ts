// packages/core/src/advisory/prompts.ts

import type { EntryRecord } from '../types/entry.js';
import { bytesToMb } from '../utils/format.js';
import type { ChatMessage } from './chat-model.js';
import { renderEntryList } from './ordering.js';

/**
 * Fixed policy for the advisor. It is told to be conservative: a missed
 * deletable file costs nothing, a wrongly flagged one may cost the operator data.
 */
export const ADVISORY_SYSTEM_PROMPT = [
  'You review the contents of a downloads folder and point out entries that can safely be deleted.',
  '',
  'Weigh these signals:',
  '1. Age: entries untouched for six months or more are often disposable, unless they look like important documents.',
  '2. Type:',
  '   - installers and disk images (.dmg, .pkg, .exe, .msi) are usually disposable once installed',
  '   - numbered duplicates such as "file (1).pdf"',
  '   - temporary and partial downloads (.tmp, .temp, .part, .crdownload, .cache)',
  '   - old screenshots and images that are unlikely to be needed',
  '3. Size: large entries that have not changed in a long time.',
  '4. Names: "Copy of", "Untitled" and numbered copies.',
  '5. Keep: recent documents and recent important file types (.pdf, .docx, .xlsx).',
  '',
  'Answer with a single JSON object shaped like this:',
  '{',
  '  "suggestions": [',
  '    {',
  '      "filename": "example.dmg",',
  '      "reason": "Installer for an app that is already installed",',
  '      "confidence": "high",',
  '      "size_mb": 150.5,',
  '      "age_days": 180',
  '    }',
  '  ],',
  '  "summary": {',
  '    "total_files_scanned": 50,',
  '    "files_suggested_for_deletion": 10,',
  '    "total_space_to_free_mb": 500.2,',
  '    "keep_recent_days": 30',
  '  }',
  '}',
  '',
  '"confidence" is one of "high", "medium" or "low". "filename" must be copied exactly from the list.',
  'Be conservative: only suggest an entry when you are reasonably sure it is safe to remove.',
  'When in doubt, leave it out.',
  '',
  'The numbers above only illustrate the format. Review every entry and include every one that meets the criteria; there is no quota.',
].join('\n');

export function buildAdvisoryUserPrompt(records: readonly EntryRecord[]): string {
  const totalMb = records.reduce((sum, record) => sum + bytesToMb(record.sizeBytes), 0);
  return [
    `The folder holds ${records.length} items totaling ${totalMb.toFixed(2)} MB.`,
    '',
    'Files and folders, largest first:',
    '',
    renderEntryList(records),
    '',
    'Which of these can safely be deleted? Reply with valid JSON only.',
  ].join('\n');
}

/** Render the full request: the fixed policy plus every entry, in one message pair. */
export function buildAdvisoryMessages(records: readonly EntryRecord[]): ChatMessage[] {
  return [
    { role: 'system', content: ADVISORY_SYSTEM_PROMPT },
    { role: 'user', content: buildAdvisoryUserPrompt(records) },
  ];
}
