// packages/core/src/engine/artifact.ts

import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';

/**
 * Dump the advisor's payload, unmodified, next to the files it talks about.
 * Audit output only; nothing reads it back.
 */
export async function writeSuggestionArtifact(directory: string, name: string, payload: unknown): Promise<string> {
  const path = join(directory, name);
  await writeFile(path, `${JSON.stringify(payload, null, 2)}\n`, 'utf-8');
  return path;
}
