// packages/core/src/utils/id.ts

import { nanoid } from 'nanoid';

/** Generate a session ID with "swp_" prefix. */
export function generateSessionId(): string {
  return `swp_${nanoid(12)}`;
}
