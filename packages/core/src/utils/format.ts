// packages/core/src/utils/format.ts

import { BYTES_PER_MB } from './constants.js';

/** Bytes to megabytes, rounded to two decimals. */
export function bytesToMb(bytes: number): number {
  return Math.round((bytes / BYTES_PER_MB) * 100) / 100;
}

export function formatMb(mb: number): string {
  return `${mb.toFixed(2)} MB`;
}

/** Calendar date of an instant, `YYYY-MM-DD` in UTC. */
export function formatDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}
