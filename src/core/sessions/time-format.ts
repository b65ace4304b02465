/**
 * Relative time formatting and RFC 3339 parsing for session status display.
 */

import { z } from 'zod';

const MINUTE = 60_000;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;
const WEEK = 7 * DAY;

/** RFC 3339 timestamp with `Z` or a numeric offset. */
export const rfc3339Schema = z.string().datetime({ offset: true });

/**
 * Parse an RFC 3339 timestamp; null when missing or malformed.
 */
export function parseTimestamp(value: string | undefined | null): Date | null {
  if (!value) return null;
  if (!rfc3339Schema.safeParse(value).success) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Format the time since `when`, e.g. `5m ago`. Units round down.
 * Null gives `unknown`; future or sub-minute deltas give `now`.
 */
export function formatTimeDelta(when: Date | null, now: Date = new Date()): string {
  if (!when || Number.isNaN(when.getTime())) return 'unknown';

  const delta = now.getTime() - when.getTime();
  if (delta < MINUTE) return 'now';
  if (delta < HOUR) return `${Math.floor(delta / MINUTE)}m ago`;
  if (delta < DAY) return `${Math.floor(delta / HOUR)}h ago`;
  if (delta < WEEK) return `${Math.floor(delta / DAY)}d ago`;
  return `${Math.floor(delta / WEEK)}w ago`;
}
