/**
 * Append-only resource audit trail on session records.
 */

import type { ResourceCreationEntry, SessionRecord } from '../../types/session.js';
import { parseTimestamp } from './time-format.js';

export type NewResourceEntry = Omit<ResourceCreationEntry, 'createdAt' | 'metadata'> & {
  metadata?: Record<string, string>;
};

/**
 * Return a copy of the record with one more audit entry. Timestamps never go
 * backwards: a clock behind the previous entry reuses that entry's time.
 */
export function appendResourceEntry(
  record: SessionRecord,
  entry: NewResourceEntry,
  now: Date = new Date(),
): SessionRecord {
  const previous = record.resourceCreationLog.at(-1);
  const previousTime = parseTimestamp(previous?.createdAt);
  const createdAt = previous && previousTime && previousTime.getTime() > now.getTime()
    ? previous.createdAt
    : now.toISOString();

  return {
    ...record,
    resourceCreationLog: [
      ...record.resourceCreationLog,
      {
        resourceType: entry.resourceType,
        resourceId: entry.resourceId,
        createdAt,
        status: entry.status,
        metadata: entry.metadata ?? {},
      },
    ],
  };
}
