/**
 * On-disk session record format.
 *
 * The store file is a JSON array of snake_case objects. Fields this release
 * does not know are kept and written back untouched. Releases that wrote
 * `null` for empty strings and lists are accepted.
 */

import { z } from 'zod';
import type { ResourceCreationEntry, SessionRecord } from '../types/session.js';

const text = z.string().nullish().transform((value) => value ?? '');

const resourceTypeSchema = z.enum(['branch', 'worktree', 'terminal', 'sandbox']);

const resourceEntrySchema = z.object({
  resource_type: resourceTypeSchema,
  resource_id: text,
  created_at: text,
  status: z.enum(['created', 'failed', 'cleanup']),
  metadata: z.record(z.string()).nullish().transform((value) => value ?? {}),
});

export const storedRecordSchema = z
  .object({
    namespaced_id: text,
    source_type: text,
    issue_number: z.number().int().nullish(),
    issue_title: text,
    friendly_title: text,
    branch: text,
    worktree_path: text,
    tmux_session: text,
    sandbox_name: text,
    repository_name: text,
    repository_root: text,
    created_at: text,
    last_activity: text,
    status: z.enum(['active', 'stopped', 'stale']).nullish().transform((value) => value ?? 'active'),
    resource_status: z.enum(['creating', 'active', 'cleanup', 'failed']).nullish(),
    current_creation_step: resourceTypeSchema.nullish(),
    failure_point: resourceTypeSchema.nullish(),
    failure_reason: z.string().nullish(),
    resource_creation_log: z.array(resourceEntrySchema).nullish().transform((value) => value ?? []),
  })
  .passthrough();

export const storeFileSchema = z.array(storedRecordSchema);

export type StoredRecord = z.output<typeof storedRecordSchema>;

const KNOWN_FIELDS = new Set(Object.keys(storedRecordSchema.shape));

function entryFromStored(entry: z.output<typeof resourceEntrySchema>): ResourceCreationEntry {
  return {
    resourceType: entry.resource_type,
    resourceId: entry.resource_id,
    createdAt: entry.created_at,
    status: entry.status,
    metadata: entry.metadata,
  };
}

/**
 * Convert a validated on-disk record to its in-memory form.
 */
export function recordFromStored(stored: StoredRecord): SessionRecord {
  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(stored)) {
    if (!KNOWN_FIELDS.has(key)) extra[key] = value;
  }

  return {
    namespacedId: stored.namespaced_id,
    sourceType: stored.source_type,
    ...(stored.issue_number != null && { issueNumber: stored.issue_number }),
    issueTitle: stored.issue_title,
    friendlyTitle: stored.friendly_title,
    branch: stored.branch,
    worktreePath: stored.worktree_path,
    terminalSession: stored.tmux_session,
    sandboxName: stored.sandbox_name,
    repositoryName: stored.repository_name,
    repositoryRoot: stored.repository_root,
    createdAt: stored.created_at,
    lastActivity: stored.last_activity,
    status: stored.status,
    ...(stored.resource_status != null && { resourceStatus: stored.resource_status }),
    ...(stored.current_creation_step != null && { currentCreationStep: stored.current_creation_step }),
    ...(stored.failure_point != null && { failurePoint: stored.failure_point }),
    ...(stored.failure_reason != null && { failureReason: stored.failure_reason }),
    resourceCreationLog: stored.resource_creation_log.map(entryFromStored),
    ...(Object.keys(extra).length > 0 && { extra }),
  };
}

/**
 * Convert an in-memory record to the object written to disk.
 */
export function recordToStored(record: SessionRecord): Record<string, unknown> {
  return {
    ...record.extra,
    namespaced_id: record.namespacedId,
    source_type: record.sourceType,
    ...(record.issueNumber !== undefined && { issue_number: record.issueNumber }),
    issue_title: record.issueTitle,
    friendly_title: record.friendlyTitle,
    branch: record.branch,
    worktree_path: record.worktreePath,
    tmux_session: record.terminalSession,
    sandbox_name: record.sandboxName,
    repository_name: record.repositoryName,
    repository_root: record.repositoryRoot,
    created_at: record.createdAt,
    last_activity: record.lastActivity,
    status: record.status,
    ...(record.resourceStatus !== undefined && { resource_status: record.resourceStatus }),
    ...(record.currentCreationStep !== undefined && { current_creation_step: record.currentCreationStep }),
    ...(record.failurePoint !== undefined && { failure_point: record.failurePoint }),
    ...(record.failureReason !== undefined && { failure_reason: record.failureReason }),
    resource_creation_log: record.resourceCreationLog.map((entry) => ({
      resource_type: entry.resourceType,
      resource_id: entry.resourceId,
      created_at: entry.createdAt,
      status: entry.status,
      metadata: entry.metadata,
    })),
  };
}
