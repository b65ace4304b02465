/**
 * Session type definitions for worksession.
 * A session bundles a branch, a worktree, a terminal session and a sandbox
 * for one work item.
 */

/** Kinds of external resource a session owns. */
export type ResourceType = 'branch' | 'worktree' | 'terminal' | 'sandbox';

/** Audit entry status. */
export type ResourceEntryStatus = 'created' | 'failed' | 'cleanup';

/** One entry of a session's append-only resource audit trail. */
export interface ResourceCreationEntry {
  resourceType: ResourceType;
  resourceId: string;
  /** RFC 3339 timestamp; non-decreasing along the log. */
  createdAt: string;
  status: ResourceEntryStatus;
  metadata: Record<string, string>;
}

/**
 * Coarse persisted status. `stale` only appears in records written by old
 * releases and is migrated to `stopped` on load.
 */
export type SessionRecordStatus = 'active' | 'stopped' | 'stale';

/** Recovery state of a session's resources. */
export type ResourceStatus = 'creating' | 'active' | 'cleanup' | 'failed';

/** Persisted bookkeeping for one work item. */
export interface SessionRecord {
  namespacedId: string;
  sourceType: string;
  /** Only set on records created before namespaced identifiers. */
  issueNumber?: number;
  issueTitle: string;
  friendlyTitle: string;
  branch: string;
  worktreePath: string;
  terminalSession: string;
  sandboxName: string;
  repositoryName: string;
  repositoryRoot: string;
  createdAt: string;
  lastActivity: string;
  status: SessionRecordStatus;
  resourceStatus?: ResourceStatus;
  currentCreationStep?: ResourceType;
  failurePoint?: ResourceType;
  failureReason?: string;
  resourceCreationLog: ResourceCreationEntry[];
  /** On-disk fields this release does not know; written back unchanged. */
  extra?: Record<string, unknown>;
}

/** Live status, derived from external evidence. Never persisted. */
export type DerivedStatus = 'active' | 'stopped' | 'stale' | 'unknown';

/** Result of status detection for one session. */
export interface SessionStatus {
  status: DerivedStatus;
  lastChange: Date | null;
  timeDelta: string;
}

/** Which records a store load or cleanup applies to. */
export type SessionScope =
  | { kind: 'global' }
  | { kind: 'repository'; root: string };

/** One failed operation during cleanup. */
export interface CleanupFailure {
  /** Session (work item id) or branch the failure belongs to. */
  subject: string;
  resource: ResourceType | 'record';
  operation: string;
  message: string;
}

/** Per-session outcome of a cleanup pass. */
export interface SessionCleanupOutcome {
  namespacedId: string;
  removed: ResourceType[];
  /** Resources that were already gone when checked. */
  absent: ResourceType[];
  failures: CleanupFailure[];
}

/** Aggregate report of a cleanup pass. */
export interface CleanupResult {
  cleanedSessions: number;
  cleanedSandboxes: number;
  cleanedWorktrees: number;
  cleanedBranches: number;
  wouldClean: number;
  errors: CleanupFailure[];
  details: string[];
  sessions: SessionCleanupOutcome[];
}
