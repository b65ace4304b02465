/**
 * Result shapes the CLI commands emit, shared by the JSON envelope and the
 * human renderers.
 */

import type { CleanupMode } from '../core/sessions/cleanup-modes.js';
import type { BranchPlan, CleanupRun, SessionLog, SessionView } from '../core/sessions/lifecycle.js';
import type { ConfigSource } from '../types/config.js';
import type {
  CleanupFailure,
  DerivedStatus,
  ResourceStatus,
  ResourceType,
  SessionRecord,
} from '../types/session.js';

export interface SessionEntry {
  id: string;
  title: string;
  friendlyTitle: string;
  repository: string;
  branch: string;
  worktreePath: string;
  terminalSession: string;
  sandboxName: string;
  status: DerivedStatus;
  lastChange: string | null;
  timeDelta: string;
  resourceStatus?: ResourceStatus;
  failureReason?: string;
}

export interface StartPayload {
  session: SessionEntry;
  attached: boolean;
  created: ResourceType[];
}

export interface AttachPayload {
  id: string;
  terminalSession: string;
}

export type LogPayload = SessionLog;

export interface StopPayload {
  id: string;
  stopped: ResourceType[];
  skipped: string[];
}

export interface CleanSummary {
  cleanedSessions: number;
  cleanedSandboxes: number;
  cleanedWorktrees: number;
  cleanedBranches: number;
  wouldClean: number;
  errors: CleanupFailure[];
  details: string[];
}

export interface ListPayload {
  sessions: SessionEntry[];
  total: number;
  /** Present when the list ran an automatic cleanup first. */
  cleanup?: CleanSummary;
}

export interface StatusPayload {
  session: SessionEntry;
}

export interface CleanPayload {
  mode: CleanupMode;
  dryRun: boolean;
  aborted: boolean;
  sessions: string[];
  branches: BranchPlan[];
  result: CleanSummary;
}

export interface ConfigGetPayload {
  key: string;
  value: unknown;
  source: ConfigSource;
}

export interface ConfigSetPayload {
  key: string;
  value: unknown;
  scope: 'repository' | 'global';
}

export interface VersionPayload {
  version: string;
}

/** Payload type per command name; keys are the renderer registry. */
export interface RenderPayloads {
  start: StartPayload;
  attach: AttachPayload;
  log: LogPayload;
  stop: StopPayload;
  list: ListPayload;
  status: StatusPayload;
  clean: CleanPayload;
  'config-get': ConfigGetPayload;
  'config-set': ConfigSetPayload;
  version: VersionPayload;
}

export type CommandName = keyof RenderPayloads;

export function toSessionEntry(record: SessionRecord, view?: Omit<SessionView, 'record'>): SessionEntry {
  return {
    id: record.namespacedId,
    title: record.issueTitle,
    friendlyTitle: record.friendlyTitle,
    repository: record.repositoryName,
    branch: record.branch,
    worktreePath: record.worktreePath,
    terminalSession: record.terminalSession,
    sandboxName: record.sandboxName,
    status: view?.status.status ?? (record.status === 'stopped' ? 'stopped' : 'active'),
    lastChange: view?.status.lastChange ? view.status.lastChange.toISOString() : null,
    timeDelta: view?.status.timeDelta ?? 'now',
    ...(record.resourceStatus && { resourceStatus: record.resourceStatus }),
    ...(record.failureReason && { failureReason: record.failureReason }),
  };
}

export function toCleanSummary(run: CleanupRun): CleanSummary {
  const { result } = run;
  return {
    cleanedSessions: result.cleanedSessions,
    cleanedSandboxes: result.cleanedSandboxes,
    cleanedWorktrees: result.cleanedWorktrees,
    cleanedBranches: result.cleanedBranches,
    wouldClean: result.wouldClean,
    errors: result.errors,
    details: result.details,
  };
}

export function toCleanPayload(run: CleanupRun, dryRun: boolean): CleanPayload {
  return {
    mode: run.plan.mode,
    dryRun,
    aborted: run.aborted,
    sessions: run.plan.sessions.map((record) => record.namespacedId),
    branches: run.plan.branches,
    result: toCleanSummary(run),
  };
}
