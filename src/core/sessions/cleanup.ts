/**
 * Reconciliation: find sessions whose terminal is gone and remove the
 * resources they left behind.
 *
 * A failure on one resource is recorded and the batch carries on.
 */

import { existsSync } from 'node:fs';
import { rm } from 'node:fs/promises';
import { basename } from 'node:path';
import { errorMessage } from '../errors.js';
import { getLogger } from '../logger.js';
import type { Gateways, TerminalGateway } from '../gateways/types.js';
import type {
  CleanupFailure,
  CleanupResult,
  ResourceType,
  SessionCleanupOutcome,
  SessionRecord,
  SessionScope,
} from '../../types/session.js';
import { recordInScope } from '../../store/session-store.js';
import type { CleanupOptions } from './cleanup-modes.js';
import { mapWithConcurrency } from './pool.js';
import { resolveSandboxName } from './sandbox-naming.js';

/** An empty result, ready to be filled in. */
export function emptyCleanupResult(): CleanupResult {
  return {
    cleanedSessions: 0,
    cleanedSandboxes: 0,
    cleanedWorktrees: 0,
    cleanedBranches: 0,
    wouldClean: 0,
    errors: [],
    details: [],
    sessions: [],
  };
}

/**
 * Sessions in scope whose terminal session is gone. A record without a
 * terminal name is stale; a failed check keeps the session (not stale).
 */
export async function identifyStaleSessions(
  records: readonly SessionRecord[],
  scope: SessionScope,
  terminal: TerminalGateway,
): Promise<SessionRecord[]> {
  const log = getLogger('cleanup');
  const stale: SessionRecord[] = [];

  for (const record of records) {
    if (!recordInScope(record, scope)) continue;
    if (!record.terminalSession) {
      stale.push(record);
      continue;
    }
    try {
      if (!(await terminal.sessionExists(record.terminalSession))) {
        stale.push(record);
      }
    } catch (err) {
      log.warn({ id: record.namespacedId, session: record.terminalSession, err: errorMessage(err) }, 'terminal check failed, keeping session');
    }
  }

  return stale;
}

/** Paths the filesystem fallback is willing to delete. */
export function looksLikeWorktree(path: string): boolean {
  return basename(path).startsWith('issue-') || path.includes('worktree');
}

function dryRunDetail(record: SessionRecord, options: CleanupOptions): string {
  let detail = `Would clean Work Item ${record.namespacedId}: ${record.issueTitle}`;
  if (options.cleanWorktrees && record.worktreePath) {
    detail += `\n    Worktree: ${record.worktreePath}`;
  }
  const sandbox = resolveSandboxName(record);
  if (options.cleanSandboxes && sandbox) {
    detail += `\n    Sandbox: ${sandbox}`;
  }
  return detail;
}

interface SessionPass {
  outcome: SessionCleanupOutcome;
  details: string[];
}

async function cleanupOne(
  record: SessionRecord,
  options: CleanupOptions,
  gateways: Gateways,
): Promise<SessionPass> {
  const log = getLogger('cleanup');
  const id = record.namespacedId;
  const removed: ResourceType[] = [];
  const absent: ResourceType[] = [];
  const failures: CleanupFailure[] = [];
  const details: string[] = [];
  const report = (line: string) => {
    if (options.verbose && !options.silent) details.push(line);
  };
  const fail = (resource: ResourceType, operation: string, message: string) => {
    failures.push({ subject: id, resource, operation, message });
    log.warn({ id, resource, operation }, message);
    report(`Warning: ${message}`);
  };

  if (options.cleanSandboxes) {
    const name = resolveSandboxName(record);
    let exists = false;
    let checked = false;
    try {
      exists = await gateways.sandbox.sandboxExists(name);
      checked = true;
    } catch (err) {
      fail('sandbox', 'check', `could not check sandbox ${name}: ${errorMessage(err)}`);
    }
    if (checked && exists) {
      try {
        await gateways.sandbox.deleteSandbox(name);
        removed.push('sandbox');
        log.info({ id, sandbox: name }, 'removed sandbox');
        report(`Removed sandbox: ${name}`);
      } catch (err) {
        fail('sandbox', 'delete', `failed to delete sandbox ${name}: ${errorMessage(err)}`);
      }
    } else if (checked) {
      absent.push('sandbox');
      report(`Sandbox already gone: ${name}`);
    }
  }

  if (options.cleanWorktrees && record.worktreePath) {
    const path = record.worktreePath;
    const vcs = gateways.vcsFor(record.repositoryRoot);
    let exists = false;
    let checked = false;
    try {
      exists = vcs ? await vcs.worktreeExists(path) : existsSync(path);
      checked = true;
    } catch (err) {
      fail('worktree', 'check', `could not check worktree ${path}: ${errorMessage(err)}`);
    }
    if (checked && exists) {
      try {
        if (vcs) {
          await vcs.removeWorktree(path);
        } else if (looksLikeWorktree(path)) {
          await rm(path, { recursive: true, force: true });
        } else {
          throw new Error(`refusing to delete ${path}: not a worktree directory`);
        }
        removed.push('worktree');
        log.info({ id, worktree: path }, 'removed worktree');
        report(`Removed worktree: ${path}`);
      } catch (err) {
        fail('worktree', 'remove', `failed to remove worktree ${path}: ${errorMessage(err)}`);
      }
    } else if (checked) {
      absent.push('worktree');
      report(`Worktree already gone: ${path}`);
    }
  }

  return { outcome: { namespacedId: id, removed, absent, failures }, details };
}

/**
 * Remove the sandboxes and worktrees of the given sessions. Sandbox first,
 * then worktree, per session. Dry-run touches no gateway.
 */
export async function cleanupSessions(
  records: readonly SessionRecord[],
  options: CleanupOptions,
  gateways: Gateways,
): Promise<CleanupResult> {
  const result = emptyCleanupResult();

  if (options.dryRun) {
    result.wouldClean = records.length;
    if (!options.silent) {
      result.details = records.map((record) => dryRunDetail(record, options));
    }
    return result;
  }

  const passes = await mapWithConcurrency(records, options.concurrency, (record) =>
    cleanupOne(record, options, gateways),
  );

  for (const { outcome, details } of passes) {
    result.sessions.push(outcome);
    result.details.push(...details);
    result.errors.push(...outcome.failures);
    if (outcome.removed.includes('sandbox')) result.cleanedSandboxes++;
    if (outcome.removed.includes('worktree')) result.cleanedWorktrees++;
    if (outcome.removed.length > 0) result.cleanedSessions++;
  }

  return result;
}
