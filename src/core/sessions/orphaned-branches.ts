/**
 * Issue branches whose session is no longer alive.
 */

import { errorMessage } from '../errors.js';
import { getLogger } from '../logger.js';
import type { TerminalGateway, VcsGateway } from '../gateways/types.js';
import { branchName, isNamespacedId, parseNamespacedId, workItemFromBranch } from '../work-items/work-item.js';
import type { CleanupFailure, SessionRecord } from '../../types/session.js';

/**
 * Records that are `active` and whose terminal session is confirmed alive.
 * A failed terminal check counts as alive.
 */
export async function confirmedActiveSessions(
  records: readonly SessionRecord[],
  terminal: TerminalGateway,
): Promise<SessionRecord[]> {
  const log = getLogger('cleanup');
  const active: SessionRecord[] = [];
  for (const record of records) {
    if (record.status !== 'active' || !record.terminalSession) continue;
    try {
      if (await terminal.sessionExists(record.terminalSession)) {
        active.push(record);
      }
    } catch (err) {
      log.warn({ id: record.namespacedId, err: errorMessage(err) }, 'terminal check failed, protecting branch');
      active.push(record);
    }
  }
  return active;
}

/**
 * Whether an issue branch was created for the record: its stored branch, or
 * the `issue-<src>-<id>` prefix of its work item (`issue-<n>` for github).
 * Work item ids may themselves contain `-`, so the branch is never split.
 */
export function branchBelongsTo(branch: string, record: SessionRecord): boolean {
  if (record.branch !== '' && branch === record.branch) return true;
  if (!isNamespacedId(record.namespacedId)) return false;
  const item = parseNamespacedId(record.namespacedId);
  const prefixes = [branchName(item)];
  if (item.source === 'github') prefixes.push(`issue-${item.id}`);
  return prefixes.some((prefix) => branch === prefix || branch.startsWith(`${prefix}-`));
}

/**
 * Issue branches that do not belong to a confirmed-active session.
 * Branches whose name yields no work item are left alone.
 */
export async function findOrphanedBranches(
  vcs: VcsGateway,
  records: readonly SessionRecord[],
  terminal: TerminalGateway,
): Promise<string[]> {
  const branches = await vcs.listIssueBranches();
  const active = await confirmedActiveSessions(records, terminal);
  return branches.filter(
    (branch) =>
      workItemFromBranch(branch) !== null && !active.some((record) => branchBelongsTo(branch, record)),
  );
}

export interface BranchCleanupOptions {
  dryRun: boolean;
  /** Delete unmerged branches too. */
  force: boolean;
  verbose?: boolean;
  silent?: boolean;
}

export interface BranchCleanupResult {
  deleted: string[];
  skipped: string[];
  failures: CleanupFailure[];
  details: string[];
}

/**
 * Delete the given branches, never the checked-out one.
 */
export async function cleanupBranches(
  vcs: VcsGateway,
  branches: readonly string[],
  options: BranchCleanupOptions,
): Promise<BranchCleanupResult> {
  const log = getLogger('cleanup');
  const result: BranchCleanupResult = { deleted: [], skipped: [], failures: [], details: [] };
  const report = (line: string) => {
    if (!options.silent) result.details.push(line);
  };

  let current: string;
  try {
    current = await vcs.currentBranch();
  } catch (err) {
    const message = `could not read current branch in ${vcs.repoRoot}: ${errorMessage(err)}`;
    result.failures.push({ subject: vcs.repoRoot, resource: 'branch', operation: 'check', message });
    report(`Warning: ${message}`);
    return result;
  }

  for (const branch of branches) {
    if (branch === current) {
      result.skipped.push(branch);
      report(`Skipped current branch: ${branch}`);
      continue;
    }
    if (options.dryRun) {
      report(`Would delete branch: ${branch}`);
      continue;
    }
    try {
      await vcs.deleteBranch(branch, options.force);
      result.deleted.push(branch);
      log.info({ branch, repo: vcs.repoRoot }, 'deleted branch');
      if (options.verbose) report(`Deleted branch: ${branch}`);
    } catch (err) {
      const message = `failed to delete branch ${branch}: ${errorMessage(err)}`;
      result.failures.push({ subject: branch, resource: 'branch', operation: 'delete', message });
      log.warn({ branch, repo: vcs.repoRoot }, message);
      report(`Warning: ${message}`);
    }
  }

  return result;
}
