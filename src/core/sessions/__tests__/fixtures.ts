/**
 * Session record builders shared by the session tests.
 */

import type { SessionRecord } from '../../../types/session.js';

export const REPO_ROOT = '/repos/app';

/** A fully populated record for `github:<n>` in the `app` repository. */
export function makeRecord(n: number, overrides: Partial<SessionRecord> = {}): SessionRecord {
  return {
    namespacedId: `github:${n}`,
    sourceType: 'github',
    issueTitle: `Issue ${n}`,
    friendlyTitle: `app-github-${n}`,
    branch: `issue-github-${n}`,
    worktreePath: `/nonexistent-worktrees/app/issue-github-${n}`,
    terminalSession: `work-issue-app-github-${n}`,
    sandboxName: `work-issue-app-github-${n}`,
    repositoryName: 'app',
    repositoryRoot: REPO_ROOT,
    createdAt: '2026-03-10T10:00:00.000Z',
    lastActivity: '2026-03-10T10:00:00.000Z',
    status: 'active',
    resourceCreationLog: [],
    ...overrides,
  };
}
