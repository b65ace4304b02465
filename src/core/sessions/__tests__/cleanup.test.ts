/**
 * Tests for stale session identification and resource cleanup.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  FakeSandboxGateway,
  FakeTerminalGateway,
  FakeVcsGateway,
  createFakeGateways,
} from '../../gateways/testing.js';
import type { SessionRecord } from '../../../types/session.js';
import { buildCliCleanupOptions, type CleanupOptions } from '../cleanup-modes.js';
import { cleanupSessions, identifyStaleSessions, looksLikeWorktree } from '../cleanup.js';
import { REPO_ROOT, makeRecord } from './fixtures.js';

function options(overrides: Partial<CleanupOptions> = {}): CleanupOptions {
  return { ...buildCliCleanupOptions({ force: true }, { kind: 'global' }), ...overrides };
}

describe('identifyStaleSessions', () => {
  it('selects sessions in scope whose terminal is gone', async () => {
    const terminal = new FakeTerminalGateway(['work-issue-app-github-1', 'work-issue-other-github-5']);
    terminal.failures.set('sessionExists', 'work-issue-app-github-4');
    const records = [
      makeRecord(1),
      makeRecord(2),
      makeRecord(3, { terminalSession: '' }),
      makeRecord(4),
      makeRecord(5, { repositoryRoot: '/repos/other', terminalSession: 'work-issue-other-github-6' }),
    ];

    const stale = await identifyStaleSessions(records, { kind: 'repository', root: REPO_ROOT }, terminal);
    expect(stale.map((r) => r.namespacedId)).toEqual(['github:2', 'github:3']);

    const all = await identifyStaleSessions(records, { kind: 'global' }, terminal);
    expect(all.map((r) => r.namespacedId)).toEqual(['github:2', 'github:3', 'github:5']);
  });
});

describe('looksLikeWorktree', () => {
  it('accepts issue directories and worktree paths only', () => {
    expect(looksLikeWorktree('/x/app/issue-github-1')).toBe(true);
    expect(looksLikeWorktree('/home/me/.worksession-worktrees/app/feature')).toBe(true);
    expect(looksLikeWorktree('/home/me/projects/app')).toBe(false);
  });
});

describe('cleanupSessions', () => {
  let records: SessionRecord[];
  let vcs: FakeVcsGateway;
  let sandbox: FakeSandboxGateway;

  beforeEach(() => {
    records = [makeRecord(1), makeRecord(2)];
    vcs = new FakeVcsGateway(REPO_ROOT, {
      worktrees: Object.fromEntries(records.map((r) => [r.worktreePath, r.branch])),
    });
    sandbox = new FakeSandboxGateway(records.map((r) => r.sandboxName));
  });

  it('touches no gateway in dry-run mode', async () => {
    const result = await cleanupSessions(records, options({ dryRun: true }), createFakeGateways({ sandbox, repositories: [vcs] }));

    expect(result.wouldClean).toBe(2);
    expect(result.cleanedSessions).toBe(0);
    expect(result.details[0]).toBe(
      'Would clean Work Item github:1: Issue 1\n'
      + '    Worktree: /nonexistent-worktrees/app/issue-github-1\n'
      + '    Sandbox: work-issue-app-github-1',
    );
    expect(sandbox.calls).toEqual([]);
    expect(vcs.calls).toEqual([]);
  });

  it('lists only enabled resources in dry-run details', async () => {
    const result = await cleanupSessions([records[0] ?? makeRecord(1)], options({ dryRun: true, cleanWorktrees: false }), createFakeGateways());
    expect(result.details).toEqual(['Would clean Work Item github:1: Issue 1\n    Sandbox: work-issue-app-github-1']);
  });

  it('collects no details in silent dry-run', async () => {
    const result = await cleanupSessions(records, options({ dryRun: true, silent: true }), createFakeGateways());
    expect(result.wouldClean).toBe(2);
    expect(result.details).toEqual([]);
  });

  it('removes sandbox then worktree for every session', async () => {
    const gateways = createFakeGateways({ sandbox, repositories: [vcs] });
    const result = await cleanupSessions(records, options(), gateways);

    expect(result).toMatchObject({ cleanedSessions: 2, cleanedSandboxes: 2, cleanedWorktrees: 2, errors: [] });
    expect(result.details).toEqual([
      'Removed sandbox: work-issue-app-github-1',
      'Removed worktree: /nonexistent-worktrees/app/issue-github-1',
      'Removed sandbox: work-issue-app-github-2',
      'Removed worktree: /nonexistent-worktrees/app/issue-github-2',
    ]);
    expect(sandbox.sandboxes.size).toBe(0);
    expect(vcs.worktrees.size).toBe(0);
  });

  it('would clean exactly what a real run cleans', async () => {
    const dry = await cleanupSessions(records, options({ dryRun: true }), createFakeGateways({ sandbox, repositories: [vcs] }));
    const real = await cleanupSessions(records, options(), createFakeGateways({ sandbox, repositories: [vcs] }));
    expect(dry.wouldClean).toBe(real.cleanedSessions);
  });

  it('records a failure and carries on with the batch', async () => {
    sandbox.failures.set('deleteSandbox', 'work-issue-app-github-2');
    const result = await cleanupSessions(records, options(), createFakeGateways({ sandbox, repositories: [vcs] }));

    expect(result.cleanedSandboxes).toBe(1);
    expect(result.cleanedWorktrees).toBe(2);
    expect(result.errors).toEqual([
      {
        subject: 'github:2',
        resource: 'sandbox',
        operation: 'delete',
        message: 'failed to delete sandbox work-issue-app-github-2: deleteSandbox failed',
      },
    ]);
    expect(result.details).toContain('Warning: failed to delete sandbox work-issue-app-github-2: deleteSandbox failed');
    expect(result.sessions[1]).toEqual({
      namespacedId: 'github:2',
      removed: ['worktree'],
      absent: [],
      failures: result.errors,
    });
  });

  it('reports resources that are already gone', async () => {
    const result = await cleanupSessions(
      [makeRecord(3)],
      options(),
      createFakeGateways({ repositories: [new FakeVcsGateway(REPO_ROOT)] }),
    );
    expect(result.cleanedSessions).toBe(0);
    expect(result.sessions[0]?.absent).toEqual(['sandbox', 'worktree']);
    expect(result.details).toEqual([
      'Sandbox already gone: work-issue-app-github-3',
      'Worktree already gone: /nonexistent-worktrees/app/issue-github-3',
    ]);
  });

  it('records a failed existence check without deleting', async () => {
    sandbox.failures.set('sandboxExists', null);
    const result = await cleanupSessions(
      [records[0] ?? makeRecord(1)],
      options({ cleanWorktrees: false }),
      createFakeGateways({ sandbox }),
    );
    expect(result.errors.map((e) => e.message)).toEqual([
      'could not check sandbox work-issue-app-github-1: sandboxExists failed',
    ]);
    expect(sandbox.sandboxes.has('work-issue-app-github-1')).toBe(true);
  });

  describe('without a repository', () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await mkdtemp(join(tmpdir(), 'worksession-cleanup-'));
    });

    afterEach(async () => {
      await rm(tempDir, { recursive: true, force: true });
    });

    it('deletes issue directories from the filesystem', async () => {
      const path = join(tempDir, 'issue-github-7');
      await mkdir(path);
      const record = makeRecord(7, { repositoryRoot: '/repos/gone', worktreePath: path });

      const result = await cleanupSessions([record], options({ cleanSandboxes: false }), createFakeGateways());
      expect(result.cleanedWorktrees).toBe(1);
      expect(existsSync(path)).toBe(false);
    });

    it('refuses to delete other directories', async () => {
      const path = join(tempDir, 'notes');
      await mkdir(path);
      const record = makeRecord(8, { repositoryRoot: '/repos/gone', worktreePath: path });

      const result = await cleanupSessions([record], options({ cleanSandboxes: false }), createFakeGateways());
      expect(result.errors.map((e) => e.message)).toEqual([
        `failed to remove worktree ${path}: refusing to delete ${path}: not a worktree directory`,
      ]);
      expect(existsSync(path)).toBe(true);
    });
  });
});
