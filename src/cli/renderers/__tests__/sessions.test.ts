/**
 * Tests for the human renderers. The test environment sets NO_COLOR and
 * LANG=C, so output is plain ASCII.
 */

import { describe, it, expect } from 'vitest';
import { makeRecord } from '../../../core/sessions/__tests__/fixtures.js';
import { toSessionEntry, type CleanPayload, type CleanSummary } from '../../payloads.js';
import {
  renderClean,
  renderConfigGet,
  renderConfigSet,
  renderList,
  renderLog,
  renderStart,
  renderStatus,
  renderStop,
} from '../sessions.js';

function summary(overrides: Partial<CleanSummary> = {}): CleanSummary {
  return {
    cleanedSessions: 0,
    cleanedSandboxes: 0,
    cleanedWorktrees: 0,
    cleanedBranches: 0,
    wouldClean: 0,
    errors: [],
    details: [],
    ...overrides,
  };
}

function cleanPayload(overrides: Partial<CleanPayload> = {}): CleanPayload {
  return {
    mode: 'default',
    dryRun: false,
    aborted: false,
    sessions: ['github:2'],
    branches: [],
    result: summary(),
    ...overrides,
  };
}

describe('toSessionEntry', () => {
  it('flattens a record and its detected status', () => {
    const entry = toSessionEntry(makeRecord(3, { failureReason: 'disk full', resourceStatus: 'failed' }), {
      status: { status: 'stale', lastChange: new Date('2026-03-10T10:00:00.000Z'), timeDelta: '2 hours ago' },
    });
    expect(entry).toEqual({
      id: 'github:3',
      title: 'Issue 3',
      friendlyTitle: 'app-github-3',
      repository: 'app',
      branch: 'issue-github-3',
      worktreePath: '/nonexistent-worktrees/app/issue-github-3',
      terminalSession: 'work-issue-app-github-3',
      sandboxName: 'work-issue-app-github-3',
      status: 'stale',
      lastChange: '2026-03-10T10:00:00.000Z',
      timeDelta: '2 hours ago',
      resourceStatus: 'failed',
      failureReason: 'disk full',
    });
  });

  it('falls back to the stored status without detection', () => {
    expect(toSessionEntry(makeRecord(1, { status: 'stopped' })).status).toBe('stopped');
    expect(toSessionEntry(makeRecord(1)).timeDelta).toBe('now');
  });
});

describe('renderStart', () => {
  const session = toSessionEntry(makeRecord(42));

  it('lists what was created', () => {
    expect(renderStart({ session, attached: false, created: ['branch', 'worktree'] }, false)).toBe([
      'Started session github:42',
      '  Created: branch, worktree',
      '  Worktree: /nonexistent-worktrees/app/issue-github-42',
      '  Attach with: worksession attach github:42',
    ].join('\n'));
  });

  it('says when the session was already running', () => {
    const text = renderStart({ session, attached: true, created: [] }, false);
    expect(text.split('\n')[0]).toBe('Session github:42 is already running');
    expect(text).not.toContain('Created:');
  });

  it('prints only the terminal session when quiet', () => {
    expect(renderStart({ session, attached: false, created: [] }, true)).toBe('work-issue-app-github-42');
  });
});

describe('renderLog', () => {
  it('prints the output without trailing blank lines', () => {
    expect(renderLog({ id: 'github:1', source: 'terminal', output: 'line one\nline two\n\n' })).toBe('line one\nline two');
  });
});

describe('renderStop', () => {
  it('marks stopped resources and skipped ones', () => {
    expect(renderStop({
      id: 'github:1',
      stopped: ['terminal', 'sandbox'],
      skipped: ['branch issue-github-1 is checked out'],
    }, false)).toBe([
      'Stopped session github:1',
      '  + terminal',
      '  + sandbox',
      '  Skipped: branch issue-github-1 is checked out',
    ].join('\n'));
  });
});

describe('renderList', () => {
  const active = toSessionEntry(makeRecord(1), { status: { status: 'active', lastChange: null, timeDelta: 'now' } });
  const stale = toSessionEntry(makeRecord(10), { status: { status: 'stale', lastChange: null, timeDelta: '2h ago' } });

  it('renders an aligned table', () => {
    expect(renderList({ sessions: [active, stale], total: 2 }, false)).toBe([
      'Sessions (2)',
      '-'.repeat(65),
      '* active  github:1   now  Issue 1',
      'o stale  github:10  2h ago  Issue 10',
    ].join('\n'));
  });

  it('prints ids only when quiet', () => {
    expect(renderList({ sessions: [active, stale], total: 2 }, true)).toBe('github:1\ngithub:10');
  });

  it('reports an automatic cleanup before the table', () => {
    const cleanup = summary({ cleanedSessions: 1, cleanedSandboxes: 1, details: ['Removed sandbox: work-1'] });
    expect(renderList({ sessions: [], total: 0, cleanup }, false)).toBe([
      'Removed sandbox: work-1',
      'Cleaned 1 session(s): 1 sandbox(es), 0 worktree(s), 0 branch(es)',
      '',
      'No sessions',
    ].join('\n'));
  });

  it('says so when there is nothing to list', () => {
    expect(renderList({ sessions: [], total: 0, cleanup: summary() }, false)).toBe('No sessions');
  });
});

describe('renderStatus', () => {
  it('shows resources and the failure', () => {
    const entry = toSessionEntry(makeRecord(2, { resourceStatus: 'cleanup', failureReason: 'sandbox busy' }), {
      status: { status: 'unknown', lastChange: null, timeDelta: 'unknown' },
    });
    expect(renderStatus({ session: entry }, false)).toBe([
      'github:2 Issue 2',
      '  Status:   ? unknown (unknown)',
      '  Branch:   issue-github-2',
      '  Worktree: /nonexistent-worktrees/app/issue-github-2',
      '  Terminal: work-issue-app-github-2',
      '  Sandbox:  work-issue-app-github-2',
      '  Resources: cleanup',
      '  Failure:  sandbox busy',
    ].join('\n'));
    expect(renderStatus({ session: entry }, true)).toBe('unknown');
  });
});

describe('renderClean', () => {
  it('reports a cancelled run', () => {
    expect(renderClean(cleanPayload({ aborted: true }), false)).toBe('Cleanup cancelled');
  });

  it('reports an empty plan', () => {
    expect(renderClean(cleanPayload({ sessions: [] }), false)).toBe('Nothing to clean');
  });

  it('previews a dry run', () => {
    const result = summary({ wouldClean: 1, details: ['Would clean Work Item github:2: Issue 2'] });
    expect(renderClean(cleanPayload({ dryRun: true, result }), false)).toBe(
      'Would clean Work Item github:2: Issue 2\nWould clean 1 session(s)',
    );
    expect(renderClean(cleanPayload({ dryRun: true, result }), true)).toBe('1');
  });

  it('lists failures after the totals', () => {
    const result = summary({
      cleanedSessions: 1,
      cleanedWorktrees: 1,
      cleanedBranches: 2,
      errors: [{ subject: 'github:2', resource: 'sandbox', operation: 'delete', message: 'failed to delete sandbox s: busy' }],
    });
    expect(renderClean(cleanPayload({ result }), false)).toBe([
      'Cleaned 1 session(s): 0 sandbox(es), 1 worktree(s), 2 branch(es)',
      'Error: failed to delete sandbox s: busy',
    ].join('\n'));
  });
});

describe('config renderers', () => {
  it('shows the value and where it came from', () => {
    expect(renderConfigGet({ key: 'cleanup.concurrency', value: 2, source: 'global' }, false)).toBe(
      'cleanup.concurrency = 2 (global)',
    );
    expect(renderConfigGet({ key: 'session.commandArgs', value: ['--name', '$SANDBOX'], source: 'default' }, true)).toBe(
      '["--name","$SANDBOX"]',
    );
    expect(renderConfigSet({ key: 'session.command', value: 'sandbox', scope: 'repository' }, false)).toBe(
      'Set session.command = sandbox in repository config',
    );
  });
});
