/**
 * Tests for the JSON session store: load, save, versioned writes, locked
 * updates and the legacy per-repository merge.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, rm, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ABSENT_VERSION, SessionStore, assertUniqueIds, recordInScope } from '../session-store.js';
import { computeChecksum } from '../json.js';
import { WorkSessionError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { REPO_ROOT, makeRecord } from '../../core/sessions/__tests__/fixtures.js';

let tempDir: string;
let filePath: string;

async function rejectionCode(promise: Promise<unknown>): Promise<ExitCode | null> {
  const err = await promise.then(() => null, (e: unknown) => e);
  return err instanceof WorkSessionError ? err.code : null;
}

async function readRaw(path: string): Promise<Array<Record<string, unknown>>> {
  return JSON.parse(await readFile(path, 'utf8'));
}

describe('SessionStore', () => {
  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'worksession-store-'));
    filePath = join(tempDir, 'sessions.json');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('load', () => {
    it('returns no records when the file is missing', async () => {
      const store = new SessionStore({ filePath });
      expect(await store.load()).toEqual([]);
      expect((await store.loadWithVersion()).version).toBe(ABSENT_VERSION);
    });

    it('round-trips saved records', async () => {
      const store = new SessionStore({ filePath });
      await store.save([makeRecord(1), makeRecord(2)]);
      expect(await store.load()).toEqual([makeRecord(1), makeRecord(2)]);

      const [raw] = await readRaw(filePath);
      expect(raw?.['tmux_session']).toBe('work-issue-app-github-1');
      expect(raw?.['namespaced_id']).toBe('github:1');
    });

    it('filters by repository scope', async () => {
      const store = new SessionStore({ filePath });
      await store.save([makeRecord(1), makeRecord(2, { repositoryRoot: '/repos/other' })]);
      const scoped = await store.load({ kind: 'repository', root: '/repos/other/' });
      expect(scoped.map((r) => r.namespacedId)).toEqual(['github:2']);
    });

    it('rejects content that is not JSON', async () => {
      await writeFile(filePath, '[{');
      const store = new SessionStore({ filePath });
      expect(await rejectionCode(store.load())).toBe(ExitCode.VALIDATION_ERROR);
    });

    it('rejects a record with an invalid field', async () => {
      await writeFile(filePath, JSON.stringify([{ namespaced_id: 'github:1', status: 'running' }]));
      const store = new SessionStore({ filePath });
      const err = await store.load().catch((e: unknown) => e);
      expect(err).toBeInstanceOf(WorkSessionError);
      expect(err instanceof WorkSessionError && err.message.startsWith(`Invalid session store ${filePath}: 0.status:`)).toBe(true);
    });

    it('accepts nulls written by older releases', async () => {
      await writeFile(filePath, JSON.stringify([{
        namespaced_id: 'github:5',
        source_type: 'github',
        issue_title: null,
        status: null,
        resource_creation_log: null,
      }]));
      const [record] = await new SessionStore({ filePath }).load();
      expect(record).toMatchObject({ namespacedId: 'github:5', issueTitle: '', status: 'active', resourceCreationLog: [] });
    });

    it('migrates pre-namespacing records', async () => {
      await writeFile(filePath, JSON.stringify([{
        namespaced_id: '',
        source_type: '',
        issue_number: 7,
        branch: 'issue-7-login',
        status: 'stale',
      }]));
      const [record] = await new SessionStore({ filePath }).load();
      expect(record).toMatchObject({ namespacedId: 'github:7', sourceType: 'github', issueNumber: 7, status: 'stopped' });
    });
  });

  describe('save', () => {
    it('refuses duplicate ids', async () => {
      const store = new SessionStore({ filePath });
      expect(await rejectionCode(store.save([makeRecord(1), makeRecord(1)]))).toBe(ExitCode.VALIDATION_ERROR);
      expect(() => assertUniqueIds([makeRecord(1), makeRecord(1)])).toThrow('Duplicate session for github:1');
    });

    it('keeps fields it does not know', async () => {
      await writeFile(filePath, JSON.stringify([{ namespaced_id: 'github:3', source_type: 'github', agent: 'helper-bot' }]));
      const store = new SessionStore({ filePath });
      await store.update((records) => ({
        records: records.map((r) => ({ ...r, status: 'stopped' as const })),
        result: null,
      }));
      const [raw] = await readRaw(filePath);
      expect(raw?.['agent']).toBe('helper-bot');
      expect(raw?.['status']).toBe('stopped');
    });
  });

  describe('saveIfUnchanged', () => {
    it('writes when the version still matches', async () => {
      const store = new SessionStore({ filePath });
      await store.save([makeRecord(1)]);
      const { version } = await store.loadWithVersion();

      const next = await store.saveIfUnchanged([makeRecord(1), makeRecord(2)], version);
      expect(next).toBe(computeChecksum(await readFile(filePath, 'utf8')));
      expect((await store.load()).length).toBe(2);
    });

    it('fails when another writer got there first', async () => {
      const store = new SessionStore({ filePath });
      await store.save([makeRecord(1)]);
      const { version } = await store.loadWithVersion();
      await store.save([makeRecord(1, { status: 'stopped' })]);

      expect(await rejectionCode(store.saveIfUnchanged([makeRecord(3)], version))).toBe(ExitCode.CONCURRENT_MODIFICATION);
      expect((await store.load()).map((r) => r.status)).toEqual(['stopped']);
    });

    it('treats a missing file as its own version', async () => {
      const store = new SessionStore({ filePath });
      await store.saveIfUnchanged([makeRecord(1)], ABSENT_VERSION);
      expect((await store.load()).length).toBe(1);
    });
  });

  describe('update', () => {
    it('returns the mutator result and writes the new set', async () => {
      const store = new SessionStore({ filePath });
      await store.save([makeRecord(1)]);
      const count = await store.update((records) => ({
        records: [...records, makeRecord(2)],
        result: records.length,
      }));
      expect(count).toBe(1);
      expect((await store.load()).map((r) => r.namespacedId)).toEqual(['github:1', 'github:2']);
    });

    it('skips the write when nothing changed', async () => {
      await writeFile(filePath, '[]');
      const store = new SessionStore({ filePath });
      await store.update((records) => ({ records, result: undefined }));
      expect(await readFile(filePath, 'utf8')).toBe('[]');
    });

    it('writes migrated records back even when the mutator changes nothing', async () => {
      await writeFile(filePath, JSON.stringify([{ namespaced_id: 'github:4', source_type: 'github', status: 'stale' }]));
      const store = new SessionStore({ filePath });
      await store.update((records) => ({ records, result: undefined }));
      const [raw] = await readRaw(filePath);
      expect(raw?.['status']).toBe('stopped');
    });

    it('stays writable when several legacy records have no recoverable work item', async () => {
      await writeFile(filePath, JSON.stringify([
        { namespaced_id: '', source_type: '', branch: 'feature-a' },
        { namespaced_id: '', source_type: '', branch: 'feature-b' },
      ]));
      const store = new SessionStore({ filePath });
      expect((await store.load()).map((r) => r.namespacedId)).toEqual(['github:unknown', 'github:unknown-2']);

      await store.update((records) => ({ records, result: undefined }));
      const raw = await readRaw(filePath);
      expect(raw.map((r) => [r['namespaced_id'], r['branch']])).toEqual([
        ['github:unknown', 'feature-a'],
        ['github:unknown-2', 'feature-b'],
      ]);
    });
  });

  describe('loadAll', () => {
    it('merges legacy per-repository files behind the canonical store', async () => {
      const workspace = join(tempDir, 'code');
      const repo = join(workspace, 'billing');
      await mkdir(join(repo, '.worksession'), { recursive: true });
      await writeFile(join(repo, '.worksession', 'sessions.json'), JSON.stringify([
        { namespaced_id: 'github:1', source_type: 'github', issue_title: 'legacy copy' },
        { namespaced_id: 'jira:PAY-9', source_type: 'jira', issue_title: 'Refunds' },
      ]));

      const store = new SessionStore({ filePath, workspaceRoots: [workspace] });
      await store.save([makeRecord(1)]);

      const all = await store.loadAll();
      expect(all.map((r) => [r.namespacedId, r.issueTitle, r.repositoryRoot])).toEqual([
        ['github:1', 'Issue 1', REPO_ROOT],
        ['jira:PAY-9', 'Refunds', repo],
      ]);
    });
  });
});

describe('recordInScope', () => {
  it('matches every record globally', () => {
    expect(recordInScope(makeRecord(1, { repositoryRoot: '' }), { kind: 'global' })).toBe(true);
  });

  it('never matches a record without a repository to a repository scope', () => {
    expect(recordInScope(makeRecord(1, { repositoryRoot: '' }), { kind: 'repository', root: '/' })).toBe(false);
  });
});
