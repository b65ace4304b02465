/**
 * Tests for legacy session file discovery.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { findLegacySessionFiles } from '../discovery.js';

describe('findLegacySessionFiles', () => {
  let root: string;

  async function plant(...segments: string[]): Promise<string> {
    const repo = join(root, ...segments);
    await mkdir(join(repo, '.worksession'), { recursive: true });
    await writeFile(join(repo, '.worksession', 'sessions.json'), '[]');
    return repo;
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'worksession-discovery-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('finds repositories up to the depth limit, in name order', async () => {
    const b = await plant('b-repo');
    const a = await plant('org', 'a-repo');
    await plant('x', 'y', 'too-deep');

    const found = await findLegacySessionFiles([root], 2);
    expect(found).toEqual([
      { repoRoot: b, filePath: join(b, '.worksession', 'sessions.json') },
      { repoRoot: a, filePath: join(a, '.worksession', 'sessions.json') },
    ]);
  });

  it('skips hidden directories and node_modules', async () => {
    await plant('.cache', 'repo');
    await plant('node_modules', 'pkg');
    expect(await findLegacySessionFiles([root], 3)).toEqual([]);
  });

  it('ignores excluded files and missing roots', async () => {
    const repo = await plant('repo');
    const excluded = join(repo, '.worksession', 'sessions.json');
    expect(await findLegacySessionFiles([root, join(root, 'missing')], 3, [excluded])).toEqual([]);
  });
});
