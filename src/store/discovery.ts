/**
 * Depth-bounded discovery of legacy per-repository session files.
 */

import { existsSync } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { errorMessage } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { expandHome, getLegacySessionsPath } from '../core/paths.js';

/** A legacy session file and the repository it belongs to. */
export interface LegacySessionFile {
  repoRoot: string;
  filePath: string;
}

const SKIPPED_DIRS = new Set(['node_modules']);

/**
 * Depth-first scan of each root for `<repo>/.worksession/sessions.json`.
 * Roots are depth 0; hidden directories and node_modules are not descended.
 * Directories that cannot be read are skipped.
 */
export async function findLegacySessionFiles(
  roots: readonly string[],
  maxDepth: number,
  exclude: readonly string[] = [],
): Promise<LegacySessionFile[]> {
  const log = getLogger('store');
  const excluded = new Set(exclude.map((p) => resolve(p)));
  const found: LegacySessionFile[] = [];
  const visited = new Set<string>();

  async function visit(dir: string, depth: number): Promise<void> {
    if (visited.has(dir)) return;
    visited.add(dir);

    const candidate = getLegacySessionsPath(dir);
    if (!excluded.has(candidate) && existsSync(candidate)) {
      found.push({ repoRoot: dir, filePath: candidate });
    }
    if (depth >= maxDepth) return;

    let entries;
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (err) {
      log.debug({ dir, err: errorMessage(err) }, 'skipping unreadable directory');
      return;
    }

    const children = entries
      .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.') && !SKIPPED_DIRS.has(entry.name))
      .map((entry) => entry.name)
      .sort();
    for (const name of children) {
      await visit(join(dir, name), depth + 1);
    }
  }

  for (const root of roots) {
    const dir = resolve(expandHome(root));
    if (!existsSync(dir)) continue;
    await visit(dir, 0);
  }

  return found;
}
