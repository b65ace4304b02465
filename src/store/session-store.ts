/**
 * Durable session store: one JSON array file mapping namespaced ID to record.
 *
 * Writes are atomic (temp file + rename) and happen under an exclusive lock
 * on the store file. Records are migrated on every load path.
 */

import { resolve } from 'node:path';
import { WorkSessionError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { getSessionsPath } from '../core/paths.js';
import { runSessionMigrations } from '../core/sessions/migration.js';
import { ExitCode } from '../types/exit-codes.js';
import type { SessionRecord, SessionScope } from '../types/session.js';
import { atomicWriteJson, safeReadFile } from './atomic.js';
import { findLegacySessionFiles } from './discovery.js';
import { computeChecksum, parseJson } from './json.js';
import { withLock } from './lock.js';
import { recordFromStored, recordToStored, storeFileSchema } from './record-schema.js';

/** Version of a missing store file. */
export const ABSENT_VERSION = 'absent';

export interface SessionStoreOptions {
  /** Store file; defaults to `<home>/sessions.json`. */
  filePath?: string;
  /** Roots scanned by loadAll for legacy per-repository files. */
  workspaceRoots?: string[];
  legacyScanDepth?: number;
}

/** Records plus the content version they were read at. */
export interface VersionedRecords {
  records: SessionRecord[];
  version: string;
}

/** What an update mutator hands back: the new record set and a result. */
export interface StoreUpdate<T> {
  records: SessionRecord[];
  result: T;
}

/**
 * Parse store file content. Invalid JSON or an invalid element is a hard error.
 */
export function parseStoreContent(content: string, filePath: string): SessionRecord[] {
  const data = parseJson(content, filePath);
  const parsed = storeFileSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid content';
    throw new WorkSessionError(
      ExitCode.VALIDATION_ERROR,
      `Invalid session store ${filePath}: ${where}`,
      { fix: `Repair or move ${filePath} aside; it is never overwritten while invalid` },
    );
  }
  return parsed.data.map(recordFromStored);
}

/**
 * Throw VALIDATION_ERROR when two records share a namespaced ID.
 */
export function assertUniqueIds(records: readonly SessionRecord[]): void {
  const seen = new Set<string>();
  for (const record of records) {
    if (seen.has(record.namespacedId)) {
      throw new WorkSessionError(
        ExitCode.VALIDATION_ERROR,
        `Duplicate session for ${record.namespacedId}`,
      );
    }
    seen.add(record.namespacedId);
  }
}

/** True when a record belongs to the scope. */
export function recordInScope(record: SessionRecord, scope: SessionScope): boolean {
  if (scope.kind === 'global') return true;
  return record.repositoryRoot !== '' && resolve(record.repositoryRoot) === resolve(scope.root);
}

export class SessionStore {
  readonly filePath: string;
  private readonly workspaceRoots: string[];
  private readonly legacyScanDepth: number;

  constructor(options: SessionStoreOptions = {}) {
    this.filePath = options.filePath ?? getSessionsPath();
    this.workspaceRoots = options.workspaceRoots ?? [];
    this.legacyScanDepth = options.legacyScanDepth ?? 3;
  }

  private get log() {
    return getLogger('store');
  }

  private async read(): Promise<{ records: SessionRecord[]; version: string; migrated: boolean }> {
    const content = await safeReadFile(this.filePath);
    if (content === null) {
      return { records: [], version: ABSENT_VERSION, migrated: false };
    }
    const { records, changed } = runSessionMigrations(parseStoreContent(content, this.filePath));
    return { records, version: computeChecksum(content), migrated: changed };
  }

  private async write(records: readonly SessionRecord[]): Promise<void> {
    assertUniqueIds(records);
    await atomicWriteJson(this.filePath, records.map(recordToStored));
  }

  /**
   * Load records in scope. A missing file yields [].
   */
  async load(scope: SessionScope = { kind: 'global' }): Promise<SessionRecord[]> {
    const { records } = await this.read();
    return records.filter((record) => recordInScope(record, scope));
  }

  /** Load every record with the version of the content it came from. */
  async loadWithVersion(): Promise<VersionedRecords> {
    const { records, version } = await this.read();
    return { records, version };
  }

  /**
   * Replace the full record set.
   */
  async save(records: readonly SessionRecord[]): Promise<void> {
    await withLock(this.filePath, () => this.write(records));
  }

  /**
   * Save only when the file still has `version`; otherwise throw
   * CONCURRENT_MODIFICATION. Returns the new version.
   */
  async saveIfUnchanged(records: readonly SessionRecord[], version: string): Promise<string> {
    return withLock(this.filePath, async () => {
      const current = await this.read();
      if (current.version !== version) {
        throw new WorkSessionError(
          ExitCode.CONCURRENT_MODIFICATION,
          `Session store changed since it was read: ${this.filePath}`,
          { fix: 'Reload and retry the operation' },
        );
      }
      await this.write(records);
      const written = await safeReadFile(this.filePath);
      return written === null ? ABSENT_VERSION : computeChecksum(written);
    });
  }

  /**
   * Read-modify-write under the store lock. The mutator receives a copy of
   * the current records; the returned set is written unless it is the same
   * array and migration changed nothing.
   */
  async update<T>(
    mutator: (records: SessionRecord[]) => StoreUpdate<T> | Promise<StoreUpdate<T>>,
  ): Promise<T> {
    return withLock(this.filePath, async () => {
      const current = await this.read();
      const input = [...current.records];
      const { records, result } = await mutator(input);
      if (records !== input || current.migrated) {
        await this.write(records);
      }
      return result;
    });
  }

  /**
   * Canonical records plus records from legacy per-repository files.
   * The canonical copy of an ID wins, then the first legacy file found.
   */
  async loadAll(): Promise<SessionRecord[]> {
    const records = await this.load();
    const seen = new Set(records.map((record) => record.namespacedId));

    const legacyFiles = await findLegacySessionFiles(this.workspaceRoots, this.legacyScanDepth, [this.filePath]);
    for (const { repoRoot, filePath } of legacyFiles) {
      const content = await safeReadFile(filePath);
      if (content === null) continue;
      const { records: legacy } = runSessionMigrations(parseStoreContent(content, filePath));
      let added = 0;
      for (const record of legacy) {
        if (seen.has(record.namespacedId)) continue;
        seen.add(record.namespacedId);
        records.push(record.repositoryRoot ? record : { ...record, repositoryRoot: repoRoot });
        added++;
      }
      this.log.debug({ filePath, added }, 'loaded legacy session file');
    }

    return records;
  }
}
