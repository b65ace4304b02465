/**
 * Session record schema migrations.
 *
 * Each step is a pure function of one record that returns the record itself
 * when nothing applies, so re-running the list is a no-op. Steps run in
 * version order on every load.
 */

import type { SessionRecord } from '../../types/session.js';

export interface SessionMigration {
  version: number;
  description: string;
  migrate(record: SessionRecord): SessionRecord;
}

/** Words that follow `test` in branch titles without being identifiers. */
const COMMON_TITLE_WORDS = new Set([
  'development',
  'test',
  'fix',
  'bug',
  'feature',
  'add',
  'update',
  'remove',
  'implement',
  'create',
]);

/** A record is not yet namespaced when either identity field is blank. */
export function needsNamespaceMigration(record: SessionRecord): boolean {
  return record.sourceType.trim() === '' || record.namespacedId.trim() === '';
}

/**
 * Find the test identifier in a branch such as `issue-test-42-some-title`:
 * the segment after a `test` segment that is not a common title word.
 */
export function extractTestIdFromBranch(branch: string): string {
  const parts = branch.split('-');
  for (let i = 0; i < parts.length - 1; i++) {
    if (parts[i] !== 'test') continue;
    const candidate = parts[i + 1] ?? '';
    if (candidate !== '' && !COMMON_TITLE_WORDS.has(candidate.toLowerCase())) {
      return candidate;
    }
  }
  return '';
}

/** Id part given to records whose work item cannot be recovered. */
export const UNKNOWN_ID = 'unknown';

function namespaceIdentity(record: SessionRecord): SessionRecord {
  if (!needsNamespaceMigration(record)) return record;

  if (record.issueNumber !== undefined && record.issueNumber > 0) {
    return { ...record, sourceType: 'github', namespacedId: `github:${record.issueNumber}` };
  }
  if (record.branch.includes('test-')) {
    const testId = extractTestIdFromBranch(record.branch);
    return { ...record, sourceType: 'test', namespacedId: `test:${testId || UNKNOWN_ID}` };
  }
  return { ...record, sourceType: 'github', namespacedId: `github:${UNKNOWN_ID}` };
}

function retireStaleStatus(record: SessionRecord): SessionRecord {
  if (record.status !== 'stale') return record;
  return { ...record, status: 'stopped' };
}

export const MIGRATIONS: readonly SessionMigration[] = [
  {
    version: 1,
    description: 'Derive source type and namespaced ID for pre-namespacing records',
    migrate: namespaceIdentity,
  },
  {
    version: 2,
    description: 'Replace the persisted stale status with stopped',
    migrate: retireStaleStatus,
  },
];

export const SESSION_SCHEMA_VERSION = MIGRATIONS.at(-1)?.version ?? 0;

/** Migrated records plus whether any record changed. */
export interface MigrationOutcome {
  records: SessionRecord[];
  changed: boolean;
}

/**
 * Several unrecoverable records land on the same sentinel (`github:unknown`).
 * Later ones, in file order, get `-2`, `-3`, … so every id stays unique.
 */
function disambiguateSentinels(originals: readonly SessionRecord[], migrated: SessionRecord[]): void {
  const isSentinel = (i: number) => {
    const original = originals[i];
    const record = migrated[i];
    return (
      original !== undefined &&
      record !== undefined &&
      needsNamespaceMigration(original) &&
      record.namespacedId === `${record.sourceType}:${UNKNOWN_ID}`
    );
  };

  const taken = new Set<string>();
  migrated.forEach((record, i) => {
    if (!isSentinel(i)) taken.add(record.namespacedId);
  });
  migrated.forEach((record, i) => {
    if (!isSentinel(i)) return;
    let id = record.namespacedId;
    for (let n = 2; taken.has(id); n++) {
      id = `${record.sourceType}:${UNKNOWN_ID}-${n}`;
    }
    taken.add(id);
    if (id !== record.namespacedId) migrated[i] = { ...record, namespacedId: id };
  });
}

/**
 * Apply every migration step to every record.
 */
export function runSessionMigrations(records: readonly SessionRecord[]): MigrationOutcome {
  const migrated = records.map((record) => {
    let current = record;
    for (const step of MIGRATIONS) {
      current = step.migrate(current);
    }
    return current;
  });
  disambiguateSentinels(records, migrated);
  const changed = migrated.some((record, i) => record !== records[i]);
  return { records: migrated, changed };
}

/**
 * Upgrade records to the current schema. Pure and idempotent.
 */
export function migrateSessionRecords(records: readonly SessionRecord[]): SessionRecord[] {
  return runSessionMigrations(records).records;
}
