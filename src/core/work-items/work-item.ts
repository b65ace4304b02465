/**
 * Work item identifiers (`source:id`) and the resource names derived from them.
 */

import { join } from 'node:path';
import { WorkSessionError } from '../errors.js';
import { expandHome } from '../paths.js';
import { ExitCode } from '../../types/exit-codes.js';

/** Longest title slug appended to a branch name. */
export const MAX_TITLE_SLUG_LENGTH = 100;

export interface WorkItemId {
  source: string;
  id: string;
}

const LEGACY_NUMERIC = /^#?(\d+)$/;
const WHITESPACE = /\s/;

function invalid(input: string, reason: string): WorkSessionError {
  return new WorkSessionError(ExitCode.INVALID_INPUT, `Invalid work item ID "${input}": ${reason}`, {
    fix: "Use the form 'source:id', e.g. github:123",
  });
}

/**
 * Parse a strict `source:id` identifier.
 */
export function parseNamespacedId(input: string): WorkItemId {
  const parts = input.split(':');
  if (parts.length !== 2) {
    throw invalid(input, "expected exactly one ':'");
  }
  const source = (parts[0] ?? '').trim();
  const id = (parts[1] ?? '').trim();
  if (!source) throw invalid(input, 'source cannot be empty');
  if (!id) throw invalid(input, 'id cannot be empty');
  if (WHITESPACE.test(source) || WHITESPACE.test(id)) {
    throw invalid(input, 'cannot contain whitespace');
  }
  return { source, id };
}

/**
 * Parse user input. Bare numbers (`123`, `#123`) are legacy GitHub issue
 * numbers and normalise to `github:123`.
 */
export function parseWorkItemId(input: string): WorkItemId {
  const trimmed = input.trim();
  if (!trimmed) {
    throw invalid(input, 'cannot be empty');
  }
  const legacy = LEGACY_NUMERIC.exec(trimmed);
  if (legacy?.[1]) {
    return { source: 'github', id: legacy[1] };
  }
  return parseNamespacedId(trimmed);
}

/** True when the string is a valid strict `source:id`. */
export function isNamespacedId(input: string): boolean {
  try {
    parseNamespacedId(input);
    return true;
  } catch {
    return false;
  }
}

export function formatWorkItemId(item: WorkItemId): string {
  return `${item.source}:${item.id}`;
}

/**
 * Branch-safe slug: lowercase, runs of non-alphanumerics become `-`,
 * trimmed, at most 100 characters.
 */
export function slugifyTitle(title: string): string {
  let slug = title.trim().toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '');
  if (slug.length > MAX_TITLE_SLUG_LENGTH) {
    slug = slug.slice(0, MAX_TITLE_SLUG_LENGTH).replace(/-+$/, '');
  }
  return slug;
}

/** `issue-<src>-<id>-<slug>`, or `issue-<src>-<id>` without a title. */
export function branchName(item: WorkItemId, title = ''): string {
  const base = `issue-${item.source}-${item.id}`;
  const slug = slugifyTitle(title);
  return slug ? `${base}-${slug}` : base;
}

/** Worktree location: `<base>/<repo>/issue-<src>-<id>`. */
export function worktreePath(basePath: string, repositoryName: string, item: WorkItemId): string {
  return join(expandHome(basePath), repositoryName, `issue-${item.source}-${item.id}`);
}

/** Terminal session name: `work-issue-<repo>-<src>-<id>`. */
export function terminalSessionName(repositoryName: string, item: WorkItemId): string {
  return `work-issue-${repositoryName}-${item.source}-${item.id}`;
}

/** Sandbox name; shares the terminal session's name. */
export function sandboxName(repositoryName: string, item: WorkItemId): string {
  return terminalSessionName(repositoryName, item);
}

/** Short display title: `<repo>-<src>-<id>`. */
export function friendlyTitle(repositoryName: string, item: WorkItemId): string {
  return `${repositoryName}-${item.source}-${item.id}`;
}

/**
 * Recover the work item from an issue branch name.
 * `issue-<src>-<id>-…` gives `src:id`; `issue-<n>-…` gives `github:<n>`.
 */
export function workItemFromBranch(branch: string): WorkItemId | null {
  if (!branch.startsWith('issue-')) return null;
  const parts = branch.split('-');
  const first = parts[1] ?? '';
  if (/^\d+$/.test(first)) {
    return { source: 'github', id: first };
  }
  const id = parts[2] ?? '';
  if (!first || !id) return null;
  return { source: first, id };
}
