/**
 * Sandbox name resolution for session records.
 *
 * Strategies are tried in order; the first that yields a name wins.
 */

import type { SessionRecord } from '../../types/session.js';

export interface SandboxNameStrategy {
  name: string;
  resolve(record: SessionRecord): string | null;
}

export const SANDBOX_NAME_STRATEGIES: readonly SandboxNameStrategy[] = [
  {
    name: 'stored',
    resolve: (record) => record.sandboxName || null,
  },
  {
    name: 'namespaced',
    resolve: (record) => (record.repositoryName ? `worksession-${record.namespacedId}` : null),
  },
  {
    name: 'pre-namespacing',
    resolve: (record) => `work-issue-${record.namespacedId}`,
  },
];

/**
 * Name of the sandbox that belongs to a record.
 */
export function resolveSandboxName(
  record: SessionRecord,
  strategies: readonly SandboxNameStrategy[] = SANDBOX_NAME_STRATEGIES,
): string {
  for (const strategy of strategies) {
    const name = strategy.resolve(record);
    if (name) return name;
  }
  return '';
}
