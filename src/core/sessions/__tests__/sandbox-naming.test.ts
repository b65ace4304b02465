/**
 * Tests for sandbox name resolution.
 */

import { describe, it, expect } from 'vitest';
import { SANDBOX_NAME_STRATEGIES, resolveSandboxName } from '../sandbox-naming.js';
import { makeRecord } from './fixtures.js';

describe('resolveSandboxName', () => {
  it('uses the stored name first', () => {
    expect(resolveSandboxName(makeRecord(1))).toBe('work-issue-app-github-1');
  });

  it('derives a namespaced name when only the repository is known', () => {
    expect(resolveSandboxName(makeRecord(1, { sandboxName: '' }))).toBe('worksession-github:1');
  });

  it('falls back to the pre-namespacing pattern', () => {
    expect(resolveSandboxName(makeRecord(1, { sandboxName: '', repositoryName: '' }))).toBe('work-issue-github:1');
  });

  it('returns empty when no strategy applies', () => {
    expect(resolveSandboxName(makeRecord(1, { sandboxName: '' }), [])).toBe('');
  });

  it('tries strategies in a fixed order', () => {
    expect(SANDBOX_NAME_STRATEGIES.map((s) => s.name)).toEqual(['stored', 'namespaced', 'pre-namespacing']);
  });
});
