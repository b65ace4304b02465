/**
 * Tests for output format resolution.
 */

import { describe, it, expect } from 'vitest';
import { resolveFormat } from '../middleware/output-format.js';

describe('resolveFormat', () => {
  it('prefers explicit flags', () => {
    expect(resolveFormat({ human: true }, { configDefault: 'json', isTTY: false })).toEqual({
      format: 'human',
      source: 'flag',
      quiet: false,
    });
    expect(resolveFormat({ json: true, quiet: true }, { configDefault: 'human' })).toEqual({
      format: 'json',
      source: 'flag',
      quiet: true,
    });
  });

  it('falls back to the configured default, then the terminal', () => {
    expect(resolveFormat({}, { configDefault: 'json', isTTY: true }).source).toBe('config');
    expect(resolveFormat({}, { isTTY: true })).toMatchObject({ format: 'human', source: 'tty' });
    expect(resolveFormat({}, { isTTY: false })).toMatchObject({ format: 'json', source: 'tty' });
    expect(resolveFormat({})).toMatchObject({ format: 'json', source: 'default' });
  });

  it('rejects --json with --human', () => {
    expect(() => resolveFormat({ json: true, human: true })).toThrow('--json and --human cannot be combined');
  });
});
