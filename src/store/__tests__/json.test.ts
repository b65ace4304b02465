/**
 * Tests for JSON parsing, checksums and locked saves.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdtemp, rm, writeFile, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { computeChecksum, parseJson, readJson, saveJson } from '../json.js';
import { withLock } from '../lock.js';
import { WorkSessionError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';

describe('parseJson', () => {
  it('parses valid JSON', () => {
    expect(parseJson('{"a":[1,2]}', 'x.json')).toEqual({ a: [1, 2] });
  });

  it('names the file in the error', () => {
    try {
      parseJson('{invalid}', '/tmp/bad.json');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(WorkSessionError);
      if (err instanceof WorkSessionError) {
        expect(err.code).toBe(ExitCode.VALIDATION_ERROR);
        expect(err.message).toBe('Invalid JSON in: /tmp/bad.json');
      }
    }
  });
});

describe('readJson / saveJson', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'worksession-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('reads and parses valid JSON', async () => {
    const filePath = join(tempDir, 'data.json');
    await writeFile(filePath, '{"key": "value"}');
    expect(await readJson(filePath)).toEqual({ key: 'value' });
  });

  it('returns null for missing files', async () => {
    expect(await readJson(join(tempDir, 'missing.json'))).toBeNull();
  });

  it('saves under the lock and releases it', async () => {
    const filePath = join(tempDir, 'config.json');
    await saveJson(filePath, { output: { defaultFormat: 'json' } });
    expect(await readFile(filePath, 'utf8')).toBe('{\n  "output": {\n    "defaultFormat": "json"\n  }\n}\n');
    expect(existsSync(`${filePath}.lock`)).toBe(false);
  });
});

describe('withLock', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'worksession-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('holds the lock while the callback runs', async () => {
    const filePath = join(tempDir, 'sessions.json');
    const seen = await withLock(filePath, async () => existsSync(`${filePath}.lock`));
    expect(seen).toBe(true);
    expect(existsSync(`${filePath}.lock`)).toBe(false);
  });

  it('fails with LOCK_TIMEOUT when the file is already locked', async () => {
    const filePath = join(tempDir, 'sessions.json');
    await withLock(filePath, async () => {
      const err = await withLock(filePath, async () => 'inner', { retries: 0 }).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(WorkSessionError);
      expect(err instanceof WorkSessionError && err.code).toBe(ExitCode.LOCK_TIMEOUT);
    });
  });

  it('releases the lock when the callback throws', async () => {
    const filePath = join(tempDir, 'sessions.json');
    await expect(withLock(filePath, async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
    expect(existsSync(`${filePath}.lock`)).toBe(false);
  });
});

describe('computeChecksum', () => {
  it('produces a 16-character hex string', () => {
    expect(computeChecksum('[]')).toMatch(/^[a-f0-9]{16}$/);
  });

  it('changes with the content', () => {
    expect(computeChecksum('[]')).toBe(computeChecksum('[]'));
    expect(computeChecksum('[]')).not.toBe(computeChecksum('[ ]'));
  });
});
