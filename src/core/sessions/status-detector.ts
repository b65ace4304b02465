/**
 * Live session status, inferred from external evidence.
 *
 * Precedence:
 *   1. a parsable shutdown artifact            -> stopped
 *   2. terminal session confirmed alive        -> active
 *   3. artifact present but unparsable         -> unknown
 *   4. terminal check failed                   -> unknown
 *   5. otherwise                               -> stale
 */

import { readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { errorMessage } from '../errors.js';
import { getLogger } from '../logger.js';
import { STOP_ARTIFACT_RELATIVE_PATH } from '../paths.js';
import type { SandboxGateway, TerminalGateway } from '../gateways/types.js';
import type { SessionRecord, SessionStatus } from '../../types/session.js';
import { isErrnoException } from '../../store/atomic.js';
import { mapWithConcurrency } from './pool.js';
import { parseStopArtifact, type StopArtifact } from './stop-artifact.js';
import { formatTimeDelta, parseTimestamp } from './time-format.js';

export interface StatusDetectorOptions {
  terminal: TerminalGateway;
  sandbox: SandboxGateway;
  /** Largest artifact that will be parsed. */
  maxFileSizeBytes: number;
  /** Timeout for the read from inside the sandbox. */
  sandboxReadTimeoutMs: number;
  now?: () => Date;
}

/** Artifact path for a worktree; the sandbox sees the worktree at the same path. */
export function stopArtifactPath(worktreePath: string): string {
  return join(worktreePath, STOP_ARTIFACT_RELATIVE_PATH);
}

/**
 * Read the artifact from the local filesystem, refusing oversized files
 * before reading them.
 */
export async function readLocalStopArtifact(path: string, maxBytes: number): Promise<StopArtifact> {
  try {
    const info = await stat(path);
    if (info.size > maxBytes) {
      return { kind: 'invalid', reason: `larger than ${maxBytes} bytes` };
    }
    return parseStopArtifact(await readFile(path, 'utf8'), maxBytes);
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      return { kind: 'absent' };
    }
    return { kind: 'invalid', reason: errorMessage(err) };
  }
}

export class StatusDetector {
  private readonly now: () => Date;

  constructor(private readonly options: StatusDetectorOptions) {
    this.now = options.now ?? (() => new Date());
  }

  private get log() {
    return getLogger('status');
  }

  /**
   * Locate and parse the shutdown artifact: inside the sandbox first, then
   * in the worktree. A failed sandbox read falls through to the worktree.
   */
  async readStopArtifact(record: SessionRecord): Promise<StopArtifact> {
    if (!record.worktreePath) return { kind: 'absent' };
    const path = stopArtifactPath(record.worktreePath);

    if (record.sandboxName) {
      try {
        const content = await this.options.sandbox.readFile(record.sandboxName, path, {
          timeoutMs: this.options.sandboxReadTimeoutMs,
        });
        return parseStopArtifact(content, this.options.maxFileSizeBytes);
      } catch (err) {
        this.log.debug({ sandbox: record.sandboxName, err: errorMessage(err) }, 'sandbox artifact read failed, using worktree');
      }
    }

    return readLocalStopArtifact(path, this.options.maxFileSizeBytes);
  }

  async detect(record: SessionRecord): Promise<SessionStatus> {
    const now = this.now();
    const artifact = await this.readStopArtifact(record);

    if (artifact.kind === 'stopped') {
      return { status: 'stopped', lastChange: artifact.at, timeDelta: formatTimeDelta(artifact.at, now) };
    }

    let terminal: 'present' | 'absent' | 'error' = 'absent';
    if (record.terminalSession) {
      try {
        terminal = (await this.options.terminal.sessionExists(record.terminalSession)) ? 'present' : 'absent';
      } catch (err) {
        this.log.warn({ session: record.terminalSession, err: errorMessage(err) }, 'terminal check failed');
        terminal = 'error';
      }
    }

    if (terminal === 'present') {
      return { status: 'active', lastChange: null, timeDelta: 'now' };
    }
    if (artifact.kind === 'invalid' || terminal === 'error') {
      if (artifact.kind === 'invalid') {
        this.log.debug({ id: record.namespacedId, reason: artifact.reason }, 'unparsable shutdown artifact');
      }
      return { status: 'unknown', lastChange: null, timeDelta: 'unknown' };
    }

    const lastActivity = parseTimestamp(record.lastActivity);
    return { status: 'stale', lastChange: lastActivity, timeDelta: formatTimeDelta(lastActivity, now) };
  }

  /** Detect every record, `concurrency` at a time, results in input order. */
  detectAll(records: readonly SessionRecord[], concurrency = 1): Promise<SessionStatus[]> {
    return mapWithConcurrency(records, concurrency, (record) => this.detect(record));
  }
}
