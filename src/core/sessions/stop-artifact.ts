/**
 * Shutdown artifact (`.worksession/stop.json`) parsing.
 *
 * Accepted shapes:
 *   { "claude_code_hook": { "timestamp": "<RFC 3339>" } }
 *   { "timestamp": "<RFC 3339>" }
 * The nested form wins when both are valid.
 */

import { z } from 'zod';
import { parseTimestamp, rfc3339Schema } from './time-format.js';

/** Hook key written by the agent's stop hook. */
export const STOP_HOOK_KEY = 'claude_code_hook';

const stampSchema = z.object({ timestamp: rfc3339Schema });
const nestedSchema = z.object({ [STOP_HOOK_KEY]: stampSchema });

/** Outcome of reading the artifact from one location. */
export type StopArtifact =
  | { kind: 'absent' }
  | { kind: 'stopped'; at: Date }
  | { kind: 'invalid'; reason: string };

/**
 * Parse artifact content. Never throws.
 */
export function parseStopArtifact(content: string, maxBytes: number): StopArtifact {
  if (Buffer.byteLength(content, 'utf8') > maxBytes) {
    return { kind: 'invalid', reason: `larger than ${maxBytes} bytes` };
  }
  if (content.trim() === '') {
    return { kind: 'invalid', reason: 'empty file' };
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch {
    return { kind: 'invalid', reason: 'invalid JSON' };
  }

  const nested = nestedSchema.safeParse(data);
  const stamp = nested.success ? nested.data[STOP_HOOK_KEY].timestamp : stampSchema.safeParse(data).data?.timestamp;
  const at = parseTimestamp(stamp);
  if (!at) {
    return { kind: 'invalid', reason: 'no valid timestamp' };
  }
  return { kind: 'stopped', at };
}
