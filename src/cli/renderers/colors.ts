/**
 * Terminal color and symbol utilities for human-readable CLI output.
 *
 * Respects NO_COLOR (https://no-color.org) and FORCE_COLOR env vars.
 * Falls back to plain ASCII when color is not supported.
 */

import type { DerivedStatus } from '../../types/session.js';

/** Whether ANSI color escape codes should be used. */
const colorsEnabled: boolean = (() => {
  if (process.env['NO_COLOR'] !== undefined) return false;
  if (process.env['FORCE_COLOR'] !== undefined) return true;
  return process.stdout.isTTY === true;
})();

/** Whether Unicode symbols are supported. */
const unicodeEnabled: boolean = (() => {
  const lang = process.env['LANG'] ?? '';
  if (lang === 'C' || lang === 'POSIX') return false;
  return lang.includes('UTF') || process.platform === 'darwin';
})();

// ---------------------------------------------------------------------------
// ANSI escape helpers
// ---------------------------------------------------------------------------

function ansi(code: string): string {
  return colorsEnabled ? code : '';
}

export const BOLD = ansi('\x1b[1m');
export const DIM = ansi('\x1b[2m');
export const NC = ansi('\x1b[0m');  // reset
export const RED = ansi('\x1b[0;31m');
export const GREEN = ansi('\x1b[0;32m');
export const YELLOW = ansi('\x1b[1;33m');
export const CYAN = ansi('\x1b[0;36m');

// ---------------------------------------------------------------------------
// Status symbols and colors
// ---------------------------------------------------------------------------

const STATUS_SYMBOLS_UNICODE: Record<DerivedStatus, string> = {
  active: '●',   // filled circle
  stopped: '■',  // filled square
  stale: '○',    // hollow circle
  unknown: '?',
};

const STATUS_SYMBOLS_ASCII: Record<DerivedStatus, string> = {
  active: '*',
  stopped: '#',
  stale: 'o',
  unknown: '?',
};

export function statusSymbol(status: DerivedStatus): string {
  return (unicodeEnabled ? STATUS_SYMBOLS_UNICODE : STATUS_SYMBOLS_ASCII)[status];
}

export function statusColor(status: DerivedStatus): string {
  switch (status) {
    case 'active':  return GREEN;
    case 'stopped': return DIM;
    case 'stale':   return YELLOW;
    case 'unknown': return RED;
  }
}

/** Check mark or cross, plain letters without Unicode. */
export function okMark(ok: boolean): string {
  if (unicodeEnabled) return ok ? `${GREEN}✓${NC}` : `${RED}✗${NC}`;
  return ok ? `${GREEN}+${NC}` : `${RED}x${NC}`;
}

/** Horizontal rule. */
export function hRule(width: number = 65): string {
  return (unicodeEnabled ? '─' : '-').repeat(width);
}
