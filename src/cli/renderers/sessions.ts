/**
 * Human-readable renderers for session commands.
 */

import type {
  AttachPayload,
  CleanPayload,
  CleanSummary,
  ConfigGetPayload,
  ConfigSetPayload,
  ListPayload,
  LogPayload,
  SessionEntry,
  StartPayload,
  StatusPayload,
  StopPayload,
  VersionPayload,
} from '../payloads.js';
import { BOLD, CYAN, DIM, NC, RED, YELLOW, hRule, okMark, statusColor, statusSymbol } from './colors.js';

function statusLabel(entry: SessionEntry): string {
  return `${statusColor(entry.status)}${statusSymbol(entry.status)} ${entry.status}${NC}`;
}

function sessionDetail(entry: SessionEntry): string[] {
  const lines = [
    `${BOLD}${entry.id}${NC} ${entry.title}`,
    `  ${DIM}Status:${NC}   ${statusLabel(entry)} (${entry.timeDelta})`,
    `  ${DIM}Branch:${NC}   ${entry.branch}`,
    `  ${DIM}Worktree:${NC} ${entry.worktreePath}`,
    `  ${DIM}Terminal:${NC} ${entry.terminalSession}`,
    `  ${DIM}Sandbox:${NC}  ${entry.sandboxName}`,
  ];
  if (entry.resourceStatus && entry.resourceStatus !== 'active') {
    lines.push(`  ${DIM}Resources:${NC} ${entry.resourceStatus}`);
  }
  if (entry.failureReason) {
    lines.push(`  ${RED}Failure:${NC}  ${entry.failureReason}`);
  }
  return lines;
}

// ---------------------------------------------------------------------------
// start / attach / stop
// ---------------------------------------------------------------------------

export function renderStart(data: StartPayload, quiet: boolean): string {
  if (quiet) return data.session.terminalSession;
  const lines = data.attached
    ? [`Session ${data.session.id} is already running`]
    : [`Started session ${data.session.id}`];
  if (data.created.length > 0) {
    lines.push(`  ${DIM}Created:${NC} ${data.created.join(', ')}`);
  }
  lines.push(`  ${DIM}Worktree:${NC} ${data.session.worktreePath}`);
  lines.push(`  ${DIM}Attach with:${NC} worksession attach ${data.session.id}`);
  return lines.join('\n');
}

export function renderAttach(data: AttachPayload, quiet: boolean): string {
  if (quiet) return '';
  return `Attaching to ${data.terminalSession}`;
}

/** The captured output as-is, without its trailing newline. */
export function renderLog(data: LogPayload): string {
  return data.output.replace(/\n+$/, '');
}

export function renderStop(data: StopPayload, quiet: boolean): string {
  if (quiet) return data.id;
  const lines = [`Stopped session ${data.id}`];
  for (const resource of data.stopped) {
    lines.push(`  ${okMark(true)} ${resource}`);
  }
  for (const reason of data.skipped) {
    lines.push(`  ${YELLOW}Skipped:${NC} ${reason}`);
  }
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// list / status
// ---------------------------------------------------------------------------

function renderCleanSummary(summary: CleanSummary, dryRun: boolean): string[] {
  const lines = [...summary.details];
  if (dryRun) {
    lines.push(`Would clean ${summary.wouldClean} session(s)`);
  } else {
    lines.push(
      `Cleaned ${summary.cleanedSessions} session(s): `
      + `${summary.cleanedSandboxes} sandbox(es), ${summary.cleanedWorktrees} worktree(s), `
      + `${summary.cleanedBranches} branch(es)`,
    );
  }
  for (const failure of summary.errors) {
    lines.push(`${RED}Error:${NC} ${failure.message}`);
  }
  return lines;
}

export function renderList(data: ListPayload, quiet: boolean): string {
  if (quiet) return data.sessions.map((s) => s.id).join('\n');

  const lines: string[] = [];
  if (data.cleanup && (data.cleanup.cleanedSessions > 0 || data.cleanup.errors.length > 0)) {
    lines.push(...renderCleanSummary(data.cleanup, false), '');
  }
  if (data.sessions.length === 0) {
    lines.push('No sessions');
    return lines.join('\n');
  }

  const idWidth = Math.max(...data.sessions.map((s) => s.id.length));
  lines.push(`${BOLD}Sessions (${data.total})${NC}`);
  lines.push(hRule());
  for (const session of data.sessions) {
    const time = `${DIM}${session.timeDelta}${NC}`;
    lines.push(`${statusLabel(session)}  ${CYAN}${session.id.padEnd(idWidth)}${NC}  ${time}  ${session.title || session.friendlyTitle}`);
  }
  return lines.join('\n');
}

export function renderStatus(data: StatusPayload, quiet: boolean): string {
  if (quiet) return data.session.status;
  return sessionDetail(data.session).join('\n');
}

// ---------------------------------------------------------------------------
// clean
// ---------------------------------------------------------------------------

export function renderClean(data: CleanPayload, quiet: boolean): string {
  if (data.aborted) return quiet ? '' : 'Cleanup cancelled';
  if (quiet) {
    return String(data.dryRun ? data.result.wouldClean : data.result.cleanedSessions);
  }
  if (data.sessions.length === 0 && data.branches.length === 0) {
    return 'Nothing to clean';
  }
  return renderCleanSummary(data.result, data.dryRun).join('\n');
}

// ---------------------------------------------------------------------------
// config / version
// ---------------------------------------------------------------------------

function formatValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

export function renderConfigGet(data: ConfigGetPayload, quiet: boolean): string {
  if (quiet) return formatValue(data.value);
  return `${data.key} = ${formatValue(data.value)} ${DIM}(${data.source})${NC}`;
}

export function renderConfigSet(data: ConfigSetPayload, quiet: boolean): string {
  if (quiet) return '';
  return `Set ${data.key} = ${formatValue(data.value)} in ${data.scope} config`;
}

export function renderVersion(data: VersionPayload): string {
  return data.version;
}
