/**
 * Session lifecycle: start, attach, log, stop, list and clean.
 *
 * Every state change goes through SessionStore.update so the read-modify-write
 * happens under the store lock.
 */

import { existsSync } from 'node:fs';
import { basename, join, resolve } from 'node:path';
import { WorkSessionError, errorMessage } from '../errors.js';
import { commandFailed, runCommand, type CommandRunner } from '../gateways/exec.js';
import { getLogger } from '../logger.js';
import { LOGHOOK_RELATIVE_PATH } from '../paths.js';
import type { Gateways, VcsGateway } from '../gateways/types.js';
import {
  branchName,
  formatWorkItemId,
  friendlyTitle,
  sandboxName,
  terminalSessionName,
  worktreePath,
  type WorkItemId,
} from '../work-items/work-item.js';
import { recordInScope, type SessionStore } from '../../store/session-store.js';
import type { SessionConfig, WorkSessionConfig } from '../../types/config.js';
import { ExitCode } from '../../types/exit-codes.js';
import type {
  CleanupFailure,
  CleanupResult,
  ResourceType,
  SessionRecord,
  SessionScope,
  SessionStatus,
} from '../../types/session.js';
import { appendResourceEntry } from './audit.js';
import { cleanupSessions, emptyCleanupResult, identifyStaleSessions } from './cleanup.js';
import type { CleanupMode, CleanupOptions } from './cleanup-modes.js';
import { cleanupBranches, findOrphanedBranches } from './orphaned-branches.js';
import { resolveSandboxName } from './sandbox-naming.js';
import { StatusDetector } from './status-detector.js';

/** Everything a lifecycle operation needs. */
export interface LifecycleContext {
  store: SessionStore;
  gateways: Gateways;
  config: WorkSessionConfig;
  now?: () => Date;
  /** Runs project scripts such as the loghook; defaults to runCommand. */
  run?: CommandRunner;
}

/** Environment variable carrying the friendly title into the terminal. */
export const TITLE_ENV_VAR = 'WORKSESSION_TITLE';

/** Creation steps, in order. */
export const CREATION_STEPS: readonly ResourceType[] = ['branch', 'worktree', 'terminal', 'sandbox'];

function nowOf(ctx: LifecycleContext): Date {
  return ctx.now ? ctx.now() : new Date();
}

/** Insert or replace a record by namespaced ID. */
async function persist(ctx: LifecycleContext, record: SessionRecord): Promise<SessionRecord> {
  return ctx.store.update((records) => {
    const index = records.findIndex((r) => r.namespacedId === record.namespacedId);
    const next = [...records];
    if (index >= 0) {
      next[index] = record;
    } else {
      next.push(record);
    }
    return { records: next, result: record };
  });
}

async function findRecord(ctx: LifecycleContext, id: string): Promise<SessionRecord> {
  const record = (await ctx.store.load()).find((r) => r.namespacedId === id);
  if (!record) {
    throw new WorkSessionError(ExitCode.SESSION_NOT_FOUND, `No session for ${id}`, {
      fix: `Start one with: worksession start ${id}`,
    });
  }
  return record;
}

function openRepository(ctx: LifecycleContext, repoRoot: string): VcsGateway {
  const vcs = ctx.gateways.vcsFor(repoRoot);
  if (!vcs) {
    throw new WorkSessionError(ExitCode.NOT_FOUND, `Not a git repository: ${repoRoot}`, {
      fix: 'Run the command from inside the repository',
    });
  }
  return vcs;
}

// ---------------------------------------------------------------------------
// Session command
// ---------------------------------------------------------------------------

/** Quote one word for the shell the terminal runs. */
export function shellQuote(word: string): string {
  if (/^[\w@%+=:,./-]+$/.test(word)) return word;
  return `'${word.replace(/'/g, `'\\''`)}'`;
}

/**
 * Command line typed into the terminal: `$1` becomes the work item id and
 * `$SANDBOX` the sandbox name, in every argument.
 */
export function buildSessionCommand(
  session: SessionConfig,
  values: { workItemId: string; sandbox: string },
): string {
  const substitute = (arg: string) => arg.replaceAll('$SANDBOX', values.sandbox).replaceAll('$1', values.workItemId);
  return [session.command, ...session.commandArgs.map(substitute)].map(shellQuote).join(' ');
}

// ---------------------------------------------------------------------------
// start
// ---------------------------------------------------------------------------

export interface StartRequest {
  item: WorkItemId;
  title?: string;
  repositoryRoot: string;
  /** Defaults to the repository directory name. */
  repositoryName?: string;
  /** Per-invocation overrides of the configured session command. */
  session?: Partial<SessionConfig>;
  /** Only recreate an existing session's resources; never run its command. */
  resume?: boolean;
}

export interface StartResult {
  session: SessionRecord;
  /** The terminal was already running; nothing was created. */
  attached: boolean;
  /** Steps that created something; reused resources are left out. */
  created: ResourceType[];
}

function newRecord(request: StartRequest, config: WorkSessionConfig, now: Date): SessionRecord {
  const repositoryRoot = resolve(request.repositoryRoot);
  const repositoryName = request.repositoryName ?? basename(repositoryRoot);
  const item = request.item;
  return {
    namespacedId: formatWorkItemId(item),
    sourceType: item.source,
    issueTitle: request.title ?? '',
    friendlyTitle: friendlyTitle(repositoryName, item),
    branch: branchName(item, request.title ?? ''),
    worktreePath: worktreePath(config.worktreeBasePath, repositoryName, item),
    terminalSession: terminalSessionName(repositoryName, item),
    sandboxName: sandboxName(repositoryName, item),
    repositoryName,
    repositoryRoot,
    createdAt: now.toISOString(),
    lastActivity: now.toISOString(),
    status: 'active',
    resourceCreationLog: [],
  };
}

/**
 * Provision (or resume provisioning) a session: branch, worktree, terminal,
 * then the session command inside the terminal. A running session is reused.
 */
export async function startSession(request: StartRequest, ctx: LifecycleContext): Promise<StartResult> {
  const log = getLogger('lifecycle');
  const id = formatWorkItemId(request.item);
  const repositoryRoot = resolve(request.repositoryRoot);
  const vcs = openRepository(ctx, repositoryRoot);

  const existing = (await ctx.store.load()).find((r) => r.namespacedId === id);
  if (request.resume && !existing) {
    throw new WorkSessionError(ExitCode.SESSION_NOT_FOUND, `No session to resume for ${id}`, {
      fix: `Start one with: worksession start ${id}`,
    });
  }
  if (existing && existing.repositoryRoot && resolve(existing.repositoryRoot) !== repositoryRoot) {
    throw new WorkSessionError(
      ExitCode.SESSION_EXISTS,
      `${id} already has a session in ${existing.repositoryRoot}`,
      { fix: `Stop it first: worksession stop ${id}` },
    );
  }

  if (existing?.terminalSession && (await ctx.gateways.terminal.sessionExists(existing.terminalSession))) {
    const touched = await persist(ctx, { ...existing, status: 'active', lastActivity: nowOf(ctx).toISOString() });
    log.info({ id }, 'session already running');
    return { session: touched, attached: true, created: [] };
  }

  const base = existing ?? newRecord(request, ctx.config, nowOf(ctx));
  let record: SessionRecord = {
    ...base,
    status: 'active',
    resourceStatus: 'creating',
    currentCreationStep: undefined,
    failurePoint: undefined,
    failureReason: undefined,
  };
  record = await persist(ctx, record);

  const created: ResourceType[] = [];
  const { terminal } = ctx.gateways;
  const session: SessionConfig = { ...ctx.config.session, ...request.session };
  if (request.resume) session.noCommand = true;

  const steps: Record<ResourceType, () => Promise<Record<string, string> | null>> = {
    branch: async () => {
      if (await vcs.branchExists(record.branch)) return { reused: 'true' };
      await vcs.createBranch(record.branch);
      return { reused: 'false' };
    },
    worktree: async () => {
      if (await vcs.worktreeExists(record.worktreePath)) return { reused: 'true', branch: record.branch };
      await vcs.createWorktree(record.worktreePath, record.branch);
      return { reused: 'false', branch: record.branch };
    },
    terminal: async (): Promise<Record<string, string>> => {
      if (await terminal.sessionExists(record.terminalSession)) return { reused: 'true' };
      await terminal.createSession(record.terminalSession, record.worktreePath, {
        [TITLE_ENV_VAR]: record.friendlyTitle,
      });
      return { reused: 'false', workingDir: record.worktreePath };
    },
    sandbox: async () => {
      if (session.noCommand) return null;
      const commandLine = buildSessionCommand(session, {
        workItemId: request.item.id,
        sandbox: record.sandboxName,
      });
      await terminal.sendCommand(record.terminalSession, commandLine);
      return { command: commandLine };
    },
  };

  const resourceIds: Record<ResourceType, string> = {
    branch: record.branch,
    worktree: record.worktreePath,
    terminal: record.terminalSession,
    sandbox: record.sandboxName,
  };

  for (const step of CREATION_STEPS) {
    record = await persist(ctx, { ...record, currentCreationStep: step });
    try {
      const metadata = await steps[step]();
      if (metadata === null) continue;
      record = appendResourceEntry(record, { resourceType: step, resourceId: resourceIds[step], status: 'created', metadata }, nowOf(ctx));
      record = await persist(ctx, record);
      if (metadata['reused'] !== 'true') created.push(step);
      log.info({ id, step, resource: resourceIds[step], reused: metadata['reused'] === 'true' }, 'session resource ready');
    } catch (err) {
      const reason = errorMessage(err);
      record = appendResourceEntry(record, { resourceType: step, resourceId: resourceIds[step], status: 'failed', metadata: { error: reason } }, nowOf(ctx));
      record = await persist(ctx, {
        ...record,
        resourceStatus: 'failed',
        failurePoint: step,
        failureReason: reason,
      });
      log.error({ id, step, err: reason }, 'session resource creation failed');
      throw new WorkSessionError(
        ExitCode.RESOURCE_CREATION_FAILED,
        `Failed to create ${step} for ${id}: ${reason}`,
        { fix: `Fix the cause and run worksession start ${id} again to resume`, cause: err },
      );
    }
  }

  record = await persist(ctx, {
    ...record,
    resourceStatus: 'active',
    currentCreationStep: undefined,
    lastActivity: nowOf(ctx).toISOString(),
  });
  return { session: record, attached: false, created };
}

// ---------------------------------------------------------------------------
// attach
// ---------------------------------------------------------------------------

export interface AttachResult {
  session: SessionRecord;
  terminalSession: string;
}

/**
 * Record activity on a running session and return the terminal to attach to.
 */
export async function attachSession(id: string, ctx: LifecycleContext): Promise<AttachResult> {
  const record = await findRecord(ctx, id);
  if (!record.terminalSession || !(await ctx.gateways.terminal.sessionExists(record.terminalSession))) {
    throw new WorkSessionError(
      ExitCode.SESSION_NOT_FOUND,
      `Terminal session for ${id} is not running`,
      { fix: `Restart it with: worksession start ${id}` },
    );
  }
  const session = await persist(ctx, { ...record, lastActivity: nowOf(ctx).toISOString() });
  return { session, terminalSession: record.terminalSession };
}

// ---------------------------------------------------------------------------
// log
// ---------------------------------------------------------------------------

/** How long the loghook may run. */
export const LOGHOOK_TIMEOUT_MS = 10_000;

export interface SessionLog {
  id: string;
  /** `loghook` when the worktree script ran, else `terminal` (pane capture). */
  source: 'loghook' | 'terminal';
  output: string;
}

/**
 * Show a session's output: the worktree's `.worksession/loghook` run from the
 * worktree, or the terminal's active pane when there is no script.
 */
export async function readSessionLog(id: string, ctx: LifecycleContext): Promise<SessionLog> {
  const record = await findRecord(ctx, id);
  const hookPath = record.worktreePath ? join(record.worktreePath, LOGHOOK_RELATIVE_PATH) : '';

  if (hookPath && existsSync(hookPath)) {
    const run = ctx.run ?? runCommand;
    const result = await run(hookPath, [], { cwd: record.worktreePath, timeoutMs: LOGHOOK_TIMEOUT_MS });
    if (result.exitCode !== 0) {
      throw commandFailed(`loghook failed for ${id}`, result);
    }
    return { id, source: 'loghook', output: result.stdout };
  }

  const { terminal } = ctx.gateways;
  if (!record.terminalSession || !(await terminal.sessionExists(record.terminalSession))) {
    throw new WorkSessionError(
      ExitCode.SESSION_NOT_FOUND,
      `No loghook in ${record.worktreePath || 'the worktree'} and the terminal session for ${id} is not running`,
      { fix: `Add an executable ${LOGHOOK_RELATIVE_PATH} to the worktree, or restart with: worksession start ${id}` },
    );
  }
  return { id, source: 'terminal', output: await terminal.capturePane(record.terminalSession) };
}

// ---------------------------------------------------------------------------
// stop
// ---------------------------------------------------------------------------

export interface StopOptions {
  deleteSandbox?: boolean;
  /** Also removes the worktree, which holds the branch checked out. */
  deleteBranch?: boolean;
  /** Delete the branch even when unmerged. */
  force?: boolean;
}

export interface StopResult {
  session: SessionRecord;
  stopped: ResourceType[];
  skipped: string[];
}

/**
 * Shut a session down: kill its terminal, optionally delete its sandbox and
 * branch, and mark it stopped.
 */
export async function stopSession(id: string, options: StopOptions, ctx: LifecycleContext): Promise<StopResult> {
  const log = getLogger('lifecycle');
  let record = await findRecord(ctx, id);
  const stopped: ResourceType[] = [];
  const skipped: string[] = [];
  const { terminal, sandbox } = ctx.gateways;

  const audit = (resourceType: ResourceType, resourceId: string) => {
    record = appendResourceEntry(record, { resourceType, resourceId, status: 'cleanup' }, nowOf(ctx));
    stopped.push(resourceType);
  };

  if (record.terminalSession && (await terminal.sessionExists(record.terminalSession))) {
    await terminal.killSession(record.terminalSession);
    audit('terminal', record.terminalSession);
  }

  if (options.deleteSandbox) {
    const name = resolveSandboxName(record);
    if (await sandbox.sandboxExists(name)) {
      await sandbox.deleteSandbox(name);
      audit('sandbox', name);
    } else {
      skipped.push(`sandbox ${name} not found`);
    }
  }

  if (options.deleteBranch && record.branch) {
    const vcs = openRepository(ctx, record.repositoryRoot);
    if ((await vcs.currentBranch()) === record.branch) {
      skipped.push(`branch ${record.branch} is checked out`);
    } else {
      if (record.worktreePath && (await vcs.worktreeExists(record.worktreePath))) {
        await vcs.removeWorktree(record.worktreePath);
        audit('worktree', record.worktreePath);
      }
      if (await vcs.branchExists(record.branch)) {
        await vcs.deleteBranch(record.branch, options.force ?? false);
        audit('branch', record.branch);
      } else {
        skipped.push(`branch ${record.branch} not found`);
      }
    }
  }

  record = await persist(ctx, { ...record, status: 'stopped', lastActivity: nowOf(ctx).toISOString() });
  log.info({ id, stopped }, 'session stopped');
  return { session: record, stopped, skipped };
}

// ---------------------------------------------------------------------------
// list
// ---------------------------------------------------------------------------

export interface SessionView {
  record: SessionRecord;
  status: SessionStatus;
}

/**
 * Records in scope (legacy per-repository files included) with their live status.
 */
export async function listSessions(scope: SessionScope, ctx: LifecycleContext): Promise<SessionView[]> {
  const records = (await ctx.store.loadAll()).filter((record) => recordInScope(record, scope));
  const detector = new StatusDetector({
    terminal: ctx.gateways.terminal,
    sandbox: ctx.gateways.sandbox,
    maxFileSizeBytes: ctx.config.status.maxFileSizeBytes,
    sandboxReadTimeoutMs: ctx.config.status.timeoutSeconds * 1000,
    now: ctx.now,
  });
  const statuses = await detector.detectAll(records, ctx.config.cleanup.concurrency);
  return records.map((record, i) => ({
    record,
    status: statuses[i] ?? { status: 'unknown', lastChange: null, timeDelta: 'unknown' },
  }));
}

// ---------------------------------------------------------------------------
// clean
// ---------------------------------------------------------------------------

/** Orphaned branches found in one repository. */
export interface BranchPlan {
  repoRoot: string;
  branches: string[];
}

/** What a cleanup run is about to touch. */
export interface CleanupPlan {
  mode: CleanupMode;
  sessions: SessionRecord[];
  branches: BranchPlan[];
}

export interface CleanupRun {
  plan: CleanupPlan;
  result: CleanupResult;
  /** The confirmation callback declined. */
  aborted: boolean;
}

export interface CleanupHooks {
  /** Asked before anything is deleted when options.requireConfirmation is set. */
  confirm?: (plan: CleanupPlan) => Promise<boolean>;
}

async function planBranches(
  records: readonly SessionRecord[],
  options: CleanupOptions,
  ctx: LifecycleContext,
  failures: CleanupFailure[],
): Promise<BranchPlan[]> {
  const roots = options.scope.kind === 'repository'
    ? [resolve(options.scope.root)]
    : [...new Set(records.filter((r) => r.repositoryRoot).map((r) => resolve(r.repositoryRoot)))];

  const plans: BranchPlan[] = [];
  for (const repoRoot of roots) {
    const vcs = ctx.gateways.vcsFor(repoRoot);
    if (!vcs) continue;
    try {
      const repoRecords = records.filter((r) => recordInScope(r, { kind: 'repository', root: repoRoot }));
      const branches = await findOrphanedBranches(vcs, repoRecords, ctx.gateways.terminal);
      if (branches.length > 0) plans.push({ repoRoot, branches });
    } catch (err) {
      failures.push({ subject: repoRoot, resource: 'branch', operation: 'list', message: `could not list branches in ${repoRoot}: ${errorMessage(err)}` });
    }
  }
  return plans;
}

/** Whether a session's record can go once this pass succeeded for it. */
function fullyCleaned(record: SessionRecord, options: CleanupOptions): boolean {
  return options.cleanSandboxes && (options.cleanWorktrees || !record.worktreePath);
}

/**
 * Identify stale sessions (and orphaned branches when asked), record the
 * intent to clean them, clean, then drop the records that are fully cleaned
 * and flag the rest.
 */
export async function runCleanup(
  options: CleanupOptions,
  ctx: LifecycleContext,
  hooks: CleanupHooks = {},
): Promise<CleanupRun> {
  const log = getLogger('cleanup');
  const records = await ctx.store.load();
  const touchesSessions = options.cleanSandboxes || options.cleanWorktrees;
  const sessions = touchesSessions
    ? await identifyStaleSessions(records, options.scope, ctx.gateways.terminal)
    : [];

  const planFailures: CleanupFailure[] = [];
  const branches = options.cleanBranches ? await planBranches(records, options, ctx, planFailures) : [];
  const plan: CleanupPlan = { mode: options.mode, sessions, branches };

  const nothingToDo = sessions.length === 0 && branches.length === 0;
  if (!options.dryRun && !nothingToDo && options.requireConfirmation && hooks.confirm) {
    if (!(await hooks.confirm(plan))) {
      const result = emptyCleanupResult();
      result.errors.push(...planFailures);
      return { plan, result, aborted: true };
    }
  }

  let targets = sessions;
  if (!options.dryRun && sessions.length > 0) {
    const ids = new Set(sessions.map((s) => s.namespacedId));
    targets = await ctx.store.update((current) => {
      const next = current.map((record) => {
        if (!ids.has(record.namespacedId)) return record;
        let marked: SessionRecord = { ...record, resourceStatus: 'cleanup' };
        if (options.cleanSandboxes) {
          marked = appendResourceEntry(marked, { resourceType: 'sandbox', resourceId: resolveSandboxName(record), status: 'cleanup' }, nowOf(ctx));
        }
        if (options.cleanWorktrees && record.worktreePath) {
          marked = appendResourceEntry(marked, { resourceType: 'worktree', resourceId: record.worktreePath, status: 'cleanup' }, nowOf(ctx));
        }
        return marked;
      });
      return { records: next, result: next.filter((record) => ids.has(record.namespacedId)) };
    });
  }

  const result = await cleanupSessions(targets, options, ctx.gateways);
  result.errors.push(...planFailures);

  for (const { repoRoot, branches: names } of branches) {
    const vcs = ctx.gateways.vcsFor(repoRoot);
    if (!vcs) continue;
    const outcome = await cleanupBranches(vcs, names, {
      dryRun: options.dryRun,
      force: options.force,
      verbose: options.verbose,
      silent: options.silent,
    });
    result.cleanedBranches += outcome.deleted.length;
    result.errors.push(...outcome.failures);
    result.details.push(...outcome.details);
  }

  if (!options.dryRun && result.sessions.length > 0) {
    const outcomes = new Map(result.sessions.map((o) => [o.namespacedId, o]));
    try {
      await ctx.store.update((current) => {
        const next: SessionRecord[] = [];
        for (const record of current) {
          const outcome = outcomes.get(record.namespacedId);
          if (!outcome) {
            next.push(record);
          } else if (outcome.failures.length === 0 && fullyCleaned(record, options)) {
            log.info({ id: record.namespacedId }, 'removed cleaned session record');
          } else if (outcome.failures.length === 0) {
            next.push({ ...record, status: 'stopped', resourceStatus: undefined, failurePoint: undefined, failureReason: undefined });
          } else {
            const first = outcome.failures[0];
            next.push({
              ...record,
              status: 'stopped',
              resourceStatus: 'cleanup',
              failurePoint: first && first.resource !== 'record' ? first.resource : undefined,
              failureReason: outcome.failures.map((f) => f.message).join('; '),
            });
          }
        }
        return { records: next, result: undefined };
      });
    } catch (err) {
      const message = `cleanup ran but the session store was not updated: ${errorMessage(err)}`;
      log.error({ err: errorMessage(err) }, message);
      result.errors.push({ subject: ctx.store.filePath, resource: 'record', operation: 'persist', message });
    }
  }

  return { plan, result, aborted: false };
}
