/**
 * Capability contracts for the external systems a session is built from.
 * The engine only talks to these interfaces; it never spawns processes itself.
 */

/** One entry of `git worktree list`. */
export interface WorktreeInfo {
  path: string;
  /** Short branch name; empty for a detached HEAD. */
  branch: string;
  head: string;
}

/** Version control operations, bound to one repository. */
export interface VcsGateway {
  readonly repoRoot: string;
  branchExists(name: string): Promise<boolean>;
  /** Create a branch at HEAD. */
  createBranch(name: string): Promise<void>;
  createWorktree(path: string, branch: string): Promise<void>;
  removeWorktree(path: string): Promise<void>;
  listWorktrees(): Promise<WorktreeInfo[]>;
  worktreeExists(path: string): Promise<boolean>;
  /** Local branches named `issue-*`. */
  listIssueBranches(): Promise<string[]>;
  currentBranch(): Promise<string>;
  /** Rejects the checked-out branch with BRANCH_PROTECTED. */
  deleteBranch(name: string, force?: boolean): Promise<void>;
}

/** Terminal multiplexer sessions. */
export interface TerminalGateway {
  sessionExists(name: string): Promise<boolean>;
  createSession(name: string, workingDir: string, env?: Record<string, string>): Promise<void>;
  killSession(name: string): Promise<void>;
  /** Type a command line into the session and press Enter. */
  sendCommand(name: string, commandLine: string): Promise<void>;
  /** Text currently shown in the session's active pane. */
  capturePane(name: string): Promise<string>;
  /** Hand the controlling terminal over to the session until it detaches. */
  attach(name: string): Promise<void>;
}

/** Isolated sandbox runtime. */
export interface SandboxGateway {
  sandboxExists(name: string): Promise<boolean>;
  deleteSandbox(name: string): Promise<void>;
  /** Read a file from inside the sandbox. */
  readFile(name: string, path: string, options?: { timeoutMs?: number }): Promise<string>;
}

/** The full set of gateways a command works with. */
export interface Gateways {
  terminal: TerminalGateway;
  sandbox: SandboxGateway;
  /** VCS gateway for a repository, or null when it cannot be opened. */
  vcsFor(repoRoot: string): VcsGateway | null;
}
