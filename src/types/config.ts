/**
 * Configuration type definitions for worksession.
 * Covers repository and global config with cascade resolution.
 */

/** Output format options. */
export type OutputFormat = 'json' | 'human';

/** Session launch configuration. */
export interface SessionConfig {
  /** Command started inside the terminal session once the sandbox is named. */
  command: string;
  /** Arguments; `$1` is the work item id, `$SANDBOX` the sandbox name. */
  commandArgs: string[];
  /** Skip launching the command entirely. */
  noCommand: boolean;
}

/** Status detection configuration. */
export interface StatusConfig {
  /** Largest shutdown artifact that will be parsed, in bytes. */
  maxFileSizeBytes: number;
  /** Timeout for reads from inside a sandbox. */
  timeoutSeconds: number;
}

/** Cleanup configuration. */
export interface CleanupConfig {
  /** Sessions cleaned in parallel. */
  concurrency: number;
}

/** Session store configuration. */
export interface StoreConfig {
  /** Roots scanned for legacy per-repository session files. */
  workspaceRoots: string[];
  /** Directory depth of the legacy scan below each root. */
  legacyScanDepth: number;
}

/** External command configuration. */
export interface GatewaysConfig {
  commandTimeoutMs: number;
  tmuxBinary: string;
  sandboxBinary: string;
  gitBinary: string;
}

/** Output configuration. */
export interface OutputConfig {
  defaultFormat: OutputFormat;
}

/** Pino log levels. */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/** Logging configuration. */
export interface LoggingConfig {
  /** Minimum log level to record (default: 'info') */
  level: LogLevel;
  /** Log file path relative to the worksession home (default: 'logs/worksession.log') */
  filePath: string;
  /** Max log file size in bytes before rotation (default: 10MB) */
  maxFileSize: number;
  /** Number of rotated log files to retain (default: 5) */
  maxFiles: number;
}

/** Full resolved configuration. */
export interface WorkSessionConfig {
  /** Directory worktrees are created under, one subdirectory per repository. */
  worktreeBasePath: string;
  session: SessionConfig;
  status: StatusConfig;
  cleanup: CleanupConfig;
  store: StoreConfig;
  gateways: GatewaysConfig;
  output: OutputConfig;
  logging: LoggingConfig;
}

/** Configuration source for resolution tracking. */
export type ConfigSource = 'default' | 'global' | 'repository' | 'env';

/** A resolved config value with its source. */
export interface ResolvedValue<T = unknown> {
  value: T;
  source: ConfigSource;
}
