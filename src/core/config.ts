/**
 * Configuration engine for worksession.
 *
 * Resolution priority: Environment vars > Repository config > Global config > Defaults
 */

import { z } from 'zod';
import type { ConfigSource, ResolvedValue, WorkSessionConfig } from '../types/config.js';
import { ExitCode } from '../types/exit-codes.js';
import { WorkSessionError } from './errors.js';
import { getGlobalConfigPath, getRepoConfigPath } from './paths.js';
import { readJson, saveJson } from '../store/json.js';

/** Default configuration values. */
const DEFAULTS: WorkSessionConfig = {
  worktreeBasePath: '~/.worksession-worktrees',
  session: {
    command: 'sandbox',
    commandArgs: ['--name', '$SANDBOX'],
    noCommand: false,
  },
  status: {
    maxFileSizeBytes: 1024 * 1024, // 1MiB
    timeoutSeconds: 5,
  },
  cleanup: {
    concurrency: 1,
  },
  store: {
    workspaceRoots: ['~/code', '~/src', '~/projects'],
    legacyScanDepth: 3,
  },
  gateways: {
    commandTimeoutMs: 30_000,
    tmuxBinary: 'tmux',
    sandboxBinary: 'sandbox',
    gitBinary: 'git',
  },
  output: {
    defaultFormat: 'human',
  },
  logging: {
    level: 'info',
    filePath: 'logs/worksession.log',
    maxFileSize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5,
  },
};

const configSchema: z.ZodType<WorkSessionConfig> = z.object({
  worktreeBasePath: z.string().min(1),
  session: z.object({
    command: z.string(),
    commandArgs: z.array(z.string()),
    noCommand: z.boolean(),
  }),
  status: z.object({
    maxFileSizeBytes: z.number().int().min(1024).max(10 * 1024 * 1024),
    timeoutSeconds: z.number().int().min(1).max(30),
  }),
  cleanup: z.object({
    concurrency: z.number().int().min(1).max(16),
  }),
  store: z.object({
    workspaceRoots: z.array(z.string().min(1)),
    legacyScanDepth: z.number().int().min(0).max(10),
  }),
  gateways: z.object({
    commandTimeoutMs: z.number().int().positive(),
    tmuxBinary: z.string().min(1),
    sandboxBinary: z.string().min(1),
    gitBinary: z.string().min(1),
  }),
  output: z.object({
    defaultFormat: z.enum(['json', 'human']),
  }),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
    filePath: z.string().min(1),
    maxFileSize: z.number().int().positive(),
    maxFiles: z.number().int().positive(),
  }),
});

/** Environment variable to config path mapping. */
const ENV_MAP: Record<string, string> = {
  WORKSESSION_WORKTREE_BASE_PATH: 'worktreeBasePath',
  WORKSESSION_SESSION_COMMAND: 'session.command',
  WORKSESSION_NO_COMMAND: 'session.noCommand',
  WORKSESSION_STATUS_MAX_FILE_SIZE_BYTES: 'status.maxFileSizeBytes',
  WORKSESSION_STATUS_TIMEOUT_SECONDS: 'status.timeoutSeconds',
  WORKSESSION_CLEANUP_CONCURRENCY: 'cleanup.concurrency',
  WORKSESSION_COMMAND_TIMEOUT_MS: 'gateways.commandTimeoutMs',
  WORKSESSION_TMUX_BINARY: 'gateways.tmuxBinary',
  WORKSESSION_SANDBOX_BINARY: 'gateways.sandboxBinary',
  WORKSESSION_GIT_BINARY: 'gateways.gitBinary',
  WORKSESSION_FORMAT: 'output.defaultFormat',
  WORKSESSION_LOG_LEVEL: 'logging.level',
  WORKSESSION_LOG_FILE: 'logging.filePath',
};

/** A plain JSON object. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Get a value at a dotted path from an object.
 */
export function getNestedValue(obj: Record<string, unknown>, path: string): unknown {
  let current: unknown = obj;
  for (const part of path.split('.')) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }
  return current;
}

/**
 * Set a value at a dotted path in an object (mutates).
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop();
  if (last === undefined) return;
  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;
}

/**
 * Deep merge two objects. Source values override target values.
 * Arrays are replaced (not merged).
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const [key, sourceVal] of Object.entries(source)) {
    const targetVal = result[key];
    if (isRecord(sourceVal) && isRecord(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal);
    } else {
      result[key] = sourceVal;
    }
  }
  return result;
}

/**
 * Parse an environment variable value to the appropriate type.
 */
function parseEnvValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;
  return value;
}

/**
 * Parse a CLI string value into its JSON type.
 * Handles booleans, null, integers, floats and JSON arrays/objects.
 */
export function parseConfigValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (value === 'null') return null;
  if (/^-?\d+$/.test(value)) return parseInt(value, 10);
  if (/^-?\d+\.\d+$/.test(value)) return parseFloat(value);
  if (value.startsWith('[') || value.startsWith('{')) {
    try {
      return JSON.parse(value);
    } catch {
      return value;
    }
  }
  return value;
}

function defaultsRecord(): Record<string, unknown> {
  const copy: unknown = structuredClone(DEFAULTS);
  return isRecord(copy) ? copy : {};
}

async function readConfigFile(filePath: string): Promise<Record<string, unknown> | null> {
  const data = await readJson(filePath);
  if (data === null) return null;
  if (!isRecord(data)) {
    throw new WorkSessionError(
      ExitCode.CONFIG_ERROR,
      `Config file must contain a JSON object: ${filePath}`,
    );
  }
  return data;
}

function validateConfig(merged: Record<string, unknown>, origin: string): WorkSessionConfig {
  const result = configSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new WorkSessionError(
      ExitCode.CONFIG_ERROR,
      `Invalid configuration (${origin}): ${issues}`,
      { fix: 'Run `worksession config get` to inspect the resolved values' },
    );
  }
  return result.data;
}

/** Default configuration, fully resolved. */
export function getDefaultConfig(): WorkSessionConfig {
  return structuredClone(DEFAULTS);
}

/**
 * Load and merge configuration from all sources.
 * Priority: defaults < global config < repository config < environment vars
 */
export async function loadConfig(repoRoot?: string): Promise<WorkSessionConfig> {
  let merged = defaultsRecord();

  const globalConfig = await readConfigFile(getGlobalConfigPath());
  if (globalConfig) {
    merged = deepMerge(merged, globalConfig);
  }

  if (repoRoot) {
    const repoConfig = await readConfigFile(getRepoConfigPath(repoRoot));
    if (repoConfig) {
      merged = deepMerge(merged, repoConfig);
    }
  }

  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (envValue !== undefined) {
      setNestedValue(merged, configPath, parseEnvValue(envValue));
    }
  }

  return validateConfig(merged, 'merged');
}

/**
 * Get a single config value with source tracking.
 */
export async function getConfigValue(
  path: string,
  repoRoot?: string,
): Promise<ResolvedValue> {
  assertKnownKey(path);

  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (configPath === path && envValue !== undefined) {
      return { value: parseEnvValue(envValue), source: 'env' };
    }
  }

  const layers: Array<[ConfigSource, string | null]> = [
    ['repository', repoRoot ? getRepoConfigPath(repoRoot) : null],
    ['global', getGlobalConfigPath()],
  ];
  for (const [source, filePath] of layers) {
    if (!filePath) continue;
    const config = await readConfigFile(filePath);
    if (!config) continue;
    const value = getNestedValue(config, path);
    if (value !== undefined) {
      return { value, source };
    }
  }

  return { value: getNestedValue(defaultsRecord(), path), source: 'default' };
}

function assertKnownKey(key: string): void {
  if (getNestedValue(defaultsRecord(), key) === undefined) {
    throw new WorkSessionError(ExitCode.CONFIG_ERROR, `Unknown config key: ${key}`, {
      fix: 'Keys use dotted paths, e.g. cleanup.concurrency',
    });
  }
}

/**
 * Set a config value in the repository or global config file.
 * The file is rejected unchanged when the result would not validate.
 */
export async function setConfigValue(
  key: string,
  value: string,
  opts: { global?: boolean; repoRoot?: string } = {},
): Promise<{ key: string; value: unknown; scope: 'repository' | 'global' }> {
  assertKnownKey(key);
  const repoRoot = opts.global ? undefined : opts.repoRoot;
  const scope = repoRoot ? 'repository' : 'global';
  const configPath = repoRoot ? getRepoConfigPath(repoRoot) : getGlobalConfigPath();

  const config = (await readConfigFile(configPath)) ?? {};
  const parsedValue = parseConfigValue(value);
  setNestedValue(config, key, parsedValue);

  validateConfig(deepMerge(defaultsRecord(), config), configPath);
  await saveJson(configPath, config);

  return { key, value: parsedValue, scope };
}
