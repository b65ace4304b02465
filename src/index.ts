/**
 * worksession - per-work-item git worktrees, terminal sessions and sandboxes.
 */

// Types
export { ExitCode } from './types/exit-codes.js';
export type * from './types/session.js';
export type * from './types/config.js';

// Core
export { WorkSessionError, errorMessage, toWorkSessionError } from './core/errors.js';
export { formatSuccess, formatError } from './core/output.js';
export { loadConfig, getConfigValue, setConfigValue, getDefaultConfig } from './core/config.js';
export { getLogger, initLogger, closeLogger } from './core/logger.js';

// Work items
export * from './core/work-items/index.js';

// Gateways
export * from './core/gateways/index.js';

// Store
export {
  SessionStore,
  ABSENT_VERSION,
  recordInScope,
  type SessionStoreOptions,
  type VersionedRecords,
} from './store/session-store.js';

// Sessions
export * from './core/sessions/index.js';
