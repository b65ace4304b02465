/**
 * Session engine: lifecycle, status detection and reconciliation.
 */

export * from './lifecycle.js';
export * from './status-detector.js';
export * from './stop-artifact.js';
export * from './time-format.js';
export * from './cleanup.js';
export * from './cleanup-modes.js';
export * from './orphaned-branches.js';
export * from './migration.js';
export * from './sandbox-naming.js';
export * from './audit.js';
export { mapWithConcurrency } from './pool.js';
