/**
 * JSON envelope formatter for worksession CLI output.
 *
 * Success: { success: true, result, message?, _meta }
 * Error:   { success: false, result: null, error, _meta }
 */

import type { ErrorDetail, WorkSessionError } from './errors.js';

/** Envelope metadata. */
export interface EnvelopeMeta {
  operation: string;
  timestamp: string;
}

/** Successful command envelope. */
export interface SuccessEnvelope<T> {
  success: true;
  result: T;
  message?: string;
  _meta: EnvelopeMeta;
}

/** Failed command envelope. */
export interface ErrorEnvelope {
  success: false;
  result: null;
  error: ErrorDetail;
  _meta: EnvelopeMeta;
}

function createMeta(operation: string): EnvelopeMeta {
  return {
    operation,
    timestamp: new Date().toISOString(),
  };
}

/**
 * Build a success envelope. Operation defaults to 'cli.output'.
 */
export function buildSuccessEnvelope<T>(data: T, message?: string, operation?: string): SuccessEnvelope<T> {
  return {
    success: true,
    result: data,
    ...(message && { message }),
    _meta: createMeta(operation ?? 'cli.output'),
  };
}

/** Format a successful result as a JSON envelope string. */
export function formatSuccess<T>(data: T, message?: string, operation?: string): string {
  return JSON.stringify(buildSuccessEnvelope(data, message, operation));
}

/**
 * Format an error as a JSON envelope string.
 */
export function formatError(error: WorkSessionError, operation?: string): string {
  const envelope: ErrorEnvelope = {
    success: false,
    result: null,
    error: error.toJSON().error,
    _meta: createMeta(operation ?? 'cli.output'),
  };
  return JSON.stringify(envelope);
}

