/**
 * Precondition violations.
 *
 * A view trusts its caller at the boundary and asserts. Violations are
 * defects, not runtime conditions: nothing in this package catches a
 * ViewInvariantError or turns it into a return value.
 */

import { getViewConfig } from './config.ts';

export type ViewInvariantCode =
  | 'OFFSET_OUT_OF_RANGE'
  | 'LENGTH_OUT_OF_RANGE'
  | 'INDEX_OUT_OF_RANGE'
  | 'ABSENT_BUFFER'
  | 'STALE_VIEW'
  | 'BUFFER_DISPOSED';

export class ViewInvariantError extends Error {
  constructor(
    public readonly code: ViewInvariantCode,
    message: string,
    public readonly context: Readonly<Record<string, unknown>> = {}
  ) {
    super(`${code}: ${message}`);
    this.name = 'ViewInvariantError';
  }
}

/**
 * Assert `condition`, reporting through the configured logger and throwing
 * a ViewInvariantError when it does not hold.
 */
export function invariant(
  condition: boolean,
  code: ViewInvariantCode,
  message: string,
  context: Record<string, unknown> = {}
): asserts condition {
  if (condition) return;
  const error = new ViewInvariantError(code, message, context);
  getViewConfig().logger?.error(`[byteview] ${error.message}`, context);
  throw error;
}

/**
 * Check if a thrown value is a ViewInvariantError, optionally with a given code.
 */
export function isViewInvariantError(
  value: unknown,
  code?: ViewInvariantCode
): value is ViewInvariantError {
  return value instanceof ViewInvariantError && (code === undefined || value.code === code);
}
