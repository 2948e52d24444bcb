/**
 * Turning thrown values into operator-facing text
 */

import { isCustodianError } from '../errors.js';

/**
 * One line for the console: `[CODE] message`, or just the message for foreign errors
 */
export function formatError(error: unknown): string {
  if (isCustodianError(error)) {
    return `[${error.code}] ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * The message followed by each nested cause, outermost first
 */
export function describeCauseChain(error: unknown): string {
  const parts: string[] = [];
  let current: unknown = error;

  while (current instanceof Error && parts.length < 10) {
    parts.push(current.message);
    current = current.cause;
  }
  if (parts.length === 0) {
    parts.push(String(error));
  }

  return parts.join(' <- ');
}

/**
 * Node system error code (ENOENT, EEXIST, ...) of a thrown value, if any
 */
export function systemErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
