/**
 * Map thrown values onto error kinds
 */

import type { ErrorKind } from '../types/capability';
import { CapabilityError } from '../types/capability';

const TRANSPORT_CODES: ReadonlySet<string> = new Set([
  'ETIMEDOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'EAI_AGAIN',
  'EPIPE',
  'ENOTFOUND',
]);

export interface ClassifiedError {
  kind: ErrorKind;
  message: string;
}

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Classify a thrown value. CapabilityError keeps its kind; network error
 * codes are TRANSPORT; aborts and timeouts are TIMEOUT; anything else is
 * REJECTED.
 */
export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof CapabilityError) {
    return { kind: error.kind, message: error.message };
  }

  if (error instanceof Error) {
    const code = errorCode(error) ?? (error.cause instanceof Error ? errorCode(error.cause) : undefined);
    if (code !== undefined && TRANSPORT_CODES.has(code)) {
      return { kind: 'TRANSPORT', message: error.message };
    }
    if (error.name === 'AbortError' || error.name === 'TimeoutError') {
      return { kind: 'TIMEOUT', message: error.message };
    }
    return { kind: 'REJECTED', message: error.message };
  }

  return { kind: 'REJECTED', message: String(error) };
}
