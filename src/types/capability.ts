/**
 * Capability provider contract
 */

import type { StepArgs } from './plan';

/**
 * Classification of a provider failure
 */
export type ErrorKind =
  | 'TIMEOUT'
  | 'TRANSPORT'
  | 'UNAVAILABLE'
  | 'VALIDATION'
  | 'REJECTED'
  | 'PERMISSION_DENIED';

export const TRANSIENT_ERROR_KINDS: readonly ErrorKind[] = ['TIMEOUT', 'TRANSPORT', 'UNAVAILABLE'];

/**
 * Transient kinds are retried by the step runner; the others fail the step at once
 */
export function isTransientKind(kind: ErrorKind): boolean {
  return TRANSIENT_ERROR_KINDS.includes(kind);
}

/**
 * Structured output of a successful invocation
 */
export type CapabilityOutput = Readonly<Record<string, unknown>>;

export interface InvokeRequest {
  stepId: string;
  action: string;
  args: StepArgs;
  /** Deadline for this attempt */
  timeoutMs: number;
  /** Aborted on attempt timeout or run cancellation; providers should stop early when they can */
  signal: AbortSignal;
}

/**
 * Thrown by providers to report a classified failure
 */
export class CapabilityError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CapabilityError';
    this.kind = kind;
  }
}

/**
 * A named external provider performing the side-effecting work of a step
 */
export interface CapabilityProvider {
  readonly name: string;
  invoke(request: InvokeRequest): Promise<CapabilityOutput>;
}
