/**
 * Capability request fixtures
 */

import type { InvokeRequest } from '../../src/types/capability';
import type { StepArgs } from '../../src/types/plan';

export function createRequest(
  action: string,
  args: StepArgs = {},
  overrides: Partial<InvokeRequest> = {}
): InvokeRequest {
  return {
    stepId: 'step-1',
    action,
    args,
    timeoutMs: 5000,
    signal: new AbortController().signal,
    ...overrides,
  };
}
