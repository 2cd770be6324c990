/**
 * Plan and step types
 */

/**
 * Lifecycle of a step within one execution pass
 */
export type StepStatus = 'Pending' | 'Ready' | 'Running' | 'Succeeded' | 'Failed' | 'Skipped';

export const TERMINAL_STATUSES: readonly StepStatus[] = ['Succeeded', 'Failed', 'Skipped'];

export function isTerminalStatus(status: StepStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/**
 * Provider-specific instruction payload; opaque to the scheduler
 */
export type StepArgs = Readonly<Record<string, unknown>>;

/**
 * One unit of work as planned
 */
export interface StepSpec {
  /** Unique within a plan */
  readonly id: string;
  /** Human-readable intent */
  readonly description: string;
  /** Registered capability provider name */
  readonly capability: string;
  readonly action: string;
  readonly args: StepArgs;
  /** Ids of steps that must be terminal before this one may run */
  readonly dependencies: readonly string[];
  /** A failed required step halts its dependents */
  readonly required: boolean;
  readonly expectedOutput?: string;
  /** Overrides the configured step timeout */
  readonly timeoutMs?: number;
}

export type RiskSeverity = 'low' | 'medium' | 'high';

export interface PlanRisk {
  readonly risk: string;
  readonly severity: RiskSeverity;
  readonly mitigation: string;
}

/**
 * Ordered collection of steps plus planning context.
 * Frozen before it reaches the scheduler; refinement creates a new Plan.
 */
export interface Plan {
  readonly goal: string;
  readonly feasible: boolean;
  readonly strategy: string;
  readonly steps: readonly StepSpec[];
  readonly risks: readonly PlanRisk[];
  readonly assumptions: readonly string[];
  readonly estimatedDurationMinutes: number;
}
