/**
 * ExecutionState
 *
 * The only mutable state shared by scheduler workers during one pass.
 * Every mutation is a synchronous method call, so on the single JS thread
 * a transition is applied completely before any other worker resumes.
 * Reads return copies.
 */

import type { CapabilityOutput } from '../types/capability';
import type { Clock } from '../types/clock';
import { IllegalTransitionError } from '../types/errors';
import type { AbortReason, SkipReason, StepFailure, StepRecord } from '../types/execution';
import type { StepStatus } from '../types/plan';
import { isTerminalStatus } from '../types/plan';
import type { PlanGraph } from './plan-graph';

/**
 * Legal status transitions
 */
const ALLOWED_TRANSITIONS: Record<StepStatus, readonly StepStatus[]> = {
  Pending: ['Ready', 'Skipped'],
  Ready: ['Running'],
  Running: ['Succeeded', 'Failed'],
  Succeeded: [],
  Failed: [],
  Skipped: [],
};

export function isAllowedTransition(from: StepStatus, to: StepStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export class ExecutionState {
  private readonly steps = new Map<string, StepRecord>();
  private readonly order: readonly string[];
  private readonly clock: Clock;
  private abortReasonValue: AbortReason | null = null;
  private firstFailureId: string | null = null;

  constructor(graph: PlanGraph, clock: Clock) {
    this.clock = clock;
    this.order = graph.planOrder;
    for (const id of graph.planOrder) {
      const node = graph.nodes.get(id);
      if (node) {
        this.steps.set(id, { spec: node.spec, status: node.initialStatus, attempts: 0 });
      }
    }
  }

  /**
   * Copy of one step record
   */
  get(stepId: string): StepRecord {
    return { ...this.require(stepId) };
  }

  statusOf(stepId: string): StepStatus {
    return this.require(stepId).status;
  }

  /**
   * Copies of all step records in plan order
   */
  snapshot(): StepRecord[] {
    return this.order.map((id) => this.get(id));
  }

  markReady(stepId: string): void {
    this.move(stepId, 'Ready');
  }

  markRunning(stepId: string): void {
    const record = this.move(stepId, 'Running');
    record.startedAt = this.clock.iso();
  }

  /**
   * Count a new attempt and return the total so far
   */
  recordAttempt(stepId: string): number {
    const record = this.require(stepId);
    if (record.status !== 'Running') {
      throw new IllegalTransitionError(stepId, record.status, 'Running');
    }
    record.attempts += 1;
    return record.attempts;
  }

  markSucceeded(stepId: string, output: CapabilityOutput): void {
    const record = this.move(stepId, 'Succeeded');
    record.output = output;
    record.finishedAt = this.clock.iso();
  }

  /**
   * Fail a running step; the first required failure is remembered
   */
  markFailed(stepId: string, failure: StepFailure): void {
    const record = this.move(stepId, 'Failed');
    record.error = failure;
    record.finishedAt = this.clock.iso();
    if (record.spec.required && this.firstFailureId === null) {
      this.firstFailureId = stepId;
    }
  }

  markSkipped(stepId: string, reason: SkipReason): void {
    const record = this.move(stepId, 'Skipped');
    record.skipReason = reason;
    record.finishedAt = this.clock.iso();
  }

  /**
   * Set the abort flag. Monotonic: the first reason sticks.
   * Returns true when this call set it.
   */
  abort(reason: AbortReason): boolean {
    if (this.abortReasonValue !== null) {
      return false;
    }
    this.abortReasonValue = reason;
    return true;
  }

  get aborted(): boolean {
    return this.abortReasonValue !== null;
  }

  get abortReason(): AbortReason | null {
    return this.abortReasonValue;
  }

  /**
   * First required step to fail, by completion time
   */
  get firstFailure(): string | null {
    return this.firstFailureId;
  }

  /**
   * Whether every step is Succeeded, Failed or Skipped
   */
  isComplete(): boolean {
    return this.order.every((id) => isTerminalStatus(this.require(id).status));
  }

  countByStatus(): Record<StepStatus, number> {
    const counts: Record<StepStatus, number> = {
      Pending: 0,
      Ready: 0,
      Running: 0,
      Succeeded: 0,
      Failed: 0,
      Skipped: 0,
    };
    for (const record of this.steps.values()) {
      counts[record.status] += 1;
    }
    return counts;
  }

  private move(stepId: string, to: StepStatus): StepRecord {
    const record = this.require(stepId);
    if (!isAllowedTransition(record.status, to)) {
      throw new IllegalTransitionError(stepId, record.status, to);
    }
    record.status = to;
    return record;
  }

  private require(stepId: string): StepRecord {
    const record = this.steps.get(stepId);
    if (!record) {
      throw new Error(`Unknown step "${stepId}"`);
    }
    return record;
  }
}
