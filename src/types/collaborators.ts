/**
 * Collaborator contracts: planning, review and memory retrieval
 *
 * Planners and reviewers return raw documents; the orchestration loop
 * validates them, so an external process can be plugged in unchanged.
 */

import type { ExecutionReport } from './execution';
import type { Plan } from './plan';

export interface PlanRequest {
  goal: string;
  /** Loop iteration (1-based) the plan is requested for */
  iteration: number;
  /** Issues from the previous review or planning failure */
  feedback: string[];
  /** Rendered memory matches, empty when none */
  memoryContext: string;
  previousPlan?: Plan;
  signal?: AbortSignal;
}

export interface Planner {
  readonly name: string;
  /**
   * Produce a plan document (validated by the caller)
   */
  plan(request: PlanRequest): Promise<unknown>;
}

export interface ReviewRequest {
  goal: string;
  strategy: string;
  report: ExecutionReport;
  signal?: AbortSignal;
}

export interface Reviewer {
  readonly name: string;
  /**
   * Produce a review document (validated by the caller)
   */
  review(request: ReviewRequest): Promise<unknown>;
}

export interface MemoryEntry {
  id: string;
  content: string;
  source: string;
  metadata: Record<string, string>;
  createdAt: string;
}

export interface MemoryMatch {
  entry: MemoryEntry;
  /** Similarity in 0..1 */
  score: number;
}

export interface NewMemoryEntry {
  content: string;
  source?: string;
  metadata?: Record<string, string>;
}

export interface MemoryRetriever {
  search(query: string, limit: number): Promise<MemoryMatch[]>;
  /**
   * Render the best matches as a context block for the planner
   */
  getContext(query: string, limit: number): Promise<string>;
  save(entry: NewMemoryEntry): Promise<MemoryEntry>;
}
