/**
 * PlanGraph Builder
 *
 * Validates a Plan and turns it into a dependency graph ready for scheduling.
 * Pure: the same plan always yields the same graph or the same PlanInvalid.
 *
 * Checks run in order and the first failing check reports every problem it
 * found: duplicate ids, dangling dependencies, unknown capabilities, cycles.
 */

import type { Plan, StepSpec } from '../types/plan';
import type { PlanInvalid, PlanInvalidIssue } from '../types/errors';
import { createPlanInvalid } from '../types/errors';
import type { Result } from '../types/result';
import { ok, err } from '../types/result';

/**
 * A validated step with resolved edges
 */
export interface PlanGraphNode {
  readonly spec: StepSpec;
  /** Distinct dependency ids, in declared order */
  readonly dependencies: readonly string[];
  /** Ids of steps that depend on this one, in plan order */
  readonly dependents: readonly string[];
  readonly initialStatus: 'Pending' | 'Ready';
}

export interface PlanGraph {
  readonly plan: Plan;
  readonly nodes: ReadonlyMap<string, PlanGraphNode>;
  /** Step ids in plan order */
  readonly planOrder: readonly string[];
  /** Step ids in dependency order, ties broken by plan order */
  readonly topologicalOrder: readonly string[];
}

/**
 * Anything that can answer whether a capability name is registered
 */
export interface CapabilityLookup {
  has(name: string): boolean;
}

type VisitMark = 'unvisited' | 'visiting' | 'visited';

/**
 * Validate a plan and build its graph
 */
export function buildPlanGraph(
  plan: Plan,
  capabilities?: CapabilityLookup
): Result<PlanGraph, PlanInvalid> {
  const duplicates = findDuplicateIds(plan.steps);
  if (duplicates.length > 0) {
    return err(createPlanInvalid(duplicates));
  }

  const ids = new Set(plan.steps.map((step) => step.id));

  const missing: PlanInvalidIssue[] = [];
  for (const step of plan.steps) {
    for (const dependency of step.dependencies) {
      if (!ids.has(dependency)) {
        missing.push({
          code: 'MISSING_DEPENDENCY',
          stepId: step.id,
          message: `Step "${step.id}" depends on unknown step "${dependency}"`,
        });
      }
    }
  }
  if (missing.length > 0) {
    return err(createPlanInvalid(missing));
  }

  if (capabilities) {
    const unknown = plan.steps
      .filter((step) => !capabilities.has(step.capability))
      .map<PlanInvalidIssue>((step) => ({
        code: 'UNKNOWN_CAPABILITY',
        stepId: step.id,
        message: `Step "${step.id}" uses unknown capability "${step.capability}"`,
      }));
    if (unknown.length > 0) {
      return err(createPlanInvalid(unknown));
    }
  }

  const dependencyMap = new Map<string, string[]>();
  for (const step of plan.steps) {
    dependencyMap.set(step.id, [...new Set(step.dependencies)]);
  }

  const cycle = detectCycle(plan.steps.map((step) => step.id), dependencyMap);
  if (cycle) {
    return err(
      createPlanInvalid([
        {
          code: 'CYCLE',
          stepId: cycle[0],
          cyclePath: cycle,
          message: `Dependency cycle detected: ${cycle.join(' -> ')}`,
        },
      ])
    );
  }

  const dependents = new Map<string, string[]>();
  for (const step of plan.steps) {
    dependents.set(step.id, []);
  }
  for (const step of plan.steps) {
    for (const dependency of dependencyMap.get(step.id) ?? []) {
      dependents.get(dependency)?.push(step.id);
    }
  }

  const nodes = new Map<string, PlanGraphNode>();
  for (const step of plan.steps) {
    const deps = dependencyMap.get(step.id) ?? [];
    nodes.set(step.id, {
      spec: step,
      dependencies: deps,
      dependents: dependents.get(step.id) ?? [],
      initialStatus: deps.length === 0 ? 'Ready' : 'Pending',
    });
  }

  const planOrder = plan.steps.map((step) => step.id);

  return ok({
    plan,
    nodes,
    planOrder: Object.freeze(planOrder),
    topologicalOrder: Object.freeze(topologicalSort(planOrder, dependencyMap, dependents)),
  });
}

function findDuplicateIds(steps: readonly StepSpec[]): PlanInvalidIssue[] {
  const seen = new Set<string>();
  const reported = new Set<string>();
  const issues: PlanInvalidIssue[] = [];
  for (const step of steps) {
    if (seen.has(step.id) && !reported.has(step.id)) {
      reported.add(step.id);
      issues.push({
        code: 'DUPLICATE_STEP',
        stepId: step.id,
        message: `Duplicate step id "${step.id}"`,
      });
    }
    seen.add(step.id);
  }
  return issues;
}

/**
 * Depth-first search with visiting/visited marks.
 * Returns the cycle as a path of ids (first id repeated last), or null.
 */
export function detectCycle(
  ids: readonly string[],
  dependencies: ReadonlyMap<string, readonly string[]>
): string[] | null {
  const marks = new Map<string, VisitMark>();
  const parent = new Map<string, string>();
  for (const id of ids) {
    marks.set(id, 'unvisited');
  }

  const visit = (id: string): string[] | null => {
    marks.set(id, 'visiting');
    for (const dependency of dependencies.get(id) ?? []) {
      const mark = marks.get(dependency);
      if (mark === 'visiting') {
        return [...reconstructCycle(id, dependency, parent), dependency];
      }
      if (mark === 'unvisited') {
        parent.set(dependency, id);
        const found = visit(dependency);
        if (found) {
          return found;
        }
      }
    }
    marks.set(id, 'visited');
    return null;
  };

  for (const id of ids) {
    if (marks.get(id) === 'unvisited') {
      const found = visit(id);
      if (found) {
        return found;
      }
    }
  }
  return null;
}

/**
 * Walk parent pointers from `from` back to `to`
 */
function reconstructCycle(from: string, to: string, parent: ReadonlyMap<string, string>): string[] {
  const path = [from];
  let current = from;
  while (current !== to) {
    const previous = parent.get(current);
    if (previous === undefined) {
      break;
    }
    path.unshift(previous);
    current = previous;
  }
  return path;
}

/**
 * Kahn's algorithm; among ready steps the earliest in plan order goes first
 */
function topologicalSort(
  planOrder: readonly string[],
  dependencies: ReadonlyMap<string, readonly string[]>,
  dependents: ReadonlyMap<string, readonly string[]>
): string[] {
  const position = new Map(planOrder.map((id, index): [string, number] => [id, index]));
  const remaining = new Map(
    planOrder.map((id): [string, number] => [id, dependencies.get(id)?.length ?? 0])
  );
  const ready = planOrder.filter((id) => remaining.get(id) === 0);
  const order: string[] = [];

  while (ready.length > 0) {
    ready.sort((a, b) => (position.get(a) ?? 0) - (position.get(b) ?? 0));
    const next = ready.shift();
    if (next === undefined) {
      break;
    }
    order.push(next);
    for (const dependent of dependents.get(next) ?? []) {
      const count = (remaining.get(dependent) ?? 0) - 1;
      remaining.set(dependent, count);
      if (count === 0) {
        ready.push(dependent);
      }
    }
  }
  return order;
}
