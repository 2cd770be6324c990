/**
 * Orchestration module - wires together core, capabilities, collaborators, io and logging
 * This module provides the high-level entry points for running orchestration
 */

export type { RuntimeServices, RuntimeDependencies } from './orchestrator-factory';
export {
  MEMORY_FILE_NAME,
  NO_PLANNER_MESSAGE,
  createLoggerForConfig,
  createPlanner,
  createReviewer,
  createRuntimeDependencies,
  createProductionOrchestrator,
} from './orchestrator-factory';
