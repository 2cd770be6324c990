/**
 * Collaborators module - planners and reviewers
 */

export { FilePlanner } from './file-planner';
export { CommandPlanner, CommandReviewer } from './command-collaborator';
export type { CommandCollaboratorOptions } from './command-collaborator';
export { RuleBasedReviewer, reviewReport } from './rule-based-reviewer';
export { extractJsonObject } from './extract-json';
