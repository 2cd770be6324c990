/**
 * Schema Validation with Zod
 * Provides runtime validation for collaborator documents and config files
 */

import { z } from 'zod';
import type { PlanDocument } from './plan-document.schema';
import type { ReviewDocument } from './review-document.schema';

/**
 * Validation result type
 */
export interface ValidationResult<T> {
  success: boolean;
  data?: T;
  errors?: string[];
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((e) => `${e.path.join('.')}: ${e.message}`);
}

function parseJson<T>(json: string, validate: (data: unknown) => ValidationResult<T>): ValidationResult<T> {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (e) {
    return {
      success: false,
      errors: [`Invalid JSON: ${e instanceof Error ? e.message : String(e)}`],
    };
  }
  return validate(data);
}

// =============================================================================
// Plan Document Schema
// =============================================================================

const stepReferenceSchema = z.union([
  z.number().int('Step number must be an integer'),
  z.string().min(1, 'Step number cannot be empty'),
]);

const planStepSchema = z.object({
  step_number: stepReferenceSchema,
  description: z.string().min(1, 'Description cannot be empty'),
  tool: z.string().min(1, 'Tool cannot be empty'),
  action: z.string().min(1, 'Action cannot be empty'),
  args: z.record(z.unknown()).default({}),
  expected_output: z.string().default(''),
  dependencies: z.array(stepReferenceSchema).default([]),
  required: z.boolean().default(true),
  timeout_ms: z.number().int().positive().optional(),
});

const planRiskSchema = z.object({
  risk: z.string().min(1),
  severity: z.enum(['low', 'medium', 'high']).default('medium'),
  mitigation: z.string().default(''),
});

export const planDocumentSchema = z.object({
  goal: z.string().min(1, 'Goal cannot be empty'),
  feasible: z.boolean().default(true),
  overall_strategy: z.string().default(''),
  steps: z.array(planStepSchema),
  risks: z.array(planRiskSchema).default([]),
  assumptions: z.array(z.string()).default([]),
  estimated_duration_minutes: z.number().min(0).default(5),
});

/**
 * Validate a plan document, filling in defaults
 */
export function validatePlanDocument(data: unknown): ValidationResult<PlanDocument> {
  const result = planDocumentSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
}

/**
 * Parse a plan document from a JSON string
 */
export function parsePlanDocument(json: string): ValidationResult<PlanDocument> {
  return parseJson(json, validatePlanDocument);
}

// =============================================================================
// Review Document Schema
// =============================================================================

const reviewIssueSchema = z.union([
  z.string().min(1),
  z.object({
    issue: z.string().min(1, 'Issue cannot be empty'),
    severity: z.enum(['low', 'medium', 'high', 'critical']).default('medium'),
    suggestion: z.string().optional(),
  }),
]);

export const reviewDocumentSchema = z.object({
  goal_achieved: z.boolean().default(false),
  status: z.string().default('needs_revision'),
  summary: z.string().default(''),
  issues: z.array(reviewIssueSchema).default([]),
  confidence: z.number().min(0).max(1).default(0),
  recommendation: z.string().default(''),
});

export function validateReviewDocument(data: unknown): ValidationResult<ReviewDocument> {
  const result = reviewDocumentSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
}

export function parseReviewDocument(json: string): ValidationResult<ReviewDocument> {
  return parseJson(json, validateReviewDocument);
}

// =============================================================================
// Config File Schema
// =============================================================================

const nonNegativeInt = z.number().int().min(0);

/**
 * Shape of .taskweave/config.json (repo) and ~/.config/taskweave/config.json (user).
 * Every key is optional; unknown keys are rejected.
 */
export const configFileSchema = z
  .object({
    loop: z.object({ maxRetries: nonNegativeInt.max(20).optional() }).strict().optional(),
    execution: z
      .object({
        maxWorkers: z.number().int().min(1).max(64).optional(),
        stepTimeoutMs: z.number().int().positive().optional(),
        stepMaxRetries: nonNegativeInt.max(10).optional(),
        haltOnRequiredFailure: z.boolean().optional(),
      })
      .strict()
      .optional(),
    backoff: z
      .object({
        delaysMs: z.array(nonNegativeInt).optional(),
        maxDelayMs: nonNegativeInt.optional(),
        jitterRatio: z.number().min(0).max(1).optional(),
      })
      .strict()
      .optional(),
    capabilities: z
      .object({
        excludedPaths: z.array(z.string().min(1)).optional(),
        forbiddenCommands: z.array(z.string().min(1)).optional(),
        webTimeoutMs: z.number().int().positive().optional(),
        commitAuthorName: z.string().min(1).optional(),
        commitAuthorEmail: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    memory: z
      .object({
        enabled: z.boolean().optional(),
        topK: z.number().int().min(1).optional(),
        maxDocuments: z.number().int().min(1).optional(),
      })
      .strict()
      .optional(),
    collaborators: z
      .object({
        planFile: z.string().min(1).optional(),
        plannerCommand: z.string().min(1).optional(),
        reviewerCommand: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    projectRoot: z.string().min(1).optional(),
    autoCommit: z.boolean().optional(),
    previewPlan: z.boolean().optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export function validateConfigFile(data: unknown): ValidationResult<ConfigFile> {
  const result = configFileSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
}

export function parseConfigFile(json: string): ValidationResult<ConfigFile> {
  return parseJson(json, validateConfigFile);
}

// =============================================================================
// Generic Validation
// =============================================================================

export type ValidatableDocumentType = 'plan' | 'review' | 'config';

/**
 * Validate any document by type
 */
export function validateDocument(
  type: ValidatableDocumentType,
  data: unknown
): ValidationResult<PlanDocument | ReviewDocument | ConfigFile> {
  switch (type) {
    case 'plan':
      return validatePlanDocument(data);
    case 'review':
      return validateReviewDocument(data);
    case 'config':
      return validateConfigFile(data);
  }
}
