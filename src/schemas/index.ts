/**
 * Export plan document schema
 */
export {
  planDocumentJsonSchema,
  examplePlanDocument,
} from './plan-document.schema';
export type { PlanDocument, PlanDocumentStep, PlanDocumentRisk } from './plan-document.schema';

/**
 * Export review document schema
 */
export {
  reviewDocumentJsonSchema,
  exampleReviewDocument,
} from './review-document.schema';
export type {
  ReviewDocument,
  ReviewDocumentIssue,
  ReviewDocumentStatus,
} from './review-document.schema';

/**
 * Export validators
 */
export {
  validatePlanDocument,
  parsePlanDocument,
  validateReviewDocument,
  parseReviewDocument,
  validateConfigFile,
  parseConfigFile,
  validateDocument,
  // Zod schemas
  planDocumentSchema,
  reviewDocumentSchema,
  configFileSchema,
} from './validators';
export type { ValidationResult, ValidatableDocumentType, ConfigFile } from './validators';

/**
 * Export document conversion
 */
export {
  documentToPlan,
  planToDocument,
  statusToVerdict,
  documentToDecision,
  decisionToDocument,
} from './document-conversion';
