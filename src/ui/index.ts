/**
 * UI module - user interface utilities
 * Provides spinners, prompts, and plan previews
 */

// Spinner service
export type { SpinnerServiceConfig, SpinnerOutcome, Spinner } from './spinner-service';
export { SpinnerService, createSpinnerService } from './spinner-service';

// Run progress
export type { SpinnerFactory } from './run-progress';
export { RunProgress } from './run-progress';

// Inquirer-based prompter
export type { InquirerPrompterConfig } from './inquirer-prompter';
export {
  InquirerPrompter,
  createInquirerPrompter,
} from './inquirer-prompter';

// Plan preview
export { formatPlanPreview, createPlanApproval } from './plan-preview';
