/**
 * Schema for the plan document a planner returns
 */

export interface PlanDocumentStep {
  /**
   * Step identifier; numbers are converted to strings
   */
  step_number: number | string;

  description: string;

  /**
   * Capability that performs the step (filesystem, shell, vcs, web, memory)
   */
  tool: string;

  /**
   * Provider-specific action name, such as read_file or run_command
   */
  action: string;

  args: Record<string, unknown>;

  expected_output: string;

  /**
   * Step numbers that must finish first
   */
  dependencies: Array<number | string>;

  /**
   * A failed required step halts its dependents
   */
  required: boolean;

  /**
   * Per-attempt timeout override in milliseconds
   */
  timeout_ms?: number;
}

export interface PlanDocumentRisk {
  risk: string;
  severity: 'low' | 'medium' | 'high';
  mitigation: string;
}

export interface PlanDocument {
  goal: string;

  /**
   * False when the goal cannot be achieved with the available capabilities
   */
  feasible: boolean;

  overall_strategy: string;

  steps: PlanDocumentStep[];

  risks: PlanDocumentRisk[];

  assumptions: string[];

  estimated_duration_minutes: number;
}

/**
 * JSON Schema definition, sent to external planners
 */
export const planDocumentJsonSchema = {
  type: 'object',
  required: ['goal', 'steps'],
  properties: {
    goal: { type: 'string', minLength: 1 },
    feasible: {
      type: 'boolean',
      default: true,
      description: 'False when the goal cannot be achieved with the available capabilities',
    },
    overall_strategy: { type: 'string', description: 'Short description of the approach' },
    steps: {
      type: 'array',
      items: {
        type: 'object',
        required: ['step_number', 'description', 'tool', 'action'],
        properties: {
          step_number: { type: ['integer', 'string'] },
          description: { type: 'string', minLength: 1 },
          tool: {
            type: 'string',
            description: 'Capability name: filesystem, shell, vcs, web or memory',
          },
          action: { type: 'string', minLength: 1 },
          args: { type: 'object', default: {} },
          expected_output: { type: 'string', default: '' },
          dependencies: {
            type: 'array',
            items: { type: ['integer', 'string'] },
            default: [],
            description: 'Step numbers that must finish before this step starts',
          },
          required: { type: 'boolean', default: true },
          timeout_ms: { type: 'integer', minimum: 1 },
        },
      },
    },
    risks: {
      type: 'array',
      default: [],
      items: {
        type: 'object',
        required: ['risk'],
        properties: {
          risk: { type: 'string' },
          severity: { type: 'string', enum: ['low', 'medium', 'high'], default: 'medium' },
          mitigation: { type: 'string', default: '' },
        },
      },
    },
    assumptions: { type: 'array', items: { type: 'string' }, default: [] },
    estimated_duration_minutes: { type: 'number', minimum: 0, default: 5 },
  },
};

export const examplePlanDocument: PlanDocument = {
  goal: 'Add a CHANGELOG entry for the 1.2.0 release',
  feasible: true,
  overall_strategy: 'Read the current changelog, prepend the new entry, then commit.',
  steps: [
    {
      step_number: 1,
      description: 'Read the existing changelog',
      tool: 'filesystem',
      action: 'read_file',
      args: { path: 'CHANGELOG.md' },
      expected_output: 'Current changelog text',
      dependencies: [],
      required: true,
    },
    {
      step_number: 2,
      description: 'Write the changelog with the new entry',
      tool: 'filesystem',
      action: 'write_file',
      args: { path: 'CHANGELOG.md', content: '## 1.2.0\n\n- Faster startup\n' },
      expected_output: 'File written',
      dependencies: [1],
      required: true,
    },
    {
      step_number: 3,
      description: 'Commit the change',
      tool: 'vcs',
      action: 'commit',
      args: { message: 'Add 1.2.0 changelog entry' },
      expected_output: 'Commit created',
      dependencies: [2],
      required: false,
    },
  ],
  risks: [{ risk: 'Changelog has local edits', severity: 'low', mitigation: 'Review the diff' }],
  assumptions: ['CHANGELOG.md exists at the repository root'],
  estimated_duration_minutes: 1,
};
