/**
 * Logger interface
 * Structured logging with event types and metadata
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured event types for the run lifecycle
 */
export type LogEventType =
  // Run lifecycle
  | 'run_started'
  | 'run_completed'
  | 'run_failed'
  | 'run_aborted'
  // Loop states
  | 'state_changed'
  | 'iteration_started'
  | 'stop_condition_met'
  | 'limit_exceeded'
  // Planning
  | 'plan_received'
  | 'plan_rejected'
  | 'memory_retrieved'
  // Scheduling and step execution
  | 'step_ready'
  | 'step_started'
  | 'step_succeeded'
  | 'step_failed'
  | 'step_retry'
  | 'step_skipped'
  | 'pass_completed'
  // Review
  | 'review_received'
  // Persistence
  | 'record_written'
  | 'memory_saved'
  // User interaction
  | 'prompt_shown'
  | 'prompt_answered'
  // General
  | 'debug'
  | 'info'
  | 'warn'
  | 'error';

/**
 * Base metadata included in all log events
 */
export interface LogMetadata {
  /** Unique identifier for this run */
  runId?: string;
  /** Loop state the event belongs to */
  state?: string;
  /** Loop iteration (1-based) */
  iteration?: number;
  /** Step the event concerns */
  stepId?: string;
  [key: string]: unknown;
}

export interface LogEvent {
  /** ISO 8601 */
  timestamp: string;
  level: LogLevel;
  eventType: LogEventType;
  message: string;
  metadata: LogMetadata;
}

export interface LoggerOptions {
  /** Minimum log level to emit */
  minLevel?: LogLevel;
  /** Whether to include timestamps in console output */
  includeTimestamp?: boolean;
  /** Emit one JSON object per line instead of pretty text */
  jsonOutput?: boolean;
  /** Patterns to redact from log output */
  redactPatterns?: RegExp[];
}

/**
 * Interface for structured logging
 * Implementations write to the console or to an in-memory buffer (tests)
 */
export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;

  /**
   * Log a structured event; the level is derived from the event type
   */
  event(eventType: LogEventType, message: string, metadata?: LogMetadata): void;

  /**
   * Merge context (runId, etc.) into all subsequent logs
   */
  setContext(context: Partial<LogMetadata>): void;

  clearContext(): void;

  /**
   * All events logged so far, for diagnostics
   */
  getEvents(): LogEvent[];

  setMinLevel(level: LogLevel): void;

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: Partial<LogMetadata>): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Check if a log level should be emitted given a minimum level
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

/**
 * Map an event type to the level it is logged at
 */
export function getEventLevel(eventType: LogEventType): LogLevel {
  switch (eventType) {
    case 'error':
    case 'run_failed':
    case 'step_failed':
    case 'plan_rejected':
      return 'error';
    case 'warn':
    case 'run_aborted':
    case 'limit_exceeded':
    case 'step_retry':
    case 'step_skipped':
      return 'warn';
    case 'debug':
    case 'step_ready':
    case 'prompt_shown':
    case 'prompt_answered':
      return 'debug';
    default:
      return 'info';
  }
}

/**
 * Common secret patterns to redact
 */
export const DEFAULT_REDACT_PATTERNS: RegExp[] = [
  // API keys (generic patterns)
  /(?:api[_-]?key|apikey)[=:\s]*['"]?([a-zA-Z0-9_-]{20,})['"]?/gi,
  // Bearer tokens
  /Bearer\s+[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+/gi,
  // AWS keys
  /(?:AKIA|ABIA|ACCA|ASIA)[A-Z0-9]{16}/g,
  // GitHub tokens
  /gh[pousr]_[a-zA-Z0-9]{36}/g,
  // Credentials embedded in URLs
  /\/\/[^/\s:@]+:[^/\s@]+@/g,
  // Generic secrets in env vars
  /(?:password|secret|token|credential)[=:\s]*['"]?([^\s'"]{8,})['"]?/gi,
];

/**
 * Redact secrets from a string using the given patterns
 */
export function redactSecrets(text: string, patterns: RegExp[] = DEFAULT_REDACT_PATTERNS): string {
  let result = text;
  for (const pattern of patterns) {
    // Reset lastIndex for stateful regexes
    pattern.lastIndex = 0;
    result = result.replace(pattern, (match) => {
      const visible = Math.min(4, Math.floor(match.length / 4));
      return match.slice(0, visible) + '[REDACTED]';
    });
  }
  return result;
}
