/**
 * Logging module - structured logging implementations
 */

export type { ConsoleLoggerOptions } from './console-logger';
export { ConsoleLogger, createConsoleLogger } from './console-logger';
export { BufferLogger, createBufferLogger } from './buffer-logger';

// Run summary
export { formatRunSummaryMarkdown, formatDuration } from './run-summary';
