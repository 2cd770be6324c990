/**
 * Buffer Logger implementation
 * Keeps events in memory for assertions; children append to the same buffer
 */

import {
  Logger,
  LogLevel,
  LogEventType,
  LogMetadata,
  LogEvent,
  LoggerOptions,
  shouldLog,
  getEventLevel,
  redactSecrets,
  DEFAULT_REDACT_PATTERNS,
} from '../types/logger';

export class BufferLogger implements Logger {
  private minLevel: LogLevel;
  private context: Partial<LogMetadata> = {};
  private readonly buffer: LogEvent[];
  private readonly redactPatterns: RegExp[];

  /**
   * @param buffer - Event store shared with the parent when this is a child
   */
  constructor(options: LoggerOptions = {}, buffer: LogEvent[] = []) {
    this.minLevel = options.minLevel ?? 'debug';
    this.redactPatterns = options.redactPatterns ?? DEFAULT_REDACT_PATTERNS;
    this.buffer = buffer;
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.append('debug', 'debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.append('info', 'info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.append('warn', 'warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.append('error', 'error', message, metadata);
  }

  event(eventType: LogEventType, message: string, metadata?: LogMetadata): void {
    this.append(getEventLevel(eventType), eventType, message, metadata);
  }

  setContext(context: Partial<LogMetadata>): void {
    this.context = { ...this.context, ...context };
  }

  clearContext(): void {
    this.context = {};
  }

  getEvents(): LogEvent[] {
    return [...this.buffer];
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  child(additionalContext: Partial<LogMetadata>): Logger {
    const child = new BufferLogger(
      { minLevel: this.minLevel, redactPatterns: this.redactPatterns },
      this.buffer
    );
    child.setContext({ ...this.context, ...additionalContext });
    return child;
  }

  clear(): void {
    this.buffer.length = 0;
  }

  getEventsByType(eventType: LogEventType): LogEvent[] {
    return this.buffer.filter((e) => e.eventType === eventType);
  }

  hasEventType(eventType: LogEventType): boolean {
    return this.buffer.some((e) => e.eventType === eventType);
  }

  /**
   * Messages of one event type, in order
   */
  messagesOf(eventType: LogEventType): string[] {
    return this.getEventsByType(eventType).map((e) => e.message);
  }

  /**
   * Event types logged for one step, in order
   */
  eventTypesForStep(stepId: string): LogEventType[] {
    return this.buffer.filter((e) => e.metadata.stepId === stepId).map((e) => e.eventType);
  }

  private append(
    level: LogLevel,
    eventType: LogEventType,
    message: string,
    metadata?: LogMetadata
  ): void {
    if (!shouldLog(level, this.minLevel)) {
      return;
    }

    const merged: LogMetadata = { ...this.context, ...metadata };
    for (const [key, value] of Object.entries(merged)) {
      if (typeof value === 'string') {
        merged[key] = redactSecrets(value, this.redactPatterns);
      }
    }

    this.buffer.push({
      timestamp: new Date().toISOString(),
      level,
      eventType,
      message: redactSecrets(message, this.redactPatterns),
      metadata: merged,
    });
  }
}

export function createBufferLogger(options?: LoggerOptions): BufferLogger {
  return new BufferLogger(options);
}
