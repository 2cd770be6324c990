/**
 * Mock ProcessRunner implementation
 * For testing - returns predefined results without spawning real processes
 */

import { ProcessRunner, SpawnOptions, SpawnResult } from '../types/process-runner';

/**
 * Configuration for mock process behavior
 */
export interface MockProcessConfig {
  /** Exit code to return (default: 0) */
  exitCode?: number;
  durationMs?: number;
  stdoutLines?: string[];
  stderrLines?: string[];
  timedOut?: boolean;
  interrupted?: boolean;
  signal?: string;
  /** Error to throw (simulates spawn failure) */
  throwError?: Error;
}

export interface MockProcessCall {
  command: string;
  args: string[];
  options: SpawnOptions;
}

/**
 * Mock implementation of ProcessRunner for testing.
 * Commands are matched by their full command line ("git status --porcelain"),
 * then by pattern, then fall back to the default config.
 */
export class MockProcessRunner implements ProcessRunner {
  private defaultConfig: MockProcessConfig;
  private commandConfigs: Map<string, MockProcessConfig> = new Map();
  private patternConfigs: Array<{ pattern: RegExp; config: MockProcessConfig }> = [];
  private callHistory: MockProcessCall[] = [];

  constructor(defaultConfig: MockProcessConfig = {}) {
    this.defaultConfig = {
      exitCode: 0,
      durationMs: 100,
      stdoutLines: [],
      stderrLines: [],
      timedOut: false,
      interrupted: false,
      ...defaultConfig,
    };
  }

  /**
   * Configure behavior for an exact command line
   */
  setCommandConfig(commandLine: string, config: MockProcessConfig): void {
    this.commandConfigs.set(commandLine, config);
  }

  /**
   * Configure behavior for command lines matching a pattern
   */
  setPatternConfig(pattern: RegExp, config: MockProcessConfig): void {
    this.patternConfigs.push({ pattern, config });
  }

  getCallHistory(): MockProcessCall[] {
    return [...this.callHistory];
  }

  /**
   * Command lines of every call, in order
   */
  getCommandLines(): string[] {
    return this.callHistory.map((call) => [call.command, ...call.args].join(' '));
  }

  reset(): void {
    this.commandConfigs.clear();
    this.patternConfigs = [];
    this.callHistory = [];
  }

  async spawn(command: string, options: SpawnOptions): Promise<SpawnResult> {
    this.callHistory.push({ command, args: [...options.args], options });

    const commandLine = [command, ...options.args].join(' ');
    const matched =
      this.commandConfigs.get(commandLine) ??
      this.patternConfigs.find((entry) => entry.pattern.test(commandLine))?.config;
    const config: MockProcessConfig = { ...this.defaultConfig, ...matched };

    if (config.throwError) {
      throw config.throwError;
    }

    for (const line of config.stdoutLines ?? []) {
      options.onStdout?.(line + '\n');
    }
    for (const line of config.stderrLines ?? []) {
      options.onStderr?.(line + '\n');
    }

    return {
      exitCode: config.exitCode ?? 0,
      durationMs: config.durationMs ?? 100,
      stdoutTail: config.stdoutLines ?? [],
      stderrTail: config.stderrLines ?? [],
      timedOut: config.timedOut ?? false,
      interrupted: config.interrupted ?? false,
      ...(config.signal !== undefined ? { signal: config.signal } : {}),
    };
  }
}
