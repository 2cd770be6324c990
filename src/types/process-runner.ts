/**
 * ProcessRunner interface
 * Abstracts subprocess execution for the shell and vcs providers and the
 * command-backed collaborators
 */

export interface SpawnOptions {
  /** Arguments to pass to the command */
  args: string[];
  /** Working directory for the subprocess */
  cwd: string;
  /** Environment variables (merged with process.env) */
  env?: Record<string, string>;
  /** Kill the process after this many milliseconds (0 or unset = no timeout) */
  timeoutMs?: number;
  /** Written to stdin, which is then closed */
  input?: string;
  /** Kills the process when aborted */
  signal?: AbortSignal;
  /** Run through the platform shell */
  shell?: boolean;
  /** Number of lines to keep in tail buffers */
  tailLines?: number;
  onStdout?: (data: string) => void;
  onStderr?: (data: string) => void;
}

export interface SpawnResult {
  exitCode: number;
  durationMs: number;
  /** Last N lines of stdout */
  stdoutTail: string[];
  /** Last N lines of stderr */
  stderrTail: string[];
  /** Whether the process was killed due to timeout */
  timedOut: boolean;
  /** Whether the process was terminated by a signal (including abort) */
  interrupted: boolean;
  /** Signal that terminated the process, if any */
  signal?: string;
}

/**
 * Interface for running subprocesses
 * Implementations are real (child_process) or scripted (tests)
 */
export interface ProcessRunner {
  /**
   * Spawn a subprocess and wait for it to exit.
   * Rejects only when the process cannot be started.
   */
  spawn(command: string, options: SpawnOptions): Promise<SpawnResult>;

  /**
   * Kill every process this runner started that is still running
   */
  killAll?(signal?: NodeJS.Signals): void;
}
