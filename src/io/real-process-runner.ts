/**
 * Real ProcessRunner implementation
 * Uses child_process.spawn for subprocess execution
 */

import { spawn, ChildProcess } from 'child_process';
import { StringDecoder } from 'string_decoder';
import { ProcessRunner, SpawnOptions, SpawnResult } from '../types/process-runner';

/**
 * Circular buffer to track last N lines of output. Raw chunks go through one
 * decoder per stream so a UTF-8 sequence split across chunks stays intact.
 */
export class TailBuffer {
  private lines: string[] = [];
  private buffer: string = '';
  private readonly maxLines: number;
  private readonly decoder = new StringDecoder('utf8');

  constructor(maxLines: number = 50) {
    this.maxLines = maxLines;
  }

  append(data: string): void {
    this.buffer += data;
    const parts = this.buffer.split('\n');
    // Keep incomplete line in buffer
    this.buffer = parts.pop() ?? '';
    for (const line of parts) {
      this.lines.push(line);
      if (this.lines.length > this.maxLines) {
        this.lines.shift();
      }
    }
  }

  /**
   * Decode a raw chunk and append it; returns the decoded text
   */
  write(chunk: Buffer): string {
    const text = this.decoder.write(chunk);
    this.append(text);
    return text;
  }

  /**
   * Flush bytes held back by the decoder once the stream ends
   */
  end(): string {
    const text = this.decoder.end();
    this.append(text);
    return text;
  }

  getLines(): string[] {
    if (this.buffer) {
      return [...this.lines, this.buffer];
    }
    return [...this.lines];
  }
}

/**
 * Real implementation of ProcessRunner using child_process
 */
export class RealProcessRunner implements ProcessRunner {
  private runningProcesses: Map<number, ChildProcess> = new Map();
  private processIdCounter = 0;

  async spawn(command: string, options: SpawnOptions): Promise<SpawnResult> {
    const startTime = Date.now();
    const tailLines = options.tailLines ?? 50;

    const stdoutTail = new TailBuffer(tailLines);
    const stderrTail = new TailBuffer(tailLines);

    return new Promise((resolve, reject) => {
      const env = options.env ? { ...process.env, ...options.env } : process.env;

      const child = spawn(command, options.args, {
        cwd: options.cwd,
        env,
        stdio: [options.input !== undefined ? 'pipe' : 'ignore', 'pipe', 'pipe'],
        shell: options.shell ?? false,
      });

      const processId = ++this.processIdCounter;
      this.runningProcesses.set(processId, child);

      let timedOut = false;
      let timer: NodeJS.Timeout | undefined;
      if (options.timeoutMs && options.timeoutMs > 0) {
        timer = setTimeout(() => {
          timedOut = true;
          child.kill('SIGTERM');
        }, options.timeoutMs);
      }

      const onAbort = (): void => {
        child.kill('SIGTERM');
      };
      if (options.signal?.aborted) {
        onAbort();
      } else {
        options.signal?.addEventListener('abort', onAbort, { once: true });
      }

      const cleanup = (): void => {
        this.runningProcesses.delete(processId);
        if (timer) {
          clearTimeout(timer);
        }
        options.signal?.removeEventListener('abort', onAbort);
      };

      child.stdout?.on('data', (data: Buffer) => {
        const str = stdoutTail.write(data);
        if (str) {
          options.onStdout?.(str);
        }
      });

      child.stderr?.on('data', (data: Buffer) => {
        const str = stderrTail.write(data);
        if (str) {
          options.onStderr?.(str);
        }
      });

      if (options.input !== undefined && child.stdin) {
        // A child that exits without reading stdin raises EPIPE here
        child.stdin.on('error', (error) => {
          stderrTail.append(`stdin: ${error.message}\n`);
        });
        child.stdin.end(options.input);
      }

      child.on('close', (code, sig) => {
        cleanup();
        const stdoutRest = stdoutTail.end();
        if (stdoutRest) {
          options.onStdout?.(stdoutRest);
        }
        const stderrRest = stderrTail.end();
        if (stderrRest) {
          options.onStderr?.(stderrRest);
        }

        const interrupted = sig !== null;
        resolve({
          exitCode: code ?? (interrupted ? 130 : 1),
          durationMs: Date.now() - startTime,
          stdoutTail: stdoutTail.getLines(),
          stderrTail: stderrTail.getLines(),
          timedOut,
          interrupted,
          ...(sig !== null ? { signal: sig } : {}),
        });
      });

      child.on('error', (error) => {
        cleanup();
        reject(error);
      });
    });
  }

  killAll(signal: NodeJS.Signals = 'SIGTERM'): void {
    for (const [, child] of this.runningProcesses) {
      child.kill(signal);
    }
    this.runningProcesses.clear();
  }
}

/**
 * Create a real process runner instance
 */
export function createRealProcessRunner(): ProcessRunner {
  return new RealProcessRunner();
}
