/**
 * Spinner Service
 * Progress spinners for a run: ora on a TTY, one line per update otherwise,
 * nothing at all in quiet (JSON) mode
 */

import ora, { Ora } from 'ora';

export type SpinnerOutcome = 'succeed' | 'fail' | 'warn';

export interface Spinner {
  start(): void;
  setText(text: string): void;
  succeed(text?: string): void;
  fail(text?: string): void;
  warn(text?: string): void;
  /** Stop without a status line */
  stop(): void;
  readonly isSpinning: boolean;
}

export interface SpinnerServiceConfig {
  /** Animate with ora; otherwise updates are written as plain lines */
  isTTY: boolean;
  /** Suppress all output */
  quiet: boolean;
  stream?: NodeJS.WritableStream;
}

const OUTCOME_SYMBOLS: Record<SpinnerOutcome, string> = {
  succeed: '✅',
  fail: '❌',
  warn: '⚠️ ',
};

/**
 * Shared bookkeeping: subclasses only decide how a state change is shown
 */
abstract class BaseSpinner implements Spinner {
  private spinning = false;

  constructor(protected text: string) {}

  protected abstract show(text: string): void;
  protected abstract finish(outcome: SpinnerOutcome | null, text: string): void;

  start(): void {
    this.spinning = true;
    this.show(this.text);
  }

  setText(text: string): void {
    this.text = text;
    if (this.spinning) {
      this.show(text);
    }
  }

  succeed(text?: string): void {
    this.end('succeed', text);
  }

  fail(text?: string): void {
    this.end('fail', text);
  }

  warn(text?: string): void {
    this.end('warn', text);
  }

  stop(): void {
    this.end(null);
  }

  get isSpinning(): boolean {
    return this.spinning;
  }

  private end(outcome: SpinnerOutcome | null, text?: string): void {
    if (!this.spinning) {
      return;
    }
    this.spinning = false;
    this.finish(outcome, text ?? this.text);
  }
}

class SilentSpinner extends BaseSpinner {
  protected show(): void {}
  protected finish(): void {}
}

/**
 * Writes `> text` for each update and a symbol line when it finishes
 */
class LineSpinner extends BaseSpinner {
  constructor(
    text: string,
    private readonly stream: NodeJS.WritableStream
  ) {
    super(text);
  }

  protected show(text: string): void {
    this.stream.write(`> ${text}\n`);
  }

  protected finish(outcome: SpinnerOutcome | null, text: string): void {
    if (outcome) {
      this.stream.write(`${OUTCOME_SYMBOLS[outcome]} ${text}\n`);
    }
  }
}

class OraSpinner extends BaseSpinner {
  private readonly ora: Ora;

  constructor(text: string, stream: NodeJS.WritableStream) {
    super(text);
    this.ora = ora({ text, stream });
  }

  protected show(text: string): void {
    if (this.ora.isSpinning) {
      this.ora.text = text;
    } else {
      this.ora.start(text);
    }
  }

  protected finish(outcome: SpinnerOutcome | null, text: string): void {
    switch (outcome) {
      case 'succeed':
        this.ora.succeed(text);
        break;
      case 'fail':
        this.ora.fail(text);
        break;
      case 'warn':
        this.ora.warn(text);
        break;
      default:
        this.ora.stop();
    }
  }
}

/**
 * Hands out spinners, keeping at most one active
 */
export class SpinnerService {
  private readonly config: Required<SpinnerServiceConfig>;
  private active: Spinner | null = null;

  constructor(config: Partial<SpinnerServiceConfig> = {}) {
    this.config = {
      isTTY: config.isTTY ?? process.stdout.isTTY ?? false,
      quiet: config.quiet ?? false,
      stream: config.stream ?? process.stdout,
    };
  }

  /**
   * Start a spinner, stopping the previous one
   */
  start(text: string): Spinner {
    this.active?.stop();

    const { quiet, isTTY, stream } = this.config;
    const spinner = quiet
      ? new SilentSpinner(text)
      : isTTY
        ? new OraSpinner(text, stream)
        : new LineSpinner(text, stream);
    spinner.start();
    this.active = spinner;
    return spinner;
  }

  stopAll(): void {
    this.active?.stop();
    this.active = null;
  }

  getActive(): Spinner | null {
    return this.active;
  }
}

export function createSpinnerService(config?: Partial<SpinnerServiceConfig>): SpinnerService {
  return new SpinnerService(config);
}
