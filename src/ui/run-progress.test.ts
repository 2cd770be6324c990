import { describe, it, expect, beforeEach } from 'vitest';
import { RunProgress, SpinnerFactory } from './run-progress';
import type { Spinner } from './spinner-service';
import type { StepRecord } from '../types/execution';
import { createStep } from '../../tests/fixtures/plans';

class RecordingSpinner implements Spinner {
  readonly calls: string[] = [];
  isSpinning = true;

  constructor(text: string) {
    this.calls.push(`start ${text}`);
  }

  start(): void {}
  succeed(text?: string): void {
    this.calls.push(`succeed ${text ?? ''}`);
  }
  fail(text?: string): void {
    this.calls.push(`fail ${text ?? ''}`);
  }
  warn(text?: string): void {
    this.calls.push(`warn ${text ?? ''}`);
  }
  setText(text: string): void {
    this.calls.push(`text ${text}`);
  }
  stop(): void {
    this.calls.push('stop');
  }
}

function record(id: string, status: StepRecord['status']): StepRecord {
  return { spec: createStep(id), status, attempts: 1 };
}

describe('RunProgress', () => {
  let spinners: RecordingSpinner[];
  let factory: SpinnerFactory;

  beforeEach(() => {
    spinners = [];
    factory = {
      start: (text) => {
        const spinner = new RecordingSpinner(text);
        spinners.push(spinner);
        return spinner;
      },
    };
  });

  it('should show one spinner per phase', () => {
    const hooks = new RunProgress(factory).hooks();

    hooks.onStateChanged?.('REFINING', 'PLANNING', '');
    hooks.onStateChanged?.('PLANNING', 'EXECUTING', '');
    hooks.onStateChanged?.('EXECUTING', 'REVIEWING', '');
    hooks.onStateChanged?.('REVIEWING', 'DONE_SUCCESS', '');

    expect(spinners.map((s) => s.calls)).toEqual([
      ['start Planning...', 'stop'],
      ['start Executing plan...', 'succeed Executed 0 step(s)'],
      ['start Reviewing results...', 'stop'],
    ]);
  });

  it('should track running and finished steps', () => {
    const hooks = new RunProgress(factory).hooks();

    hooks.onStateChanged?.('PLANNING', 'EXECUTING', '');
    hooks.onStepStarted?.(createStep('a'));
    hooks.onStepStarted?.(createStep('b'));
    hooks.onStepFinished?.(record('a', 'Succeeded'));
    hooks.onStepFinished?.(record('b', 'Failed'));
    hooks.onStateChanged?.('EXECUTING', 'REVIEWING', '');

    expect(spinners[0].calls).toEqual([
      'start Executing plan...',
      'text Executing plan: 0 step(s) done (running: a)',
      'text Executing plan: 0 step(s) done (running: a, b)',
      'text Executing plan: 1 step(s) done (running: b)',
      'text Executing plan: 2 step(s) done',
      'warn Executed 2 step(s), 1 did not succeed',
    ]);
  });

  it('should open the planning spinner on begin', () => {
    const progress = new RunProgress(factory);

    progress.begin();
    progress.hooks().onStateChanged?.('PLANNING', 'EXECUTING', '');

    expect(spinners.map((s) => s.calls[0])).toEqual(['start Planning...', 'start Executing plan...']);
    expect(spinners[0].calls).toEqual(['start Planning...', 'stop']);
  });

  it('should stop the active spinner', () => {
    const progress = new RunProgress(factory);
    progress.hooks().onStateChanged?.('REFINING', 'PLANNING', '');

    progress.stop();

    expect(spinners[0].calls).toEqual(['start Planning...', 'stop']);
  });
});
