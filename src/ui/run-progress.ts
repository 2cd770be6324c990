/**
 * Run progress display
 * Turns orchestrator hooks into spinner updates
 */

import type { OrchestratorHooks } from '../core/orchestrator';
import type { LoopState } from '../core/state-machine';
import type { StepRecord } from '../types/execution';
import type { StepSpec } from '../types/plan';
import type { Spinner } from './spinner-service';

/**
 * Anything that can start a spinner (SpinnerService in production)
 */
export interface SpinnerFactory {
  start(text: string): Spinner;
}

const PHASE_TEXT: Partial<Record<LoopState, string>> = {
  PLANNING: 'Planning',
  EXECUTING: 'Executing plan',
  REVIEWING: 'Reviewing results',
};

export class RunProgress {
  private spinner: Spinner | null = null;
  private running: string[] = [];
  private finished = 0;
  private failed = 0;

  constructor(private readonly spinners: SpinnerFactory) {}

  hooks(): OrchestratorHooks {
    return {
      onStateChanged: (from, to) => this.onStateChanged(from, to),
      onStepStarted: (step) => this.onStepStarted(step),
      onStepFinished: (record) => this.onStepFinished(record),
    };
  }

  /**
   * Show the planning spinner for the first iteration, which starts without a transition
   */
  begin(): void {
    this.onStateChanged('PLANNING', 'PLANNING');
  }

  /**
   * Stop the spinner without a status (before prompting or exiting)
   */
  stop(): void {
    this.spinner?.stop();
    this.spinner = null;
  }

  private onStateChanged(from: LoopState, to: LoopState): void {
    this.closePhase(from);
    const text = PHASE_TEXT[to];
    if (!text) {
      return;
    }
    if (to === 'EXECUTING') {
      this.running = [];
      this.finished = 0;
      this.failed = 0;
    }
    this.spinner = this.spinners.start(`${text}...`);
  }

  private closePhase(from: LoopState): void {
    if (!this.spinner) {
      return;
    }
    if (from === 'EXECUTING') {
      const summary = `Executed ${this.finished} step(s)`;
      if (this.failed > 0) {
        this.spinner.warn(`${summary}, ${this.failed} did not succeed`);
      } else {
        this.spinner.succeed(summary);
      }
    } else {
      this.spinner.stop();
    }
    this.spinner = null;
  }

  private onStepStarted(step: StepSpec): void {
    this.running.push(step.id);
    this.updateText();
  }

  private onStepFinished(record: StepRecord): void {
    this.running = this.running.filter((id) => id !== record.spec.id);
    this.finished++;
    if (record.status !== 'Succeeded') {
      this.failed++;
    }
    this.updateText();
  }

  private updateText(): void {
    const running = this.running.length > 0 ? ` (running: ${this.running.join(', ')})` : '';
    this.spinner?.setText(`Executing plan: ${this.finished} step(s) done${running}`);
  }
}
