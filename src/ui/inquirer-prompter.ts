/**
 * Inquirer-based Prompter
 *
 * Without a TTY, or with --no-interactive, prompts resolve to their default
 * and fail with NON_INTERACTIVE when there is none.
 */

import inquirer from 'inquirer';
import {
  Prompter,
  ConfirmOptions,
  InputOptions,
  PrompterError,
  createPrompterError,
} from '../types/prompter';
import { Result, ok, err } from '../types/result';

export interface InquirerPrompterConfig {
  interactive: boolean;
}

type Question<T> = {
  kind: 'confirm' | 'input';
  message: string;
  fallback: T | undefined;
  validate?: (input: string) => boolean | string;
};

export class InquirerPrompter implements Prompter {
  private interactive: boolean;

  constructor(config: Partial<InquirerPrompterConfig> = {}) {
    this.interactive = config.interactive ?? true;
  }

  isInteractive(): boolean {
    return this.interactive && (process.stdout.isTTY ?? false);
  }

  setNonInteractive(nonInteractive: boolean): void {
    this.interactive = !nonInteractive;
  }

  confirm(options: ConfirmOptions): Promise<Result<boolean, PrompterError>> {
    return this.ask<boolean>({ kind: 'confirm', message: options.message, fallback: options.default });
  }

  input(options: InputOptions): Promise<Result<string, PrompterError>> {
    return this.ask<string>({
      kind: 'input',
      message: options.message,
      fallback: options.default,
      validate: options.validate,
    });
  }

  private async ask<T>(question: Question<T>): Promise<Result<T, PrompterError>> {
    if (!this.isInteractive()) {
      return question.fallback !== undefined
        ? ok(question.fallback)
        : err(createPrompterError('NON_INTERACTIVE', `Cannot ask "${question.message}" without a terminal`));
    }

    try {
      const answers = await inquirer.prompt<{ value: T }>([
        {
          type: question.kind,
          name: 'value',
          message: question.message,
          default: question.fallback,
          ...(question.validate ? { validate: question.validate } : {}),
        },
      ]);
      return ok(answers.value);
    } catch (error) {
      return err(toPrompterError(error));
    }
  }
}

/**
 * Ctrl+C inside inquirer surfaces as a "force closed" error
 */
function toPrompterError(error: unknown): PrompterError {
  if (error instanceof Error) {
    if (error.message.includes('User force closed') || error.name === 'ExitPromptError') {
      return createPrompterError('CANCELLED');
    }
    return createPrompterError('IO_ERROR', `Prompt failed: ${error.message}`, error);
  }
  return createPrompterError('IO_ERROR', `Prompt failed: ${String(error)}`);
}

export function createInquirerPrompter(config?: Partial<InquirerPrompterConfig>): Prompter {
  return new InquirerPrompter(config);
}
