/**
 * Prompter interface
 * Abstracts user prompts for testability and non-interactive mode support
 */

import type { Result } from './result';

export interface ConfirmOptions {
  message: string;
  /** Returned when the user just presses enter, or in non-interactive mode */
  default?: boolean;
}

export interface InputOptions {
  message: string;
  default?: string;
  /** Return true if valid, or an error message */
  validate?: (input: string) => boolean | string;
}

export type PrompterErrorCode = 'CANCELLED' | 'NON_INTERACTIVE' | 'IO_ERROR';

export interface PrompterError {
  code: PrompterErrorCode;
  message: string;
  cause?: Error;
}

/**
 * Interface for user prompts
 * Implementations are real (inquirer) or scripted (tests)
 */
export interface Prompter {
  confirm(options: ConfirmOptions): Promise<Result<boolean, PrompterError>>;

  input(options: InputOptions): Promise<Result<string, PrompterError>>;

  /**
   * Whether prompts can be shown (TTY and interactive mode)
   */
  isInteractive(): boolean;

  setNonInteractive(nonInteractive: boolean): void;
}

export function createPrompterError(
  code: PrompterErrorCode,
  message?: string,
  cause?: Error
): PrompterError {
  const defaultMessages: Record<PrompterErrorCode, string> = {
    CANCELLED: 'User cancelled the prompt',
    NON_INTERACTIVE: 'Cannot prompt in non-interactive mode',
    IO_ERROR: 'IO error during prompt',
  };

  return {
    code,
    message: message ?? defaultMessages[code],
    cause,
  };
}
