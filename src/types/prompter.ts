/**
 * Prompter interface
 * Abstracts user prompts for testability and non-interactive mode support
 */

import { Result } from './result';

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
  cause?: unknown;
}

/**
 * Interface for user prompts
 * Implementations can be real (inquirer) or scripted (for testing)
 */
export interface Prompter {
  input(options: InputOptions): Promise<Result<string, PrompterError>>;

  /**
   * Whether prompts can be shown (TTY and interactive mode)
   */
  isInteractive(): boolean;
}

export function createPrompterError(code: PrompterErrorCode, message?: string, cause?: unknown): PrompterError {
  const defaultMessages: Record<PrompterErrorCode, string> = {
    CANCELLED: 'User cancelled the prompt',
    NON_INTERACTIVE: 'Cannot prompt in non-interactive mode',
    IO_ERROR: 'IO error during prompt',
  };
  return { code, message: message ?? defaultMessages[code], cause };
}
