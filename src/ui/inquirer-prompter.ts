/**
 * Inquirer-based Prompter Implementation
 */

import inquirer from 'inquirer';
import { Prompter, InputOptions, PrompterError, createPrompterError } from '../types/prompter';
import { Result, ok, err } from '../types/result';

export interface InquirerPrompterConfig {
  interactive: boolean;
  /** Overrides the stdin TTY check (tests) */
  isTTY?: boolean;
}

export class InquirerPrompter implements Prompter {
  private readonly config: InquirerPrompterConfig;

  constructor(config: Partial<InquirerPrompterConfig> = {}) {
    this.config = {
      interactive: config.interactive ?? true,
      isTTY: config.isTTY,
    };
  }

  isInteractive(): boolean {
    const tty = this.config.isTTY ?? (process.stdin.isTTY ?? false);
    return this.config.interactive && tty;
  }

  async input(options: InputOptions): Promise<Result<string, PrompterError>> {
    if (!this.isInteractive()) {
      if (options.default !== undefined) {
        return ok(options.default);
      }
      return err(createPrompterError('NON_INTERACTIVE', 'Cannot prompt for input in non-interactive mode'));
    }

    try {
      const response = await inquirer.prompt<{ value: string }>([
        {
          type: 'input',
          name: 'value',
          message: options.message,
          default: options.default,
          validate: options.validate,
        },
      ]);
      return ok(response.value);
    } catch (error) {
      if (isCancelledError(error)) {
        return err(createPrompterError('CANCELLED'));
      }
      return err(
        createPrompterError(
          'IO_ERROR',
          `input failed: ${error instanceof Error ? error.message : String(error)}`,
          error
        )
      );
    }
  }
}

function isCancelledError(error: unknown): boolean {
  if (error instanceof Error) {
    return error.message.includes('User force closed') || error.name === 'ExitPromptError';
  }
  return false;
}

export function createInquirerPrompter(config?: Partial<InquirerPrompterConfig>): Prompter {
  return new InquirerPrompter(config);
}
