/**
 * Claude CLI language model
 * Runs the `claude` executable in print mode as a subprocess
 */

import type { ProcessRunner } from '../types/process-runner';
import { TimeoutError } from '../types/clock';
import { BaseLanguageModel, LanguageModelOptions, ModelRequest } from './language-model';

export interface CliModelOptions extends LanguageModelOptions {
  processRunner: ProcessRunner;
  executablePath?: string;
  workingDirectory: string;
  model?: string;
}

export class ClaudeCliLanguageModel extends BaseLanguageModel {
  readonly name = 'claude-cli';
  private readonly processRunner: ProcessRunner;
  private readonly executablePath: string;
  private readonly workingDirectory: string;
  private readonly model?: string;

  constructor(options: CliModelOptions) {
    super(options);
    this.processRunner = options.processRunner;
    this.executablePath = options.executablePath ?? 'claude';
    this.workingDirectory = options.workingDirectory;
    this.model = options.model;
  }

  buildArgs(): string[] {
    const args = ['-p', '--output-format', 'text'];
    if (this.model) {
      args.push('--model', this.model);
    }
    return args;
  }

  protected async completeOnce(request: ModelRequest): Promise<string> {
    const result = await this.processRunner.spawn(this.executablePath, {
      args: this.buildArgs(),
      cwd: this.workingDirectory,
      // Prompt goes through stdin so it never shows up in the process list
      stdin: `${request.system}\n\n${request.prompt}`,
      timeoutMs: this.timeoutMs,
    });

    if (result.timedOut) {
      throw new TimeoutError(this.timeoutMs, `${this.executablePath} timed out after ${this.timeoutMs}ms`);
    }
    if (result.exitCode !== 0) {
      const detail = result.stderr.trim().split('\n').slice(-5).join(' | ');
      throw new Error(`${this.executablePath} exited with code ${result.exitCode}${detail ? `: ${detail}` : ''}`);
    }
    return result.stdout;
  }
}
