/**
 * Spinner Service
 * Stage progress on stderr. A TTY gets one ora spinner whose label follows
 * the session; pipes and verbose runs get one line per stage.
 */

import ora, { Ora } from 'ora';
import type { SessionProgress } from '../core/orchestrator';

export interface SpinnerServiceConfig {
  isTTY: boolean;
  /** Suppress all progress output */
  quiet: boolean;
  /** Log lines are already printed per stage; skip the spinner */
  verbose: boolean;
  stream: NodeJS.WritableStream;
}

type ProgressMode = 'silent' | 'lines' | 'spinner';

export class SpinnerService implements SessionProgress {
  private readonly mode: ProgressMode;
  private readonly stream: NodeJS.WritableStream;
  private spinner: Ora | null = null;
  private stages: string[] = [];

  constructor(config: Partial<SpinnerServiceConfig> = {}) {
    this.stream = config.stream ?? process.stderr;
    const isTTY = config.isTTY ?? process.stderr.isTTY ?? false;
    if (config.quiet) {
      this.mode = 'silent';
    } else if (isTTY && !config.verbose) {
      this.mode = 'spinner';
    } else {
      this.mode = 'lines';
    }
  }

  getMode(): ProgressMode {
    return this.mode;
  }

  /** Stage labels seen since the last `stageFinished` */
  getStages(): readonly string[] {
    return this.stages;
  }

  stageStarted(label: string): void {
    this.stages.push(label);
    switch (this.mode) {
      case 'silent':
        return;
      case 'lines':
        this.stream.write(`> ${label}\n`);
        return;
      case 'spinner':
        if (this.spinner?.isSpinning) {
          this.spinner.text = label;
        } else {
          this.spinner = ora({ text: label, color: 'cyan', stream: this.stream }).start();
        }
    }
  }

  stageFinished(): void {
    this.spinner?.stop();
    this.spinner = null;
    this.stages = [];
  }
}

export function createSpinnerService(config?: Partial<SpinnerServiceConfig>): SpinnerService {
  return new SpinnerService(config);
}
