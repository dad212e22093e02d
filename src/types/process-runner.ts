/**
 * ProcessRunner interface
 * Abstracts subprocess execution for the CLI-backed language model
 */

export interface SpawnOptions {
  args: string[];
  cwd: string;
  /** Merged with process.env */
  env?: Record<string, string>;
  /** Data written to stdin, then closed */
  stdin?: string;
  /** Kill the process after this many milliseconds (0 = no timeout) */
  timeoutMs?: number;
}

export interface SpawnResult {
  exitCode: number;
  durationMs: number;
  stdout: string;
  stderr: string;
  /** Whether the process was killed due to timeout */
  timedOut: boolean;
  /** Signal that terminated the process, if any */
  signal?: string;
}

export interface ProcessRunner {
  spawn(command: string, options: SpawnOptions): Promise<SpawnResult>;

  /**
   * Kill every process still running
   */
  killAll?(signal?: NodeJS.Signals): void;
}
