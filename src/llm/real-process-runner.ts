/**
 * Real ProcessRunner implementation
 * Uses child_process.spawn for subprocess execution
 */

import { spawn, ChildProcess } from 'child_process';
import type { ProcessRunner, SpawnOptions, SpawnResult } from '../types/process-runner';

export class RealProcessRunner implements ProcessRunner {
  private readonly running = new Set<ChildProcess>();

  spawn(command: string, options: SpawnOptions): Promise<SpawnResult> {
    const startTime = Date.now();

    return new Promise((resolve, reject) => {
      const env = options.env ? { ...process.env, ...options.env } : process.env;

      // shell: false so prompt text is never interpreted
      const child = spawn(command, options.args, {
        cwd: options.cwd,
        env,
        stdio: ['pipe', 'pipe', 'pipe'],
        shell: false,
      });
      this.running.add(child);

      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let timer: NodeJS.Timeout | undefined;

      if (options.timeoutMs && options.timeoutMs > 0) {
        timer = setTimeout(() => {
          timedOut = true;
          child.kill('SIGTERM');
        }, options.timeoutMs);
      }

      child.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });
      child.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      if (child.stdin) {
        child.stdin.on('error', () => {
          // EPIPE when the process exits before reading stdin; the exit code reports it
        });
        child.stdin.end(options.stdin ?? '');
      }

      child.on('close', (code, signal) => {
        this.running.delete(child);
        if (timer) {
          clearTimeout(timer);
        }
        resolve({
          exitCode: code ?? (signal ? 130 : 1),
          durationMs: Date.now() - startTime,
          stdout,
          stderr,
          timedOut,
          signal: signal ?? undefined,
        });
      });

      child.on('error', (error) => {
        this.running.delete(child);
        if (timer) {
          clearTimeout(timer);
        }
        reject(error);
      });
    });
  }

  killAll(signal: NodeJS.Signals = 'SIGTERM'): void {
    for (const child of this.running) {
      child.kill(signal);
    }
    this.running.clear();
  }
}

export function createRealProcessRunner(): RealProcessRunner {
  return new RealProcessRunner();
}
