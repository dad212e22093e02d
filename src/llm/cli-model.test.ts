import { describe, it, expect } from 'vitest';
import { ClaudeCliLanguageModel } from './cli-model';
import { AnthropicLanguageModel } from './anthropic-model';
import { MockClock } from '../types/clock';
import { ModelCallError } from '../types/errors';
import type { ProcessRunner, SpawnOptions, SpawnResult } from '../types/process-runner';

class RecordingRunner implements ProcessRunner {
  readonly calls: Array<{ command: string; options: SpawnOptions }> = [];

  constructor(private readonly results: Array<Partial<SpawnResult>>) {}

  async spawn(command: string, options: SpawnOptions): Promise<SpawnResult> {
    this.calls.push({ command, options });
    const next = this.results.length > 1 ? this.results.shift() : this.results[0];
    return { exitCode: 0, durationMs: 5, stdout: '', stderr: '', timedOut: false, ...next };
  }
}

async function untilTimerPending(clock: MockClock): Promise<void> {
  for (let i = 0; i < 50 && clock.pendingTimers() === 0; i++) {
    await Promise.resolve();
  }
}

describe('ClaudeCliLanguageModel', () => {
  it('should send the prompt on stdin and return stdout', async () => {
    const runner = new RecordingRunner([{ stdout: '{"goal":"g"}' }]);
    const model = new ClaudeCliLanguageModel({
      clock: new MockClock(),
      processRunner: runner,
      workingDirectory: '/work',
      model: 'sonnet',
      retries: 0,
    });

    const text = await model.complete({ system: 'ROLE: planner', prompt: 'Question' });

    expect(text).toBe('{"goal":"g"}');
    expect(runner.calls).toEqual([
      {
        command: 'claude',
        options: {
          args: ['-p', '--output-format', 'text', '--model', 'sonnet'],
          cwd: '/work',
          stdin: 'ROLE: planner\n\nQuestion',
          timeoutMs: 0,
        },
      },
    ]);
  });

  it('should report the tail of stderr on a non-zero exit', async () => {
    const runner = new RecordingRunner([{ exitCode: 2, stderr: 'line 1\nnot logged in\n' }]);
    const model = new ClaudeCliLanguageModel({ clock: new MockClock(), processRunner: runner, workingDirectory: '/work', retries: 0 });

    await expect(model.complete({ system: 's', prompt: 'p' })).rejects.toThrow(
      'claude-cli failed: claude exited with code 2: line 1 | not logged in'
    );
  });

  it('should report a timed-out process', async () => {
    const runner = new RecordingRunner([{ timedOut: true, exitCode: -1 }]);
    const model = new ClaudeCliLanguageModel({
      clock: new MockClock(),
      processRunner: runner,
      workingDirectory: '/work',
      timeoutMs: 0,
      retries: 0,
      executablePath: '/opt/bin/claude',
    });

    const error = await model.complete({ system: 's', prompt: 'p' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ModelCallError);
    expect(error).toMatchObject({
      provider: 'claude-cli',
      message: 'claude-cli failed: /opt/bin/claude timed out after 0ms',
      timedOut: true,
    });
  });

  it('should retry once after a delay', async () => {
    const clock = new MockClock();
    const runner = new RecordingRunner([{ exitCode: 1 }, { stdout: 'ok' }]);
    const model = new ClaudeCliLanguageModel({ clock, processRunner: runner, workingDirectory: '/work', retryDelayMs: 1000 });

    const pending = model.complete({ system: 's', prompt: 'p' });
    await untilTimerPending(clock);
    expect(runner.calls).toHaveLength(1);
    clock.advance(1000);

    expect(await pending).toBe('ok');
    expect(runner.calls).toHaveLength(2);
  });
});

describe('AnthropicLanguageModel', () => {
  it('should fail without an API key', async () => {
    const model = new AnthropicLanguageModel({ clock: new MockClock(), retries: 0 });

    await expect(model.complete({ system: 's', prompt: 'p' })).rejects.toThrow(
      'anthropic failed: ANTHROPIC_API_KEY is not set'
    );
  });
});
