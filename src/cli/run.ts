/**
 * CLI session runner
 * Everything between argv and an exit code, with I/O injected so the whole
 * command can run in tests
 */

import { resolve } from 'path';
import type { SessionProgress } from '../core/orchestrator';
import type { SessionOutcome } from '../schemas';
import type { AgentConfig } from '../types/agent-config';
import type { Clock } from '../types/clock';
import type { FileSystem } from '../types/file-system';
import type { Logger } from '../types/logger';
import type { ProcessRunner } from '../types/process-runner';
import type { Prompter } from '../types/prompter';
import { ExitCode } from '../types/exit-codes';
import { resolveConfig, formatConfigForDisplay } from '../config';
import { createSession, createSessionLogger } from '../orchestration';
import { formatSessionSummary } from '../logging/session-summary';
import { parseArgs, toCliFlags } from './arg-parser';
import { getUsageText } from './help';

export interface CliEnvironment {
  fs: FileSystem;
  clock: Clock;
  env: Record<string, string | undefined>;
  homeDirectory: string;
  workingDirectory: string;
  processRunner: ProcessRunner;
  prompter: Prompter;
  /** Answer and JSON output */
  stdout: (text: string) => void;
  /** Diagnostics, summaries and errors */
  stderr: (text: string) => void;
  version: string;
  signal?: AbortSignal;
  createLogger?: (config: AgentConfig) => Logger;
  createProgress?: (config: AgentConfig) => SessionProgress | undefined;
}

export function exitCodeFor(outcome: SessionOutcome): ExitCode {
  switch (outcome.kind) {
    case 'answer':
      return ExitCode.SUCCESS;
    case 'human_review':
      return ExitCode.HUMAN_REVIEW;
    case 'error':
      return ExitCode.UNEXPECTED_ERROR;
  }
}

async function askForQuery(env: CliEnvironment, config: AgentConfig): Promise<string | undefined> {
  if (!config.interactivity.interactive || !env.prompter.isInteractive()) {
    return undefined;
  }
  const answer = await env.prompter.input({
    message: 'What would you like to know?',
    validate: (input) => input.trim().length > 0 || 'Please enter a question',
  });
  return answer.ok ? answer.value.trim() : undefined;
}

function reportOutcome(outcome: SessionOutcome, config: AgentConfig, env: CliEnvironment): void {
  if (config.verbosity.jsonOutput) {
    env.stdout(JSON.stringify(outcome, null, 2));
    return;
  }

  switch (outcome.kind) {
    case 'answer': {
      const { text, limitations } = outcome.answer;
      env.stdout(text);
      if (limitations.length > 0) {
        env.stdout(['', 'Limitations:', ...limitations.map((l) => `- ${l}`)].join('\n'));
      }
      break;
    }
    case 'human_review':
      env.stderr(`Handed to human review: ${outcome.request.reason}`);
      if (outcome.request.snapshotPath) {
        env.stderr(`Snapshot: ${outcome.request.snapshotPath}`);
      }
      break;
    case 'error':
      env.stderr(`Error: ${outcome.message}`);
      break;
  }

  if (config.verbosity.verbose || config.verbosity.debug) {
    env.stderr('');
    env.stderr(formatSessionSummary(outcome));
  }
}

export async function runCli(argv: string[], env: CliEnvironment): Promise<ExitCode> {
  const parsed = parseArgs(argv);
  if (!parsed.success) {
    env.stderr(parsed.error);
    env.stderr('Run evidence-loop --help for usage.');
    return ExitCode.USAGE_ERROR;
  }
  const args = parsed.args;

  if (args.help) {
    env.stdout(getUsageText());
    return ExitCode.SUCCESS;
  }
  if (args.version) {
    env.stdout(env.version);
    return ExitCode.SUCCESS;
  }

  const resolved = await resolveConfig({
    flags: toCliFlags(args),
    fs: env.fs,
    clock: env.clock,
    env: env.env,
    homeDirectory: env.homeDirectory,
    workingDirectory: env.workingDirectory,
  });
  if (!resolved.ok) {
    env.stderr(`Error: ${resolved.error.message}`);
    return ExitCode.CONFIG_ERROR;
  }
  let config = resolved.value;

  if (!config.query) {
    const query = await askForQuery(env, config);
    if (!query) {
      env.stderr('Error: a question is required');
      env.stderr('Run evidence-loop --help for usage.');
      return ExitCode.USAGE_ERROR;
    }
    config = { ...config, query };
  }

  const logger = (env.createLogger ?? createSessionLogger)(config);
  if (config.verbosity.verbose || config.verbosity.debug) {
    env.stderr(formatConfigForDisplay(config));
  }

  const session = await createSession(config, {
    logger,
    fs: env.fs,
    clock: env.clock,
    processRunner: env.processRunner,
    env: env.env,
    progress: env.createProgress?.(config),
    mockConfigPath: args.mockConfigPath ? resolve(config.paths.workingDirectory, args.mockConfigPath) : undefined,
  });
  if (!session.ok) {
    env.stderr(`Error: ${session.error.message}`);
    return ExitCode.CONFIG_ERROR;
  }

  const outcome = await session.value.orchestrator.run(config.query, {
    runId: config.runId,
    signal: env.signal,
  });
  reportOutcome(outcome, config, env);
  return exitCodeFor(outcome);
}
