/**
 * Session factory
 * Builds a SessionOrchestrator and its stages from the effective configuration
 */

import { resolve } from 'path';
import { SessionOrchestrator, SessionProgress } from '../core/orchestrator';
import type { AgentConfig } from '../types/agent-config';
import type { Clock } from '../types/clock';
import type { FileSystem } from '../types/file-system';
import type { Logger, LogLevel } from '../types/logger';
import type { ProcessRunner } from '../types/process-runner';
import { ConfigError } from '../types/errors';
import { Result, ok, err } from '../types/result';
import { createConsoleLogger } from '../logging/console-logger';
import { createLanguageModel } from '../llm/model-factory';
import type { LanguageModel } from '../llm/language-model';
import { Planner } from '../planning/planner';
import { Replanner } from '../planning/replanner';
import { Judge } from '../judge/judge';
import { ModelJudgeAdvisor } from '../judge/judge-advisor';
import { Finalizer, ModelAnswerComposer } from '../finalization/finalizer';
import { EscalationGate } from '../finalization/escalation-gate';
import { StepDispatcher } from '../tools/step-dispatcher';
import { DocumentAnalyzer, Reasoner } from '../tools/document-analyzer';
import type { SearchTool } from '../tools/search-tool';
import { VespaSearchTool } from '../tools/vespa-search-tool';
import { MemorySearchTool, loadCorpus } from '../tools/memory-search-tool';

export interface SessionServices {
  logger: Logger;
  fs: FileSystem;
  clock: Clock;
  processRunner: ProcessRunner;
  env: Record<string, string | undefined>;
  progress?: SessionProgress;
  mockConfigPath?: string;
  /** Replaces the configured language model (tests, embedding) */
  model?: LanguageModel;
  /** Replaces the configured search backend */
  search?: SearchTool;
}

export interface Session {
  orchestrator: SessionOrchestrator;
  model: LanguageModel;
  search: SearchTool;
}

export function logLevelFor(config: AgentConfig): LogLevel {
  const { debug, verbose, quiet } = config.verbosity;
  if (debug) return 'debug';
  if (verbose) return 'info';
  if (quiet) return 'error';
  return 'warn';
}

export function createSessionLogger(config: AgentConfig): Logger {
  return createConsoleLogger({
    minLevel: logLevelFor(config),
    jsonOutput: config.verbosity.jsonOutput,
  });
}

/**
 * The endpoint wins over a corpus file when both are configured
 */
export async function createSearchTool(
  config: AgentConfig,
  fs: FileSystem
): Promise<Result<SearchTool, ConfigError>> {
  if (config.search.endpoint) {
    return ok(new VespaSearchTool({ endpoint: config.search.endpoint }));
  }
  if (config.search.corpusPath) {
    const path = resolve(config.paths.workingDirectory, config.search.corpusPath);
    const corpus = await loadCorpus(fs, path);
    if (!corpus.ok) {
      return err(new ConfigError(path, [corpus.error]));
    }
    return ok(new MemorySearchTool(corpus.value));
  }
  return err(
    new ConfigError('search', [
      'no document source configured; set --search-endpoint, EVIDENCE_LOOP_SEARCH_ENDPOINT or --corpus',
    ])
  );
}

export async function createSession(
  config: AgentConfig,
  services: SessionServices
): Promise<Result<Session, ConfigError>> {
  const { logger, fs, clock } = services;
  const logContext = logger.child({ runId: config.runId });

  let search = services.search;
  if (!search) {
    const created = await createSearchTool(config, fs);
    if (!created.ok) {
      return created;
    }
    search = created.value;
  }

  let model = services.model;
  if (!model) {
    const created = await createLanguageModel(config, { ...services, logger: logContext });
    if (!created.ok) {
      return created;
    }
    model = created.value;
  }

  const modelOptions = { model, logger: logContext, maxParseRetries: config.limits.maxParseRetries };

  const orchestrator = new SessionOrchestrator({
    planner: new Planner(modelOptions),
    replanner: new Replanner(modelOptions),
    dispatcher: new StepDispatcher({
      search,
      analyzer: new DocumentAnalyzer(modelOptions),
      reasoner: new Reasoner(modelOptions),
      clock,
      logger: logContext,
      limits: config.limits,
      timeouts: config.timeouts,
      hits: config.search.hits,
    }),
    judge: new Judge({
      limits: config.limits,
      thresholds: config.thresholds,
      logger: logContext,
      advisor: config.model.judgeAdvisor ? new ModelJudgeAdvisor(modelOptions) : undefined,
    }),
    finalizer: new Finalizer({ logger: logContext, composer: new ModelAnswerComposer(modelOptions) }),
    escalationGate: new EscalationGate({ fs, logger: logContext, artifactBaseDir: config.paths.artifactBaseDir }),
    clock,
    logger: logContext,
    progress: services.progress,
  });

  logContext.debug(`Session wired: model=${model.name} search=${search.name}`);
  return ok({ orchestrator, model, search });
}
