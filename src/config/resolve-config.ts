/**
 * Configuration resolution
 * Single-pass resolution with explicit precedence:
 * CLI flags > environment > repo config > user config > defaults
 */

import { z } from 'zod';
import {
  AgentConfig,
  ARTIFACT_DIR_NAME,
  ConfigSource,
  DEFAULT_CONFIG,
  ModelProvider,
} from '../types/agent-config';
import type { Clock } from '../types/clock';
import type { FileSystem } from '../types/file-system';
import { ConfigError } from '../types/errors';
import { Result, ok, err } from '../types/result';

/**
 * CLI flags that can override configuration
 */
export interface CliFlags {
  query?: string;
  provider?: ModelProvider;
  model?: string;
  fallbackProviders?: ModelProvider[];
  judgeAdvisor?: boolean;
  searchEndpoint?: string;
  corpusPath?: string;
  maxSteps?: number;
  maxReplans?: number;
  loopWindow?: number;
  relevanceThreshold?: number;
  verbose?: boolean;
  debug?: boolean;
  quiet?: boolean;
  jsonOutput?: boolean;
  noInteractive?: boolean;
  workingDirectory?: string;
}

const providerSchema = z.enum(['anthropic', 'claude-cli', 'mock']);
const positiveInt = z.number().int().min(1);

/**
 * Shape of `.evidence-loop/config.json` (repo) and `~/.evidence-loop/config.json` (user)
 */
const fileConfigSchema = z
  .object({
    provider: providerSchema.optional(),
    model: z.string().min(1).optional(),
    fallbackProviders: z.array(providerSchema).optional(),
    judgeAdvisor: z.boolean().optional(),
    search: z
      .object({
        endpoint: z.string().url().optional(),
        corpusPath: z.string().min(1).optional(),
        hits: positiveInt.optional(),
      })
      .strict()
      .optional(),
    limits: z
      .object({
        maxSteps: positiveInt.optional(),
        maxReplans: z.number().int().min(0).optional(),
        loopWindow: z.number().int().min(2).optional(),
        maxParseRetries: z.number().int().min(0).optional(),
        maxToolRetries: z.number().int().min(0).optional(),
      })
      .strict()
      .optional(),
    thresholds: z
      .object({
        sourceRelevance: z.number().min(0).max(1).optional(),
        numericTolerance: z.number().min(0).optional(),
      })
      .strict()
      .optional(),
    timeouts: z
      .object({
        toolMs: z.number().int().min(0).optional(),
        modelMs: z.number().int().min(0).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

/**
 * Load and validate a config file; a missing file is not an error
 */
export async function loadConfigFile(fs: FileSystem, path: string): Promise<Result<FileConfig | null, ConfigError>> {
  const content = await fs.readFile(path);
  if (!content.ok) {
    if (content.error.code === 'NOT_FOUND') {
      return ok(null);
    }
    return err(new ConfigError(path, [content.error.message]));
  }

  let data: unknown;
  try {
    data = JSON.parse(content.value);
  } catch (e) {
    return err(new ConfigError(path, [`not valid JSON: ${e instanceof Error ? e.message : String(e)}`]));
  }

  const parsed = fileConfigSchema.safeParse(data);
  if (!parsed.success) {
    return err(
      new ConfigError(
        path,
        parsed.error.issues.map((issue) =>
          issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
        )
      )
    );
  }
  return ok(parsed.data);
}

/**
 * Run ID derived from the resolution time, e.g. 2025-01-01_00-00-00-000Z
 */
export function generateRunId(clock: Clock): string {
  return clock.iso().replace(/[:.]/g, '-').replace('T', '_');
}

export interface ResolveConfigOptions {
  flags: CliFlags;
  fs: FileSystem;
  clock: Clock;
  /** Environment variables (process.env in production) */
  env: Record<string, string | undefined>;
  homeDirectory: string;
  workingDirectory: string;
}

/**
 * Resolve configuration from all sources with explicit precedence
 */
export async function resolveConfig(options: ResolveConfigOptions): Promise<Result<AgentConfig, ConfigError>> {
  const { flags, fs, clock, env, homeDirectory } = options;
  const cwd = flags.workingDirectory ?? options.workingDirectory;

  const repoPath = fs.join(cwd, ARTIFACT_DIR_NAME, 'config.json');
  const repoResult = await loadConfigFile(fs, repoPath);
  if (!repoResult.ok) {
    return repoResult;
  }
  const userPath = fs.join(homeDirectory, ARTIFACT_DIR_NAME, 'config.json');
  const userResult = await loadConfigFile(fs, userPath);
  if (!userResult.ok) {
    return userResult;
  }
  const repo = repoResult.value ?? {};
  const user = userResult.value ?? {};

  const sources: Record<string, ConfigSource> = {};

  // Helper to resolve a value with precedence
  function resolveValue<T>(
    key: string,
    layers: { cli?: T; env?: T; repo?: T; user?: T },
    defaultVal: T
  ): T {
    const ordered: Array<[ConfigSource, T | undefined]> = [
      ['cli', layers.cli],
      ['env', layers.env],
      ['repo', layers.repo],
      ['user', layers.user],
    ];
    for (const [source, value] of ordered) {
      if (value !== undefined) {
        sources[key] = source;
        return value;
      }
    }
    sources[key] = 'default';
    return defaultVal;
  }

  const endpointFromEnv = env.EVIDENCE_LOOP_SEARCH_ENDPOINT?.trim() || undefined;
  const defaults = DEFAULT_CONFIG;

  const config: AgentConfig = {
    schemaVersion: '1.0.0',
    query: flags.query ?? '',
    runId: generateRunId(clock),
    resolvedAt: clock.iso(),

    limits: {
      maxSteps: resolveValue(
        'limits.maxSteps',
        { cli: flags.maxSteps, repo: repo.limits?.maxSteps, user: user.limits?.maxSteps },
        defaults.limits.maxSteps
      ),
      maxReplans: resolveValue(
        'limits.maxReplans',
        { cli: flags.maxReplans, repo: repo.limits?.maxReplans, user: user.limits?.maxReplans },
        defaults.limits.maxReplans
      ),
      loopWindow: resolveValue(
        'limits.loopWindow',
        { cli: flags.loopWindow, repo: repo.limits?.loopWindow, user: user.limits?.loopWindow },
        defaults.limits.loopWindow
      ),
      maxParseRetries: resolveValue(
        'limits.maxParseRetries',
        { repo: repo.limits?.maxParseRetries, user: user.limits?.maxParseRetries },
        defaults.limits.maxParseRetries
      ),
      maxToolRetries: resolveValue(
        'limits.maxToolRetries',
        { repo: repo.limits?.maxToolRetries, user: user.limits?.maxToolRetries },
        defaults.limits.maxToolRetries
      ),
    },

    thresholds: {
      sourceRelevance: resolveValue(
        'thresholds.sourceRelevance',
        {
          cli: flags.relevanceThreshold,
          repo: repo.thresholds?.sourceRelevance,
          user: user.thresholds?.sourceRelevance,
        },
        defaults.thresholds.sourceRelevance
      ),
      numericTolerance: resolveValue(
        'thresholds.numericTolerance',
        { repo: repo.thresholds?.numericTolerance, user: user.thresholds?.numericTolerance },
        defaults.thresholds.numericTolerance
      ),
    },

    timeouts: {
      toolMs: resolveValue(
        'timeouts.toolMs',
        { repo: repo.timeouts?.toolMs, user: user.timeouts?.toolMs },
        defaults.timeouts.toolMs
      ),
      modelMs: resolveValue(
        'timeouts.modelMs',
        { repo: repo.timeouts?.modelMs, user: user.timeouts?.modelMs },
        defaults.timeouts.modelMs
      ),
    },

    model: {
      provider: resolveValue<ModelProvider>(
        'model.provider',
        { cli: flags.provider, repo: repo.provider, user: user.provider },
        defaults.model.provider
      ),
      model: resolveValue<string | undefined>(
        'model.model',
        { cli: flags.model, repo: repo.model, user: user.model },
        undefined
      ),
      fallbackProviders: resolveValue<ModelProvider[]>(
        'model.fallbackProviders',
        { cli: flags.fallbackProviders, repo: repo.fallbackProviders, user: user.fallbackProviders },
        defaults.model.fallbackProviders
      ),
      judgeAdvisor: resolveValue(
        'model.judgeAdvisor',
        { cli: flags.judgeAdvisor, repo: repo.judgeAdvisor, user: user.judgeAdvisor },
        defaults.model.judgeAdvisor
      ),
    },

    search: {
      endpoint: resolveValue<string | undefined>(
        'search.endpoint',
        { cli: flags.searchEndpoint, env: endpointFromEnv, repo: repo.search?.endpoint, user: user.search?.endpoint },
        undefined
      ),
      corpusPath: resolveValue<string | undefined>(
        'search.corpusPath',
        { cli: flags.corpusPath, repo: repo.search?.corpusPath, user: user.search?.corpusPath },
        undefined
      ),
      hits: resolveValue(
        'search.hits',
        { repo: repo.search?.hits, user: user.search?.hits },
        defaults.search.hits
      ),
    },

    verbosity: {
      verbose: flags.verbose ?? defaults.verbosity.verbose,
      debug: flags.debug ?? defaults.verbosity.debug,
      quiet: flags.quiet ?? defaults.verbosity.quiet,
      jsonOutput: flags.jsonOutput ?? defaults.verbosity.jsonOutput,
    },

    interactivity: {
      interactive: !(flags.noInteractive ?? false),
    },

    paths: {
      workingDirectory: cwd,
      artifactBaseDir: cwd,
    },

    sources,
  };

  return ok(config);
}
