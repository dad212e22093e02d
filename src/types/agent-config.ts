/**
 * AgentConfig type
 * Centralized configuration object passed through the session
 */

/**
 * Language model providers
 */
export type ModelProvider = 'anthropic' | 'claude-cli' | 'mock';

export const MODEL_PROVIDERS: readonly ModelProvider[] = ['anthropic', 'claude-cli', 'mock'];

/**
 * Work ceilings enforced by the loop and budget guard
 */
export interface SessionLimits {
  /** Maximum number of dispatcher invocations per session */
  maxSteps: number;
  /** Maximum number of replans per session */
  maxReplans: number;
  /** Number of consecutive identical steps that counts as a loop */
  loopWindow: number;
  /** Re-prompts allowed when model output fails validation */
  maxParseRetries: number;
  /** Extra attempts the dispatcher makes when a tool call fails */
  maxToolRetries: number;
}

/**
 * Scoring thresholds used by the judge
 */
export interface JudgeThresholds {
  /** Minimum source relevance (0-1) before a result is rejected */
  sourceRelevance: number;
  /** Relative difference above which two numeric facts contradict */
  numericTolerance: number;
}

export interface TimeoutConfig {
  /** Per tool call (search, calculate, analysis) */
  toolMs: number;
  /** Per language model call */
  modelMs: number;
}

export interface ModelConfig {
  provider: ModelProvider;
  /** Model name passed to the provider */
  model?: string;
  /** Providers tried in order when the primary is unavailable */
  fallbackProviders: ModelProvider[];
  /** Whether the judge consults the model for an advisory verdict */
  judgeAdvisor: boolean;
}

export interface SearchConfig {
  /** Base URL of the document index; unset when a corpus file is used */
  endpoint?: string;
  /** JSON corpus file searched in memory instead of the endpoint */
  corpusPath?: string;
  /** Maximum documents returned per search */
  hits: number;
}

export interface VerbosityConfig {
  verbose: boolean;
  debug: boolean;
  quiet: boolean;
  jsonOutput: boolean;
}

export interface InteractivityConfig {
  interactive: boolean;
}

export interface PathConfig {
  workingDirectory: string;
  /** Base directory for review snapshots */
  artifactBaseDir: string;
}

export type ConfigSource = 'cli' | 'env' | 'repo' | 'user' | 'default';

/**
 * The complete effective configuration for a session
 */
export interface AgentConfig {
  schemaVersion: '1.0.0';

  /** The question being answered */
  query: string;

  limits: SessionLimits;
  thresholds: JudgeThresholds;
  timeouts: TimeoutConfig;
  model: ModelConfig;
  search: SearchConfig;
  verbosity: VerbosityConfig;
  interactivity: InteractivityConfig;
  paths: PathConfig;

  runId: string;

  /** ISO 8601 */
  resolvedAt: string;

  /** Where each field's value came from, keyed by dotted path ('limits.maxSteps') */
  sources: Record<string, ConfigSource>;
}

export const DEFAULT_CONFIG: Omit<AgentConfig, 'query' | 'runId' | 'resolvedAt' | 'paths' | 'sources'> = {
  schemaVersion: '1.0.0',
  limits: {
    maxSteps: 12,
    maxReplans: 5,
    loopWindow: 3,
    maxParseRetries: 3,
    maxToolRetries: 1,
  },
  thresholds: {
    sourceRelevance: 0.5,
    numericTolerance: 0.01,
  },
  timeouts: {
    toolMs: 30_000,
    modelMs: 120_000,
  },
  model: {
    provider: 'anthropic',
    fallbackProviders: [],
    judgeAdvisor: false,
  },
  search: {
    hits: 3,
  },
  verbosity: {
    verbose: false,
    debug: false,
    quiet: false,
    jsonOutput: false,
  },
  interactivity: {
    interactive: true,
  },
};

export const ARTIFACT_DIR_NAME = '.evidence-loop';

export function isModelProvider(value: string): value is ModelProvider {
  return MODEL_PROVIDERS.some((provider) => provider === value);
}
