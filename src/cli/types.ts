/**
 * CLI Types
 *
 * Type definitions for CLI argument parsing
 */

import type { ModelProvider } from '../types/agent-config';

/** Parsed CLI arguments */
export interface ParsedArgs {
  /** The question, joined from positional arguments */
  query: string;

  provider: ModelProvider | null;

  model: string | null;

  /** Providers tried in order when the primary one fails */
  fallbackProviders: ModelProvider[];

  /** Consult the model for an advisory verdict after each step */
  judgeAdvisor: boolean;

  searchEndpoint: string | null;

  /** JSON corpus searched in memory instead of an endpoint */
  corpusPath: string | null;

  /** Scripted responses for the mock provider (JSON file) */
  mockConfigPath: string | null;

  maxSteps: number | null;

  maxReplans: number | null;

  loopWindow: number | null;

  /** Minimum source relevance (0-1) */
  relevanceThreshold: number | null;

  help: boolean;

  version: boolean;

  /** Disable interactive prompts; fail instead of asking */
  noInteractive: boolean;

  verbose: boolean;

  debug: boolean;

  /** Only print the answer */
  quiet: boolean;

  /** Print the session outcome as JSON */
  jsonOutput: boolean;
}

/** Default values for parsed arguments */
export const DEFAULT_ARGS: ParsedArgs = {
  query: '',
  provider: null,
  model: null,
  fallbackProviders: [],
  judgeAdvisor: false,
  searchEndpoint: null,
  corpusPath: null,
  mockConfigPath: null,
  maxSteps: null,
  maxReplans: null,
  loopWindow: null,
  relevanceThreshold: null,
  help: false,
  version: false,
  noInteractive: false,
  verbose: false,
  debug: false,
  quiet: false,
  jsonOutput: false,
};

/** Result of parsing arguments */
export type ParseResult = { success: true; args: ParsedArgs } | { success: false; error: string };
