/**
 * CLI Argument Parser
 *
 * Parses command line arguments into structured ParsedArgs
 */

import { MODEL_PROVIDERS, ModelProvider, isModelProvider } from '../types/agent-config';
import type { CliFlags } from '../config/resolve-config';
import { ParsedArgs, ParseResult, DEFAULT_ARGS } from './types';

type Parsed<T> = { ok: true; value: T } | { ok: false; error: string };

/**
 * Parse an integer of at least `min` from a string
 */
function parseInteger(value: string, name: string, min: number): Parsed<number> {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    return { ok: false, error: min === 1 ? `${name} must be a positive integer` : `${name} must be an integer of at least ${min}` };
  }
  return { ok: true, value: parsed };
}

/**
 * Parse a fraction (0-1) from a string
 */
function parseFraction(value: string, name: string): Parsed<number> {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed) || parsed < 0 || parsed > 1) {
    return { ok: false, error: `${name} must be a number between 0 and 1` };
  }
  return { ok: true, value: parsed };
}

function parseProvider(value: string, name: string): Parsed<ModelProvider> {
  if (!isModelProvider(value)) {
    return { ok: false, error: `${name} must be one of: ${MODEL_PROVIDERS.join(', ')}` };
  }
  return { ok: true, value };
}

/**
 * Parse a comma-separated list of providers
 */
function parseProviderList(value: string, name: string): Parsed<ModelProvider[]> {
  const providers: ModelProvider[] = [];
  for (const item of value.split(',').map((t) => t.trim())) {
    if (!isModelProvider(item)) {
      return { ok: false, error: `Invalid provider "${item}" in ${name}. Must be one of: ${MODEL_PROVIDERS.join(', ')}` };
    }
    providers.push(item);
  }
  return { ok: true, value: providers };
}

/**
 * Get the value for an argument, handling both --arg value and --arg=value formats
 */
function getArgValue(args: string[], index: number, argName: string): { ok: true; value: string; skip: number } | { ok: false; error: string } {
  const arg = args[index];

  // Check for --arg=value format
  const equals = arg.indexOf('=');
  if (equals !== -1) {
    const value = arg.slice(equals + 1);
    if (!value) {
      return { ok: false, error: `${argName}= requires a value` };
    }
    return { ok: true, value, skip: 0 };
  }

  // Check for --arg value format
  const nextArg = args[index + 1];
  if (nextArg === undefined || nextArg.startsWith('--')) {
    return { ok: false, error: `${argName} requires a value` };
  }
  return { ok: true, value: nextArg, skip: 1 };
}

/**
 * Parse command line arguments
 */
export function parseArgs(argv: string[]): ParseResult {
  const args = argv.slice(2); // Remove node and script path
  const result: ParsedArgs = { ...DEFAULT_ARGS, fallbackProviders: [] };
  const words: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const argBase = arg.split('=')[0]; // Get the base argument name

    // Options taking a value share the same read-and-validate flow
    const withValue = <T>(parse: (value: string) => Parsed<T>, apply: (value: T) => void): string | undefined => {
      const read = getArgValue(args, i, argBase);
      if (!read.ok) return `Error: ${read.error}`;
      const parsed = parse(read.value);
      if (!parsed.ok) return `Error: ${parsed.error}`;
      apply(parsed.value);
      i += read.skip;
      return undefined;
    };
    const text = (value: string): Parsed<string> => ({ ok: true, value });
    let error: string | undefined;

    switch (argBase) {
      case '--help':
      case '-h':
        result.help = true;
        break;

      case '--version':
      case '-v':
        result.version = true;
        break;

      case '--provider':
        error = withValue((v) => parseProvider(v, argBase), (v) => (result.provider = v));
        break;

      case '--model':
        error = withValue(text, (v) => (result.model = v));
        break;

      case '--fallback-providers':
        error = withValue((v) => parseProviderList(v, argBase), (v) => (result.fallbackProviders = v));
        break;

      case '--judge-advisor':
        result.judgeAdvisor = true;
        break;

      case '--search-endpoint':
        error = withValue(text, (v) => (result.searchEndpoint = v));
        break;

      case '--corpus':
        error = withValue(text, (v) => (result.corpusPath = v));
        break;

      case '--mock-config':
        error = withValue(text, (v) => (result.mockConfigPath = v));
        break;

      case '--max-steps':
        error = withValue((v) => parseInteger(v, argBase, 1), (v) => (result.maxSteps = v));
        break;

      case '--max-replans':
        error = withValue((v) => parseInteger(v, argBase, 0), (v) => (result.maxReplans = v));
        break;

      case '--loop-window':
        error = withValue((v) => parseInteger(v, argBase, 2), (v) => (result.loopWindow = v));
        break;

      case '--relevance-threshold':
        error = withValue((v) => parseFraction(v, argBase), (v) => (result.relevanceThreshold = v));
        break;

      case '--no-interactive':
        result.noInteractive = true;
        break;

      case '--verbose':
        result.verbose = true;
        break;

      case '--debug':
        result.debug = true;
        break;

      case '--quiet':
        result.quiet = true;
        break;

      case '--json':
        result.jsonOutput = true;
        break;

      default:
        // Check for unknown flags
        if (arg.startsWith('--')) {
          return { success: false, error: `Error: Unknown option: ${argBase}` };
        }
        // It's part of the question
        words.push(arg);
    }

    if (error) {
      return { success: false, error };
    }
  }

  if (result.quiet && (result.verbose || result.debug)) {
    return { success: false, error: 'Error: --quiet cannot be combined with --verbose or --debug' };
  }
  if (result.provider === 'mock' && !result.mockConfigPath) {
    return { success: false, error: 'Error: --provider mock requires --mock-config' };
  }

  result.query = words.join(' ').trim();
  return { success: true, args: result };
}

/**
 * Flags handed to configuration resolution; unset options stay undefined
 */
export function toCliFlags(args: ParsedArgs): CliFlags {
  return {
    query: args.query || undefined,
    provider: args.provider ?? undefined,
    model: args.model ?? undefined,
    fallbackProviders: args.fallbackProviders.length > 0 ? args.fallbackProviders : undefined,
    judgeAdvisor: args.judgeAdvisor ? true : undefined,
    searchEndpoint: args.searchEndpoint ?? undefined,
    corpusPath: args.corpusPath ?? undefined,
    maxSteps: args.maxSteps ?? undefined,
    maxReplans: args.maxReplans ?? undefined,
    loopWindow: args.loopWindow ?? undefined,
    relevanceThreshold: args.relevanceThreshold ?? undefined,
    verbose: args.verbose,
    debug: args.debug,
    quiet: args.quiet,
    jsonOutput: args.jsonOutput,
    noInteractive: args.noInteractive,
  };
}
