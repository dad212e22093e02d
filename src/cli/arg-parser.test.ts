/**
 * Tests for CLI Argument Parser
 */

import { describe, it, expect } from 'vitest';
import { parseArgs, toCliFlags } from './arg-parser';
import type { ParsedArgs } from './types';

function parsed(...argv: string[]): ParsedArgs {
  const result = parseArgs(['node', 'evidence-loop', ...argv]);
  if (!result.success) {
    throw new Error(result.error);
  }
  return result.args;
}

function failure(...argv: string[]): string {
  const result = parseArgs(['node', 'evidence-loop', ...argv]);
  if (result.success) {
    throw new Error('expected parsing to fail');
  }
  return result.error;
}

describe('parseArgs', () => {
  describe('basic functionality', () => {
    it('should parse a question', () => {
      expect(parsed('Minimum cover for a slab?').query).toBe('Minimum cover for a slab?');
    });

    it('should join multi-word questions', () => {
      expect(parsed('Minimum', 'cover', 'for', 'a', 'slab').query).toBe('Minimum cover for a slab');
    });

    it('should leave the question empty when none is given', () => {
      expect(parsed('--json').query).toBe('');
    });

    it('should set help flag with --help and -h', () => {
      expect(parsed('--help').help).toBe(true);
      expect(parsed('-h').help).toBe(true);
    });

    it('should set version flag with --version and -v', () => {
      expect(parsed('--version').version).toBe(true);
      expect(parsed('-v').version).toBe(true);
    });
  });

  describe('numeric options', () => {
    it('should parse --max-steps with space', () => {
      expect(parsed('q', '--max-steps', '8').maxSteps).toBe(8);
    });

    it('should parse --max-steps with equals', () => {
      expect(parsed('q', '--max-steps=8').maxSteps).toBe(8);
    });

    it('should reject a non-positive --max-steps', () => {
      expect(failure('q', '--max-steps', '0')).toBe('Error: --max-steps must be a positive integer');
    });

    it('should accept zero replans', () => {
      expect(parsed('q', '--max-replans', '0').maxReplans).toBe(0);
    });

    it('should reject a loop window below 2', () => {
      expect(failure('q', '--loop-window', '1')).toBe('Error: --loop-window must be an integer of at least 2');
    });

    it('should parse --relevance-threshold as a fraction', () => {
      expect(parsed('q', '--relevance-threshold', '0.75').relevanceThreshold).toBe(0.75);
    });

    it('should reject a threshold above 1', () => {
      expect(failure('q', '--relevance-threshold', '75')).toBe(
        'Error: --relevance-threshold must be a number between 0 and 1'
      );
    });

    it('should report a missing value', () => {
      expect(failure('q', '--max-steps')).toBe('Error: --max-steps requires a value');
      expect(failure('q', '--max-steps', '--json')).toBe('Error: --max-steps requires a value');
      expect(failure('q', '--max-steps=')).toBe('Error: --max-steps= requires a value');
    });
  });

  describe('model options', () => {
    it('should parse --provider', () => {
      expect(parsed('q', '--provider', 'claude-cli').provider).toBe('claude-cli');
    });

    it('should reject an unknown provider', () => {
      expect(failure('q', '--provider', 'gpt')).toBe('Error: --provider must be one of: anthropic, claude-cli, mock');
    });

    it('should parse --fallback-providers', () => {
      expect(parsed('q', '--fallback-providers', 'claude-cli, anthropic').fallbackProviders).toEqual([
        'claude-cli',
        'anthropic',
      ]);
    });

    it('should reject an unknown fallback provider', () => {
      expect(failure('q', '--fallback-providers', 'anthropic,other')).toBe(
        'Error: Invalid provider "other" in --fallback-providers. Must be one of: anthropic, claude-cli, mock'
      );
    });

    it('should keep everything after the first = in a value', () => {
      expect(parsed('q', '--search-endpoint=http://localhost:8080/?a=b').searchEndpoint).toBe(
        'http://localhost:8080/?a=b'
      );
    });

    it('should require --mock-config with the mock provider', () => {
      expect(failure('q', '--provider', 'mock')).toBe('Error: --provider mock requires --mock-config');
      expect(parsed('q', '--provider', 'mock', '--mock-config', 'mock.json').mockConfigPath).toBe('mock.json');
    });
  });

  describe('output options', () => {
    it('should parse boolean flags', () => {
      const args = parsed('q', '--json', '--no-interactive', '--verbose', '--judge-advisor');
      expect(args.jsonOutput).toBe(true);
      expect(args.noInteractive).toBe(true);
      expect(args.verbose).toBe(true);
      expect(args.judgeAdvisor).toBe(true);
    });

    it('should reject --quiet with --verbose', () => {
      expect(failure('q', '--quiet', '--verbose')).toBe('Error: --quiet cannot be combined with --verbose or --debug');
    });

    it('should reject unknown options', () => {
      expect(failure('q', '--max-plan-iterations', '3')).toBe('Error: Unknown option: --max-plan-iterations');
    });
  });
});

describe('toCliFlags', () => {
  it('should leave unset options undefined so lower layers apply', () => {
    const flags = toCliFlags(parsed('Minimum cover'));
    expect(flags.query).toBe('Minimum cover');
    expect(flags.provider).toBeUndefined();
    expect(flags.maxSteps).toBeUndefined();
    expect(flags.fallbackProviders).toBeUndefined();
    expect(flags.judgeAdvisor).toBeUndefined();
  });

  it('should carry set options', () => {
    const flags = toCliFlags(parsed('q', '--max-steps', '4', '--corpus', 'docs.json', '--judge-advisor'));
    expect(flags.maxSteps).toBe(4);
    expect(flags.corpusPath).toBe('docs.json');
    expect(flags.judgeAdvisor).toBe(true);
  });
});
