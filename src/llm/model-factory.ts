/**
 * Language model factory
 * Builds the provider chain named by the effective configuration
 */

import { z } from 'zod';
import type { AgentConfig, ModelProvider } from '../types/agent-config';
import type { Clock } from '../types/clock';
import type { FileSystem } from '../types/file-system';
import type { Logger } from '../types/logger';
import type { ProcessRunner } from '../types/process-runner';
import { ConfigError } from '../types/errors';
import { Result, ok, err } from '../types/result';
import { extractJson } from '../schemas/validators';
import type { LanguageModel } from './language-model';
import { AnthropicLanguageModel } from './anthropic-model';
import { ClaudeCliLanguageModel } from './cli-model';
import { FallbackLanguageModel } from './fallback-model';
import { ScriptedLanguageModel, ScriptedModelOptions } from './mock-model';

export interface ModelFactoryDependencies {
  clock: Clock;
  logger: Logger;
  fs: FileSystem;
  processRunner: ProcessRunner;
  env: Record<string, string | undefined>;
  /** Script file for the mock provider */
  mockConfigPath?: string;
}

// Objects are replayed as their JSON text
const scriptedResponseSchema = z.union([
  z.string(),
  z.record(z.unknown()).transform((value) => JSON.stringify(value)),
]);

const mockConfigSchema = z
  .object({
    scripts: z.array(
      z
        .object({
          match: z.string().min(1),
          responses: z.array(scriptedResponseSchema).min(1),
        })
        .strict()
    ),
    fallbackResponse: scriptedResponseSchema.optional(),
  })
  .strict();

/**
 * Read a mock script file: `{ scripts: [{ match, responses }], fallbackResponse? }`
 */
export async function loadMockScripts(
  fs: FileSystem,
  path: string
): Promise<Result<ScriptedModelOptions, ConfigError>> {
  const read = await fs.readFile(path);
  if (!read.ok) {
    return err(new ConfigError(path, [read.error.message]));
  }
  const json = extractJson(read.value);
  if (!json.ok) {
    return err(new ConfigError(path, [json.error]));
  }
  const parsed = mockConfigSchema.safeParse(json.value);
  if (!parsed.success) {
    return err(
      new ConfigError(
        path,
        parsed.error.issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
      )
    );
  }
  return ok({
    name: 'mock',
    scripts: parsed.data.scripts,
    fallbackResponse: parsed.data.fallbackResponse,
  });
}

/**
 * Primary provider first, then fallbacks, without repeats
 */
export function providerChain(config: AgentConfig): ModelProvider[] {
  const chain: ModelProvider[] = [];
  for (const provider of [config.model.provider, ...config.model.fallbackProviders]) {
    if (!chain.includes(provider)) {
      chain.push(provider);
    }
  }
  return chain;
}

async function createProvider(
  provider: ModelProvider,
  config: AgentConfig,
  deps: ModelFactoryDependencies
): Promise<Result<LanguageModel, ConfigError>> {
  switch (provider) {
    case 'anthropic':
      return ok(
        new AnthropicLanguageModel({
          clock: deps.clock,
          apiKey: deps.env.ANTHROPIC_API_KEY,
          model: config.model.model,
          timeoutMs: config.timeouts.modelMs,
        })
      );
    case 'claude-cli':
      return ok(
        new ClaudeCliLanguageModel({
          clock: deps.clock,
          processRunner: deps.processRunner,
          workingDirectory: config.paths.workingDirectory,
          model: config.model.model,
          timeoutMs: config.timeouts.modelMs,
        })
      );
    case 'mock': {
      if (!deps.mockConfigPath) {
        return err(new ConfigError('--mock-config', ['the mock provider needs a script file']));
      }
      const scripts = await loadMockScripts(deps.fs, deps.mockConfigPath);
      if (!scripts.ok) {
        return scripts;
      }
      return ok(new ScriptedLanguageModel(scripts.value));
    }
  }
}

export async function createLanguageModel(
  config: AgentConfig,
  deps: ModelFactoryDependencies
): Promise<Result<LanguageModel, ConfigError>> {
  const models: LanguageModel[] = [];
  for (const provider of providerChain(config)) {
    const model = await createProvider(provider, config, deps);
    if (!model.ok) {
      return model;
    }
    models.push(model.value);
  }

  if (models.length === 1) {
    return ok(models[0]);
  }
  deps.logger.debug(`Model providers: ${models.map((m) => m.name).join(' -> ')}`);
  return ok(new FallbackLanguageModel(models, deps.logger));
}
