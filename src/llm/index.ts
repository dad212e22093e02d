/**
 * Language model providers
 */

export type { ModelRequest, LanguageModel, LanguageModelOptions } from './language-model';
export { BaseLanguageModel } from './language-model';
export type { AnthropicModelOptions } from './anthropic-model';
export { AnthropicLanguageModel } from './anthropic-model';
export type { CliModelOptions } from './cli-model';
export { ClaudeCliLanguageModel } from './cli-model';
export { FallbackLanguageModel } from './fallback-model';
export type { ModelScript, ScriptedModelOptions } from './mock-model';
export { ScriptedLanguageModel } from './mock-model';
export { RealProcessRunner, createRealProcessRunner } from './real-process-runner';
export type { StructuredCallOptions } from './structured-output';
export { completeStructured, buildCorrectionPrompt } from './structured-output';
export type { ModelFactoryDependencies } from './model-factory';
export { createLanguageModel, loadMockScripts, providerChain } from './model-factory';
