/**
 * Anthropic Messages API language model
 */

import Anthropic from '@anthropic-ai/sdk';
import { BaseLanguageModel, LanguageModelOptions, ModelRequest } from './language-model';

const DEFAULT_MODEL = 'claude-sonnet-4-5-20250929';
const MAX_TOKENS = 4096;

export interface AnthropicModelOptions extends LanguageModelOptions {
  apiKey?: string;
  model?: string;
  /** Injected client, mainly for tests */
  client?: Anthropic;
}

function isRateLimitError(error: unknown): boolean {
  if (error instanceof Anthropic.RateLimitError) return true;
  return error instanceof Error && error.message.includes('429');
}

export class AnthropicLanguageModel extends BaseLanguageModel {
  readonly name = 'anthropic';
  private readonly client: Anthropic | undefined;
  private readonly model: string;

  constructor(options: AnthropicModelOptions) {
    super(options);
    this.model = options.model ?? DEFAULT_MODEL;
    this.client = options.client ?? (options.apiKey ? new Anthropic({ apiKey: options.apiKey }) : undefined);
  }

  protected isRetryable(error: unknown): boolean {
    return isRateLimitError(error) || error instanceof Anthropic.APIConnectionError;
  }

  protected async completeOnce(request: ModelRequest): Promise<string> {
    if (!this.client) {
      throw new Error('ANTHROPIC_API_KEY is not set');
    }
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: MAX_TOKENS,
      system: request.system,
      messages: [{ role: 'user', content: request.prompt }],
      temperature: 0,
    });

    const firstBlock = response.content[0];
    if (!firstBlock || firstBlock.type !== 'text') {
      throw new Error('Anthropic API returned no text content');
    }
    return firstBlock.text;
  }
}
