/**
 * Provider fallback chain
 *
 * When the active provider fails, the next one in the list takes over for
 * the rest of the session. When every provider has failed the session
 * cannot continue.
 */

import type { Logger } from '../types/logger';
import { ModelUnavailableError, errorMessage } from '../types/errors';
import type { LanguageModel, ModelRequest } from './language-model';

export class FallbackLanguageModel implements LanguageModel {
  private active = 0;

  constructor(
    private readonly models: LanguageModel[],
    private readonly logger: Logger
  ) {
    if (models.length === 0) {
      throw new Error('At least one language model is required');
    }
  }

  get name(): string {
    return this.models[Math.min(this.active, this.models.length - 1)].name;
  }

  async complete(request: ModelRequest): Promise<string> {
    const causes: unknown[] = [];
    while (this.active < this.models.length) {
      const model = this.models[this.active];
      try {
        return await model.complete(request);
      } catch (error) {
        causes.push(error);
        this.active += 1;
        const next = this.models[this.active];
        this.logger.event(
          'model_fallback',
          next
            ? `${model.name} failed (${errorMessage(error)}), falling back to ${next.name}`
            : `${model.name} failed (${errorMessage(error)}), no providers left`,
          { provider: model.name }
        );
      }
    }
    throw new ModelUnavailableError(
      this.models.map((m) => m.name),
      causes
    );
  }
}
