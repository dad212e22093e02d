import { describe, it, expect } from 'vitest';
import { FallbackLanguageModel } from './fallback-model';
import { ScriptedLanguageModel } from './mock-model';
import { createBufferLogger } from '../logging/buffer-logger';
import { ModelUnavailableError } from '../types/errors';

const REQUEST = { system: 'ROLE: planner', prompt: 'Plan it.' };

describe('FallbackLanguageModel', () => {
  it('should answer from the primary provider while it works', async () => {
    const primary = new ScriptedLanguageModel({ name: 'anthropic', fallbackResponse: 'primary' });
    const backup = new ScriptedLanguageModel({ name: 'claude-cli', fallbackResponse: 'backup' });
    const model = new FallbackLanguageModel([primary, backup], createBufferLogger());

    expect(await model.complete(REQUEST)).toBe('primary');
    expect(model.name).toBe('anthropic');
    expect(backup.calls).toHaveLength(0);
  });

  it('should switch to the next provider for the rest of the session', async () => {
    const primary = new ScriptedLanguageModel({ name: 'anthropic', fallbackResponse: new Error('401 unauthorized') });
    const backup = new ScriptedLanguageModel({ name: 'claude-cli', fallbackResponse: 'backup' });
    const logger = createBufferLogger();
    const model = new FallbackLanguageModel([primary, backup], logger);

    expect(await model.complete(REQUEST)).toBe('backup');
    expect(await model.complete(REQUEST)).toBe('backup');
    expect(primary.calls).toHaveLength(1);
    expect(model.name).toBe('claude-cli');

    const fallbacks = logger.getEventsByType('model_fallback');
    expect(fallbacks).toHaveLength(1);
    expect(fallbacks[0].message).toBe('anthropic failed (401 unauthorized), falling back to claude-cli');
  });

  it('should throw ModelUnavailableError when every provider fails', async () => {
    const model = new FallbackLanguageModel(
      [
        new ScriptedLanguageModel({ name: 'anthropic', fallbackResponse: new Error('down') }),
        new ScriptedLanguageModel({ name: 'claude-cli', fallbackResponse: new Error('not installed') }),
      ],
      createBufferLogger()
    );

    const error = await model.complete(REQUEST).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ModelUnavailableError);
    expect(error instanceof ModelUnavailableError && error.providers).toEqual(['anthropic', 'claude-cli']);
  });

  it('should reject an empty provider list', () => {
    expect(() => new FallbackLanguageModel([], createBufferLogger())).toThrow('At least one language model is required');
  });
});
