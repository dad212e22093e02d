/**
 * Schema-validated model calls
 *
 * Model text never reaches planning or judgment unvalidated: each response
 * is parsed against the stage's schema, and invalid output is re-prompted
 * with the validation errors a bounded number of times.
 */

import type { ValidationResult } from '../schemas';
import type { Logger } from '../types/logger';
import { ParseError } from '../types/errors';
import type { LanguageModel, ModelRequest } from './language-model';

export interface StructuredCallOptions<T> {
  /** Stage name for errors and logs */
  stage: string;
  parse: (text: string) => ValidationResult<T>;
  /** Re-prompts after the first invalid response */
  maxRetries: number;
  logger: Logger;
}

export function buildCorrectionPrompt(request: ModelRequest, previous: string, errors: string[]): string {
  return [
    request.prompt,
    '',
    'Your previous response could not be used:',
    ...errors.map((e) => `- ${e}`),
    '',
    'Previous response:',
    previous.length > 2000 ? `${previous.slice(0, 2000)}...` : previous,
    '',
    'Respond again with a single JSON object that fixes these problems and nothing else.',
  ].join('\n');
}

export async function completeStructured<T>(
  model: LanguageModel,
  request: ModelRequest,
  options: StructuredCallOptions<T>
): Promise<T> {
  let prompt = request.prompt;
  let errors: string[] = [];
  const attempts = options.maxRetries + 1;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    const text = await model.complete({ system: request.system, prompt });
    const parsed = options.parse(text);
    if (parsed.success) {
      return parsed.data;
    }
    errors = parsed.errors;
    options.logger.event('parse_failed', `${options.stage} output invalid (attempt ${attempt}/${attempts})`, {
      stage: options.stage,
      errors,
    });
    prompt = buildCorrectionPrompt(request, text, errors);
  }

  throw new ParseError(options.stage, attempts, errors);
}
