/**
 * Scripted language model for tests and offline runs
 *
 * Each script matches a stage by a pattern tested against the system
 * prompt and replays its responses in order; the last response repeats
 * once the list is used up.
 */

import type { LanguageModel, ModelRequest } from './language-model';

export interface ModelScript {
  /** Tested against the system prompt */
  match: RegExp | string;
  /** Raw responses, or an Error to throw */
  responses: Array<string | Error>;
}

export interface ScriptedModelOptions {
  name?: string;
  scripts?: ModelScript[];
  /** Returned when no script matches */
  fallbackResponse?: string | Error;
}

interface ScriptCursor {
  script: ModelScript;
  next: number;
}

export class ScriptedLanguageModel implements LanguageModel {
  readonly name: string;
  private readonly cursors: ScriptCursor[];
  private readonly fallbackResponse: string | Error;

  /** Every request received, for test assertions */
  readonly calls: ModelRequest[] = [];

  constructor(options: ScriptedModelOptions = {}) {
    this.name = options.name ?? 'mock';
    this.cursors = (options.scripts ?? []).map((script) => ({ script, next: 0 }));
    this.fallbackResponse = options.fallbackResponse ?? new Error('No scripted response for this request');
  }

  async complete(request: ModelRequest): Promise<string> {
    this.calls.push(request);
    const cursor = this.cursors.find(({ script }) =>
      typeof script.match === 'string' ? request.system.includes(script.match) : script.match.test(request.system)
    );

    let response: string | Error = this.fallbackResponse;
    if (cursor && cursor.script.responses.length > 0) {
      const index = Math.min(cursor.next, cursor.script.responses.length - 1);
      response = cursor.script.responses[index];
      cursor.next += 1;
    }

    if (response instanceof Error) {
      throw response;
    }
    return response;
  }

  /**
   * Requests whose system prompt matched the given pattern
   */
  callsMatching(match: RegExp | string): ModelRequest[] {
    return this.calls.filter((call) =>
      typeof match === 'string' ? call.system.includes(match) : match.test(call.system)
    );
  }
}
