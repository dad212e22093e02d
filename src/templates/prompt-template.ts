/**
 * Interface for prompt templates that support string interpolation
 */
export interface PromptTemplate {
  /**
   * The template string with placeholders (e.g., "{{variable}}")
   */
  template: string;

  description?: string;

  requiredVariables?: string[];
}

/**
 * A system prompt and the user template it is paired with
 */
export interface StagePrompt {
  /** Identifies the stage; kept stable so test doubles can match on it */
  role: string;
  system: string;
  user: PromptTemplate;
}

/**
 * Interpolate `{{name}}` placeholders
 * @throws Error if a required variable is missing or a placeholder is left unfilled
 */
export function interpolateTemplate(template: PromptTemplate, variables: Record<string, string>): string {
  const missing = (template.requiredVariables ?? []).filter((name) => variables[name] === undefined);
  if (missing.length > 0) {
    throw new Error(`Missing required variables: ${missing.join(', ')}`);
  }

  const result = template.template.replace(/\{\{(\w+)\}\}/g, (placeholder, name: string) => {
    const value = variables[name];
    if (value === undefined) {
      throw new Error(`Template placeholder without value: ${placeholder}`);
    }
    return value;
  });
  return result;
}

/**
 * Render a value for inclusion in a prompt
 */
export function formatForPrompt(value: unknown): string {
  if (value === undefined) {
    return '(none)';
  }
  if (typeof value === 'string') {
    return value.length > 0 ? value : '(none)';
  }
  return JSON.stringify(value, null, 2);
}

export function renderStage(stage: StagePrompt, variables: Record<string, string>): { system: string; prompt: string } {
  return { system: stage.system, prompt: interpolateTemplate(stage.user, variables) };
}
