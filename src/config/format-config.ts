/**
 * Human-readable display of the resolved configuration
 */

import type { AgentConfig } from '../types/agent-config';

function withSource(config: AgentConfig, key: string, value: string | number | boolean | undefined): string {
  const source = config.sources[key];
  const shown = value === undefined ? '(unset)' : String(value);
  return source && source !== 'default' ? `${shown} [${source}]` : shown;
}

export function formatConfigForDisplay(config: AgentConfig): string {
  const lines: string[] = [];

  lines.push('═══════════════════════════════════════════════════════════════');
  lines.push('                    EFFECTIVE CONFIGURATION');
  lines.push('═══════════════════════════════════════════════════════════════');
  lines.push('');

  lines.push(`Run ID:              ${config.runId}`);
  lines.push(`Working Directory:   ${config.paths.workingDirectory}`);
  lines.push(`Resolved At:         ${config.resolvedAt}`);
  lines.push('');

  lines.push('┌─ Limits ────────────────────────────────────────────────────┐');
  lines.push(`│ Max Steps:          ${withSource(config, 'limits.maxSteps', config.limits.maxSteps)}`);
  lines.push(`│ Max Replans:        ${withSource(config, 'limits.maxReplans', config.limits.maxReplans)}`);
  lines.push(`│ Loop Window:        ${withSource(config, 'limits.loopWindow', config.limits.loopWindow)}`);
  lines.push(`│ Relevance Threshold: ${withSource(config, 'thresholds.sourceRelevance', config.thresholds.sourceRelevance)}`);
  lines.push('└──────────────────────────────────────────────────────────────┘');
  lines.push('');

  lines.push('┌─ Model ─────────────────────────────────────────────────────┐');
  lines.push(`│ Provider:  ${withSource(config, 'model.provider', config.model.provider)}`);
  lines.push(`│ Model:     ${withSource(config, 'model.model', config.model.model)}`);
  if (config.model.fallbackProviders.length > 0) {
    lines.push(`│ Fallbacks: ${config.model.fallbackProviders.join(', ')}`);
  }
  lines.push(`│ Judge Advisor: ${config.model.judgeAdvisor ? 'yes' : 'no'}`);
  lines.push('└──────────────────────────────────────────────────────────────┘');
  lines.push('');

  lines.push('┌─ Search ────────────────────────────────────────────────────┐');
  lines.push(`│ Endpoint: ${withSource(config, 'search.endpoint', config.search.endpoint)}`);
  lines.push(`│ Corpus:   ${withSource(config, 'search.corpusPath', config.search.corpusPath)}`);
  lines.push(`│ Hits:     ${config.search.hits}`);
  lines.push('└──────────────────────────────────────────────────────────────┘');
  lines.push('');

  lines.push('═══════════════════════════════════════════════════════════════');

  return lines.join('\n');
}
