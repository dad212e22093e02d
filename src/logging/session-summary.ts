/**
 * Session summary
 * Markdown digest of a finished session, printed to stderr by the CLI
 */

import type { ExecutionStateSnapshot, SessionOutcome } from '../schemas';

const OUTCOME_LABELS: Record<SessionOutcome['kind'], string> = {
  answer: '✅ Answer produced',
  human_review: '⚠️ Handed to human review',
  error: '❌ Failed',
};

export function outcomeSnapshot(outcome: SessionOutcome): ExecutionStateSnapshot {
  return outcome.kind === 'human_review' ? outcome.request.snapshot : outcome.snapshot;
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}

export function formatSessionSummary(outcome: SessionOutcome): string {
  const snapshot = outcomeSnapshot(outcome);
  const lines: string[] = [
    '# Session Summary',
    '',
    `**Run ID:** ${outcome.runId}`,
    `**Outcome:** ${OUTCOME_LABELS[outcome.kind]}`,
    `**Status:** ${snapshot.status}`,
    `**Plan version:** ${snapshot.plan?.version ?? 0}`,
    '',
    '## Counters',
    '',
    `- Steps dispatched: ${snapshot.counters.dispatches}`,
    `- Replans: ${snapshot.counters.replans}`,
    `- Loops detected: ${snapshot.counters.loopsDetected}`,
    `- Rejected plans: ${snapshot.counters.planningFailures}`,
  ];

  if (snapshot.history.length > 0) {
    lines.push('', '## Steps', '');
    lines.push('| # | Tool | Status | Verdict | Source |');
    lines.push('|---|------|--------|---------|--------|');
    for (const entry of snapshot.history) {
      const source = entry.result.source
        ? `${entry.result.source.documentName} (${entry.result.source.locator})`
        : '-';
      lines.push(
        `| ${entry.step.number} | ${entry.step.tool} | ${entry.result.status} | ${entry.decision.verdict} | ${escapeCell(source)} |`
      );
    }
  }

  if (outcome.kind === 'human_review') {
    lines.push('', '## Review', '', `- Reason: ${outcome.request.reason}`);
    if (outcome.request.snapshotPath) {
      lines.push(`- Snapshot: ${outcome.request.snapshotPath}`);
    }
  }

  if (outcome.kind === 'error') {
    lines.push('', '## Error', '', '```', outcome.message, '```');
  }

  return lines.join('\n');
}
