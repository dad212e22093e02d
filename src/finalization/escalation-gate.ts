/**
 * Escalation gate
 *
 * Hands a session to a human: moves it to human_review, freezes the state
 * and persists a snapshot for the operator. Nothing resumes a frozen
 * session.
 */

import type { Decision, HumanReviewRequest } from '../schemas';
import { ARTIFACT_DIR_NAME } from '../types/agent-config';
import type { FileSystem } from '../types/file-system';
import type { Logger } from '../types/logger';
import type { ExecutionState } from '../core/execution-state';
import { isTerminalStatus } from '../core/state-machine';

export interface EscalationGateOptions {
  fs: FileSystem;
  logger: Logger;
  /** Directory that holds `.evidence-loop/` */
  artifactBaseDir: string;
}

export class EscalationGate {
  constructor(private readonly options: EscalationGateOptions) {}

  reviewPath(runId: string): string {
    const { fs, artifactBaseDir } = this.options;
    return fs.join(artifactBaseDir, ARTIFACT_DIR_NAME, 'reviews', `${runId}.json`);
  }

  async escalate(state: ExecutionState, reason: string, decision?: Decision): Promise<HumanReviewRequest> {
    const { fs, logger } = this.options;
    if (!state.isFrozen() && !isTerminalStatus(state.getStatus())) {
      state.applyEvent({ type: 'ESCALATE', reason });
    }
    state.freeze();

    const request: HumanReviewRequest = { reason, snapshot: state.snapshot() };
    if (decision) {
      request.decision = decision;
    }

    const path = this.reviewPath(state.runId);
    const written = await fs.writeFile(path, JSON.stringify(request, null, 2) + '\n', { createParents: true });
    if (written.ok) {
      request.snapshotPath = path;
    } else {
      logger.error(`Could not persist review snapshot: ${written.error.message}`, { path });
    }

    logger.event('escalated', `Human review required: ${reason}`, {
      snapshotPath: request.snapshotPath,
    });
    return request;
  }
}
