/**
 * Standardized exit codes for the CLI
 */

export const ExitCode = {
  /** A grounded answer was produced */
  SUCCESS: 0,
  /** Unexpected error, or the session ended in status `error` */
  UNEXPECTED_ERROR: 1,
  /** Invalid CLI usage or missing question */
  USAGE_ERROR: 2,
  /** The session was handed to a human reviewer */
  HUMAN_REVIEW: 3,
  /** Configuration file could not be loaded */
  CONFIG_ERROR: 4,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function getExitCodeDescription(code: ExitCode): string {
  switch (code) {
    case ExitCode.SUCCESS:
      return 'Answer produced';
    case ExitCode.UNEXPECTED_ERROR:
      return 'Unexpected error or unavailable external service';
    case ExitCode.USAGE_ERROR:
      return 'Invalid CLI usage or missing question';
    case ExitCode.HUMAN_REVIEW:
      return 'Session escalated to human review';
    case ExitCode.CONFIG_ERROR:
      return 'Configuration could not be loaded';
  }
}
