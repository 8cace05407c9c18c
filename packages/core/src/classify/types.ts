/**
 * Outcome of a single curl invocation.
 */

export type OutcomeKind = 'success' | 'cancelled' | 'tool-error';

export interface SuccessOutcome {
  kind: 'success';
}

export interface CancelledOutcome {
  kind: 'cancelled';
}

export interface ToolErrorOutcome {
  kind: 'tool-error';

  /** Text curl printed after `curl: (N) `, or '' when it printed none */
  message: string;

  /** curl's exit code (null when it was killed by a signal) */
  exitCode: number | null;
}

/** Tagged result of one transfer attempt */
export type Outcome = SuccessOutcome | CancelledOutcome | ToolErrorOutcome;
