/**
 * Log Follower Lifecycle (Stop)
 *
 * The follower is never awaited; once the primary command is done the
 * supervisor sends it a single SIGTERM so it does not outlive the handoff.
 */

import { errorMessage, isErrnoException } from '../utils';

// -----------------------------------------------------------------------------
// Port: follower.stop
// -----------------------------------------------------------------------------

export interface StopResult {
  success: true;
}

export interface StopError {
  success: false;
  error: string;
  /** True if process was not found (may have already exited) */
  notFound: boolean;
}

export type StopOutcome = StopResult | StopError;

/**
 * Stops the follower by PID with SIGTERM.
 *
 * @param pid - Process ID to signal
 */
export function stopFollower(pid: number): StopOutcome {
  try {
    process.kill(pid, 'SIGTERM');
    return { success: true };
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ESRCH') {
      return {
        success: false,
        error: 'Process not found',
        notFound: true,
      };
    }
    return {
      success: false,
      error: `Failed to stop log follower: ${errorMessage(err)}`,
      notFound: false,
    };
  }
}

