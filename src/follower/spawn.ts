/**
 * Log Follower Spawning
 *
 * Spawns `tail -F` against the scheduler log as a detached child whose
 * output lands in the container's own stdout/stderr.
 */

import { spawn, ChildProcess } from 'child_process';
import { errorMessage } from '../utils';

// -----------------------------------------------------------------------------
// Port: follower.spawn
// -----------------------------------------------------------------------------

export interface SpawnResult {
  success: true;
  pid: number;
}

export interface SpawnError {
  success: false;
  error: string;
}

export type SpawnOutcome = SpawnResult | SpawnError;

/** Follower program and the flags that keep it reading across log rotation */
export const FOLLOWER_COMMAND = 'tail';
export const FOLLOWER_ARGS = ['-F'] as const;

function reportFollowerError(err: Error): void {
  console.error(`Log follower failed: ${err.message}`);
}

/**
 * Spawns the follower without waiting on it.
 *
 * Errors raised after a successful spawn (the child dying on its own) go
 * to onError; a failed spawn is returned instead and not reported twice.
 *
 * @param logPath - File to follow
 * @param onError - Receives asynchronous follower errors
 * @returns PID of spawned process or error
 */
export function spawnFollower(
  logPath: string,
  onError: (err: Error) => void = reportFollowerError,
): SpawnOutcome {
  try {
    const child: ChildProcess = spawn(FOLLOWER_COMMAND, [...FOLLOWER_ARGS, logPath], {
      detached: true,
      stdio: ['ignore', 'inherit', 'inherit'],
    });

    const pid = child.pid;
    child.on('error', (err) => {
      if (pid !== undefined) {
        onError(err);
      }
    });

    // Allow the supervisor to exit without waiting
    child.unref();

    if (pid === undefined) {
      return { success: false, error: `Failed to start ${FOLLOWER_COMMAND}` };
    }

    return { success: true, pid };
  } catch (err) {
    return { success: false, error: `Failed to spawn log follower: ${errorMessage(err)}` };
  }
}
