/**
 * Exit Status Mapping
 *
 * Translates how the primary command ended into the status the supervisor
 * itself exits with, following the shell conventions `exec` would give.
 */

import * as os from 'os';
import { COMMAND_NOT_EXECUTABLE_EXIT_CODE, COMMAND_NOT_FOUND_EXIT_CODE } from '../types';
import { isErrnoException } from '../utils';

/**
 * Exit status for a child that exited with `code` or was killed by `signal`.
 * A signal death maps to 128 + signal number.
 */
export function exitCodeFor(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) {
    return code;
  }
  if (signal !== null) {
    return 128 + os.constants.signals[signal];
  }
  return 1;
}

/**
 * Exit status for a command that never started.
 * ENOENT is "not found" (127); anything else is "cannot execute" (126).
 */
export function spawnErrorExitCode(err: unknown): number {
  if (isErrnoException(err) && err.code === 'ENOENT') {
    return COMMAND_NOT_FOUND_EXIT_CODE;
  }
  return COMMAND_NOT_EXECUTABLE_EXIT_CODE;
}
