/**
 * Scheduler Control
 * Layer: core
 *
 * Provided ports:
 *   - scheduler.detect
 *   - scheduler.start
 *
 * The cron daemon is owned by the OS. The supervisor only checks that it
 * is installed and asks the service manager to start it; it never stops
 * or restarts it.
 */

import * as core from '@actions/core';
import { findExecutable } from './paths';
import { runCommand } from './run-command';

/** SysV-style service wrapper used to start the daemon */
export const SERVICE_MANAGER = 'service';

// -----------------------------------------------------------------------------
// Port: scheduler.detect
// -----------------------------------------------------------------------------

export interface SchedulerPresent {
  present: true;
  path: string;
}

export interface SchedulerAbsent {
  present: false;
  reason: 'not-found' | 'no-service-manager';
  detail: string;
}

export type SchedulerDetection = SchedulerPresent | SchedulerAbsent;

/**
 * Looks for the scheduler binary on PATH. Without a `service` wrapper to
 * start it (macOS, Windows, minimal images) the scheduler counts as absent.
 */
export function detectScheduler(binary: string): SchedulerDetection {
  const resolved = findExecutable(binary);
  if (!resolved) {
    return { present: false, reason: 'not-found', detail: `${binary} not found on PATH` };
  }

  if (!findExecutable(SERVICE_MANAGER)) {
    return {
      present: false,
      reason: 'no-service-manager',
      detail: `${SERVICE_MANAGER} not found on PATH; cannot start ${resolved}`,
    };
  }

  return { present: true, path: resolved };
}

// -----------------------------------------------------------------------------
// Port: scheduler.start
// -----------------------------------------------------------------------------

export interface StartResult {
  success: true;
}

export interface StartError {
  success: false;
  error: string;
}

export type StartOutcome = StartResult | StartError;

/**
 * Runs `service <name> start` and waits for it to return.
 * The daemon itself keeps running after this resolves. Whatever the init
 * script prints on stdout is passed through to the container log.
 */
export async function startScheduler(service: string): Promise<StartOutcome> {
  const result = await runCommand(SERVICE_MANAGER, [service, 'start']);
  if (result.stdout) {
    core.info(result.stdout);
  }
  if (result.ok) {
    return { success: true };
  }

  const reason =
    result.stderr || (result.code === null ? 'terminated abnormally' : `exit code ${result.code}`);
  return { success: false, error: reason };
}
