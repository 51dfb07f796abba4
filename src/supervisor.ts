/**
 * Startup Supervisor
 * Layer: core
 *
 * Provided ports:
 *   - supervisor.run
 *
 * Required ports:
 *   - scheduler.detect
 *   - scheduler.start
 *   - follower.spawn
 *   - follower.stop
 *   - handoff.run
 *
 * Strictly sequential startup:
 *
 *   START → SCHEDULER_CHECK → {SCHEDULER_ABSENT | SCHEDULER_STARTED | SCHEDULER_FAILED} → HANDOFF
 *
 * SCHEDULER_FAILED is terminal under the strict policy; every other path
 * reaches HANDOFF. The follower, when attached, is never awaited.
 */

import * as core from '@actions/core';
import type { SupervisorConfig, SupervisorPhase } from './types';
import { SCHEDULER_FAILURE_EXIT_CODE } from './types';
import { detectScheduler, startScheduler } from './scheduler';
import { isReadableFile } from './paths';
import { spawnFollower, stopFollower } from './follower';
import { handoff } from './handoff';
import type { HandoffResult } from './handoff';

export interface SupervisorResult {
  /** Status the supervisor process should exit with */
  exitCode: number;
  /** Every phase entered, in order */
  phases: SupervisorPhase[];
  /** False only when a strict scheduler failure aborted startup */
  handedOff: boolean;
  /** PID of the log follower, if one was attached */
  followerPid: number | null;
}

/**
 * Dependency injection interface for runSupervisor.
 * Production defaults are used when not provided by tests.
 */
export interface SupervisorDeps {
  detectScheduler: typeof detectScheduler;
  startScheduler: typeof startScheduler;
  isReadableFile: typeof isReadableFile;
  spawnFollower: (logPath: string) => ReturnType<typeof spawnFollower>;
  stopFollower: typeof stopFollower;
  handoff: (command: readonly string[]) => Promise<HandoffResult>;
}

const defaultDeps: SupervisorDeps = {
  detectScheduler,
  startScheduler,
  isReadableFile,
  spawnFollower: (logPath) => spawnFollower(logPath),
  stopFollower,
  handoff: (command) => handoff(command),
};

// -----------------------------------------------------------------------------
// Log follower attachment
// -----------------------------------------------------------------------------

function attachFollower(logPath: string, deps: SupervisorDeps): number | null {
  if (!deps.isReadableFile(logPath)) {
    console.error(`Log file ${logPath} is missing or unreadable; not following scheduler output`);
    return null;
  }

  const spawnResult = deps.spawnFollower(logPath);
  if (!spawnResult.success) {
    console.error(`Could not follow ${logPath}: ${spawnResult.error}`);
    return null;
  }

  core.info(`Following ${logPath} (PID: ${spawnResult.pid})`);
  return spawnResult.pid;
}

function detachFollower(pid: number, deps: SupervisorDeps): void {
  const stopResult = deps.stopFollower(pid);
  if (!stopResult.success && !stopResult.notFound) {
    console.error(stopResult.error);
  }
}

// -----------------------------------------------------------------------------
// Port: supervisor.run
// -----------------------------------------------------------------------------

/**
 * Runs startup and hands off to `command`.
 *
 * @param command - Primary command vector, passed through untouched
 * @param config - Resolved configuration
 */
export async function runSupervisor(
  command: readonly string[],
  config: SupervisorConfig,
  deps: SupervisorDeps = defaultDeps,
): Promise<SupervisorResult> {
  const phases: SupervisorPhase[] = ['start', 'scheduler-check'];
  let followerPid: number | null = null;

  const detection = deps.detectScheduler(config.schedulerBinary);
  if (!detection.present) {
    core.info(`Scheduler unavailable (${detection.detail}); skipping`);
    phases.push('scheduler-absent');
  } else {
    core.info(`Starting ${config.schedulerService}…`);
    const startResult = await deps.startScheduler(config.schedulerService);

    if (!startResult.success) {
      phases.push('scheduler-failed');
      if (config.policy === 'strict') {
        console.error(
          `Failed to start ${config.schedulerService} scheduler: ${startResult.error}`,
        );
        return {
          exitCode: SCHEDULER_FAILURE_EXIT_CODE,
          phases,
          handedOff: false,
          followerPid: null,
        };
      }
      console.error(
        `Failed to start ${config.schedulerService} scheduler: ${startResult.error} (continuing)`,
      );
    } else {
      phases.push('scheduler-started');
      if (config.followLog) {
        followerPid = attachFollower(config.logPath, deps);
      }
    }
  }

  phases.push('handoff');
  if (command.length === 0) {
    core.info('No command given; nothing to hand off to');
  }

  const result = await deps.handoff(command);

  if (followerPid !== null) {
    detachFollower(followerPid, deps);
  }

  return { exitCode: result.exitCode, phases, handedOff: true, followerPid };
}
