/**
 * Configuration
 * Layer: infra
 *
 * Provided ports:
 *   - config.supervisor
 *   - config.register
 *
 * Reads SUPERVISOR_* environment variables. Both loaders take the
 * environment as a parameter so tests never touch process.env.
 */

import type { RegisterConfig, SchedulerPolicy, SupervisorConfig } from './types';
import {
  DEFAULT_JOB_SCHEDULE,
  DEFAULT_LOG_PATH,
  DEFAULT_SCHEDULER_BINARY,
  DEFAULT_SCHEDULER_POLICY,
  SCHEDULER_POLICIES,
} from './types';
import { parseBooleanFlagOr } from './utils';

export interface ConfigResult<T> {
  success: true;
  config: T;
}

export interface ConfigError {
  success: false;
  error: string;
}

export type ConfigOutcome<T> = ConfigResult<T> | ConfigError;

function readString(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function isSchedulerPolicy(value: string): value is SchedulerPolicy {
  return SCHEDULER_POLICIES.some((policy) => policy === value);
}

// -----------------------------------------------------------------------------
// Port: config.supervisor
// -----------------------------------------------------------------------------

export function loadSupervisorConfig(
  env: NodeJS.ProcessEnv = process.env,
): ConfigOutcome<SupervisorConfig> {
  const schedulerBinary = readString(env, 'SUPERVISOR_SCHEDULER_BINARY') ?? DEFAULT_SCHEDULER_BINARY;
  const schedulerService = readString(env, 'SUPERVISOR_SCHEDULER_SERVICE') ?? schedulerBinary;

  const rawPolicy = readString(env, 'SUPERVISOR_SCHEDULER_POLICY')?.toLowerCase();
  let policy = DEFAULT_SCHEDULER_POLICY;
  if (rawPolicy !== undefined) {
    if (!isSchedulerPolicy(rawPolicy)) {
      return {
        success: false,
        error: `Invalid SUPERVISOR_SCHEDULER_POLICY: ${rawPolicy}. Must be one of ${SCHEDULER_POLICIES.join(', ')}.`,
      };
    }
    policy = rawPolicy;
  }

  return {
    success: true,
    config: {
      schedulerBinary,
      schedulerService,
      policy,
      followLog: parseBooleanFlagOr(env['SUPERVISOR_FOLLOW_LOG'], true),
      logPath: readString(env, 'SUPERVISOR_LOG_PATH') ?? DEFAULT_LOG_PATH,
    },
  };
}

// -----------------------------------------------------------------------------
// Port: config.register
// -----------------------------------------------------------------------------

export function loadRegisterConfig(
  env: NodeJS.ProcessEnv = process.env,
): ConfigOutcome<RegisterConfig> {
  const command = readString(env, 'SUPERVISOR_JOB_COMMAND');
  if (!command) {
    return { success: false, error: 'SUPERVISOR_JOB_COMMAND not set' };
  }

  return {
    success: true,
    config: {
      schedule: readString(env, 'SUPERVISOR_JOB_SCHEDULE') ?? DEFAULT_JOB_SCHEDULE,
      command,
      logPath: readString(env, 'SUPERVISOR_LOG_PATH') ?? DEFAULT_LOG_PATH,
      captureOutput: parseBooleanFlagOr(env['SUPERVISOR_JOB_CAPTURE_OUTPUT'], true),
    },
  };
}
