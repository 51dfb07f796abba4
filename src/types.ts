/**
 * Boundary types for container-supervisor
 *
 * These types define the contracts between modules.
 */

// -----------------------------------------------------------------------------
// SchedulerPolicy
// What a failed scheduler start means for the rest of startup
// -----------------------------------------------------------------------------

/**
 * - best-effort: log the failure and hand off anyway
 * - strict: abort before the primary command runs
 */
export type SchedulerPolicy = 'best-effort' | 'strict';

export const SCHEDULER_POLICIES: readonly SchedulerPolicy[] = ['best-effort', 'strict'];

// -----------------------------------------------------------------------------
// SupervisorConfig
// Resolved startup configuration (see config.ts)
// -----------------------------------------------------------------------------

export interface SupervisorConfig {
  /** Executable looked up on PATH to decide whether scheduling is possible */
  schedulerBinary: string;
  /** Service name passed to `service <name> start` */
  schedulerService: string;
  /** Failure policy for the scheduler start */
  policy: SchedulerPolicy;
  /** Attach a follower to logPath after a successful start */
  followLog: boolean;
  /** Scheduler log file */
  logPath: string;
}

// -----------------------------------------------------------------------------
// RegisterConfig
// Build-time job registration (see register.ts)
// -----------------------------------------------------------------------------

export interface RegisterConfig {
  /** Crontab schedule (`@hourly` or a 5-field expression) */
  schedule: string;
  /** Shell command run by the scheduler */
  command: string;
  /** Log file created empty and, when captureOutput is set, appended to by the job */
  logPath: string;
  /** Redirect the job's stdout/stderr into logPath */
  captureOutput: boolean;
}

// -----------------------------------------------------------------------------
// SupervisorPhase
// START → SCHEDULER_CHECK → {ABSENT | STARTED | FAILED} → HANDOFF
// -----------------------------------------------------------------------------

export type SupervisorPhase =
  | 'start'
  | 'scheduler-check'
  | 'scheduler-absent'
  | 'scheduler-started'
  | 'scheduler-failed'
  | 'handoff';

// -----------------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------------

export const DEFAULT_SCHEDULER_BINARY = 'cron';
export const DEFAULT_SCHEDULER_POLICY: SchedulerPolicy = 'best-effort';
export const DEFAULT_LOG_PATH = '/var/log/cron.log';
export const DEFAULT_JOB_SCHEDULE = '@hourly';

/** EX_UNAVAILABLE: strict policy and the scheduler did not start */
export const SCHEDULER_FAILURE_EXIT_CODE = 69;

/** EX_CONFIG: invalid SUPERVISOR_* environment */
export const CONFIG_ERROR_EXIT_CODE = 78;

/** Shell convention for a command that was not found */
export const COMMAND_NOT_FOUND_EXIT_CODE = 127;

/** Shell convention for a command that was found but could not be executed */
export const COMMAND_NOT_EXECUTABLE_EXIT_CODE = 126;

/** Signals relayed to the primary command while it runs */
export const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = [
  'SIGTERM',
  'SIGINT',
  'SIGHUP',
  'SIGQUIT',
  'SIGUSR1',
  'SIGUSR2',
  'SIGWINCH',
];

/** Signals the terminal driver sends to the whole foreground process group */
export const TERMINAL_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGQUIT', 'SIGWINCH'];
