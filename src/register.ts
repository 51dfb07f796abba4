/**
 * Job Registration
 * Layer: action
 *
 * Build-time step run once while the image is assembled: creates the
 * scheduler log file and installs the periodic job in the crontab.
 *
 * Required ports:
 *   - config.register
 *   - logFile.ensure
 *   - crontab.entry
 *   - crontab.sync
 */

import * as core from '@actions/core';
import type { RegisterConfig } from './types';
import { ensureLogFile } from './log-file';
import { buildCrontabEntry, syncCrontab } from './crontab';
import { loadRegisterConfig } from './config';
import { errorMessage } from './utils';

export async function registerJob(config: RegisterConfig): Promise<void> {
  // Validate before touching anything on disk
  const entry = buildCrontabEntry(config);

  const logResult = ensureLogFile(config.logPath);
  if (!logResult.success) {
    throw new Error(logResult.error);
  }
  core.info(
    logResult.created
      ? `Created log file ${config.logPath}`
      : `Log file ${config.logPath} already exists`,
  );

  await syncCrontab([entry]);
  core.info(`Registered job: ${entry}`);
}

/**
 * Registration entry: reads SUPERVISOR_JOB_* configuration and registers
 * the job. Failures are printed to stderr.
 *
 * @returns Status the process should exit with
 */
export async function registerMain(env: NodeJS.ProcessEnv = process.env): Promise<number> {
  try {
    const configResult = loadRegisterConfig(env);
    if (!configResult.success) {
      throw new Error(configResult.error);
    }
    await registerJob(configResult.config);
    return 0;
  } catch (error) {
    console.error(`Registration error: ${errorMessage(error)}`);
    return 1;
  }
}
