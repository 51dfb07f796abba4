/**
 * Main Entry
 * Layer: action
 *
 * Container entrypoint: everything after the program name is the primary
 * command, handed over verbatim.
 *
 * Required ports:
 *   - config.supervisor
 *   - supervisor.run
 */

import { loadSupervisorConfig } from './config';
import { runSupervisor } from './supervisor';
import { CONFIG_ERROR_EXIT_CODE } from './types';

/**
 * Runs the supervisor for the given command vector.
 *
 * @returns Status the process should exit with
 */
export async function main(
  command: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  const configResult = loadSupervisorConfig(env);
  if (!configResult.success) {
    console.error(configResult.error);
    return CONFIG_ERROR_EXIT_CODE;
  }

  const result = await runSupervisor(command, configResult.config);
  return result.exitCode;
}
