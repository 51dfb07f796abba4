/**
 * Scheduler Log File
 * Layer: infra
 *
 * Provided ports:
 *   - logFile.ensure
 *
 * The follower needs the log to exist before it starts; the file is
 * created empty at image build time and only ever appended to afterwards.
 */

import * as fs from 'fs';
import * as path from 'path';
import { errorMessage } from './utils';

// -----------------------------------------------------------------------------
// Port: logFile.ensure
// -----------------------------------------------------------------------------

export interface EnsureLogFileResult {
  success: true;
  /** True if the file did not exist before */
  created: boolean;
}

export interface EnsureLogFileError {
  success: false;
  error: string;
}

export type EnsureLogFileOutcome = EnsureLogFileResult | EnsureLogFileError;

/**
 * Creates the log file (and its directory) if missing, like `touch`.
 * Existing content is never truncated.
 *
 * @param logPath - File to create
 */
export function ensureLogFile(logPath: string): EnsureLogFileOutcome {
  try {
    fs.mkdirSync(path.dirname(logPath), { recursive: true });

    const created = !fs.existsSync(logPath);
    const fd = fs.openSync(logPath, 'a');
    fs.closeSync(fd);

    return { success: true, created };
  } catch (err) {
    return {
      success: false,
      error: `Failed to create log file: ${errorMessage(err)}`,
    };
  }
}
