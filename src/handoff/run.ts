/**
 * Primary Command Handoff
 *
 * Node.js cannot replace its own process image, so the handoff runs the
 * command as a child with inherited stdio, relays signals to it, and
 * reports the status the supervisor should exit with.
 */

import { spawn, ChildProcess } from 'child_process';
import { isatty } from 'tty';
import { FORWARDED_SIGNALS } from '../types';
import { errorMessage } from '../utils';
import { exitCodeFor, spawnErrorExitCode } from './exit-status';
import { forwardSignals, defaultSignalDeps, relayedSignals } from './signals';
import type { SignalDeps } from './signals';

// -----------------------------------------------------------------------------
// Port: handoff.run
// -----------------------------------------------------------------------------

export interface HandoffResult {
  /** Status to exit the supervisor with */
  exitCode: number;
  /** Signal that terminated the command, if any */
  signal: NodeJS.Signals | null;
  /** Set when the command could not be started */
  error?: string;
}

export interface HandoffOptions {
  signals?: readonly NodeJS.Signals[];
  signalDeps?: SignalDeps;
  /** Whether stdin is a terminal; terminal signals are then not relayed */
  interactive?: boolean;
}

function spawnFailure(file: string, err: unknown): HandoffResult {
  const message = errorMessage(err);
  console.error(`${file}: ${message}`);
  return { exitCode: spawnErrorExitCode(err), signal: null, error: message };
}

/**
 * Runs the command vector exactly as given: no shell, no re-quoting.
 * An empty vector runs nothing and yields status 0, like `exec` with no
 * arguments.
 */
export function handoff(
  command: readonly string[],
  options: HandoffOptions = {},
): Promise<HandoffResult> {
  const [file, ...args] = command;
  if (file === undefined) {
    return Promise.resolve({ exitCode: 0, signal: null });
  }

  const signals = relayedSignals(
    options.signals ?? FORWARDED_SIGNALS,
    options.interactive ?? isatty(0),
  );
  const signalDeps = options.signalDeps ?? defaultSignalDeps;

  return new Promise<HandoffResult>((resolve) => {
    let child: ChildProcess;
    try {
      child = spawn(file, args, { stdio: 'inherit' });
    } catch (err) {
      resolve(spawnFailure(file, err));
      return;
    }

    const release = forwardSignals(child, signals, signalDeps);

    child.on('error', (err) => {
      if (child.pid === undefined) {
        release();
        resolve(spawnFailure(file, err));
        return;
      }
      // Running child; a failed signal relay is not a reason to stop waiting
      console.error(`${file}: ${err.message}`);
    });

    child.on('exit', (code, signal) => {
      release();
      resolve({ exitCode: exitCodeFor(code, signal), signal });
    });
  });
}
