/**
 * Signal Forwarding
 *
 * While the primary command runs, signals sent to the supervisor (docker
 * stop, docker kill) are relayed to it instead of terminating the
 * supervisor.
 */

import type { ChildProcess } from 'child_process';
import { TERMINAL_SIGNALS } from '../types';

/**
 * Dependency injection interface for signal registration.
 * Production defaults use the process event emitter.
 */
export interface SignalDeps {
  registerSignal: (signal: NodeJS.Signals, handler: () => void) => void;
  unregisterSignal: (signal: NodeJS.Signals, handler: () => void) => void;
}

export const defaultSignalDeps: SignalDeps = {
  registerSignal: (signal, handler) => {
    process.on(signal, handler);
  },
  unregisterSignal: (signal, handler) => {
    process.off(signal, handler);
  },
};

/**
 * Narrows `signals` to those the child would not already receive. With a
 * controlling terminal the child sits in the supervisor's foreground
 * process group, so the kernel delivers terminal-generated signals to it
 * directly.
 */
export function relayedSignals(
  signals: readonly NodeJS.Signals[],
  interactive: boolean,
): NodeJS.Signals[] {
  if (!interactive) {
    return [...signals];
  }
  return signals.filter((signal) => !TERMINAL_SIGNALS.includes(signal));
}

/**
 * Installs one relay handler per signal.
 *
 * @returns Function that removes every handler it installed
 */
export function forwardSignals(
  child: Pick<ChildProcess, 'kill'>,
  signals: readonly NodeJS.Signals[],
  deps: SignalDeps = defaultSignalDeps,
): () => void {
  const installed = signals.map((signal) => {
    const handler = (): void => {
      child.kill(signal);
    };
    deps.registerSignal(signal, handler);
    return { signal, handler };
  });

  return () => {
    for (const { signal, handler } of installed) {
      deps.unregisterSignal(signal, handler);
    }
  };
}
