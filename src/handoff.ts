/**
 * Handoff
 * Layer: core
 *
 * Provided ports:
 *   - handoff.run
 *
 * Transfers control to the container's primary command and carries its
 * exit status back out.
 */

export { handoff } from './handoff/run';
export type { HandoffResult, HandoffOptions } from './handoff/run';
export { exitCodeFor, spawnErrorExitCode } from './handoff/exit-status';
export { forwardSignals, defaultSignalDeps, relayedSignals } from './handoff/signals';
export type { SignalDeps } from './handoff/signals';
