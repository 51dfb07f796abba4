/**
 * Log Follower
 * Layer: core
 *
 * Provided ports:
 *   - follower.spawn
 *   - follower.stop
 *
 * Makes scheduler output visible in the container log stream.
 * Nothing here is ever fatal to startup.
 */

export { spawnFollower, FOLLOWER_COMMAND, FOLLOWER_ARGS } from './follower/spawn';
export type { SpawnOutcome, SpawnResult, SpawnError } from './follower/spawn';
export { stopFollower } from './follower/stop';
export type { StopOutcome, StopResult, StopError } from './follower/stop';
