/**
 * Turn scheduler enumerations.
 *
 * @module shared/constants/SchedulerEnums
 */

/**
 * Scheduler lifecycle. The first player move switches IDLE to RUNNING.
 */
export enum SchedulerState {
  IDLE = "idle",
  RUNNING = "running",
}
