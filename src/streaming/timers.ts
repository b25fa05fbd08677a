/**
 * Timer service for single-shot delayed tasks
 *
 * @module streaming/timers
 */

/**
 * Handle to a scheduled task
 */
export interface TimerHandle {
  /** Cancel the task if it has not run yet */
  cancel(): void
}

/**
 * Schedules single-shot delayed tasks
 */
export interface TimerService {
  schedule(delayMs: number, task: () => void): TimerHandle
}

/**
 * Timer service backed by setTimeout
 */
export const systemTimers: TimerService = {
  schedule(delayMs: number, task: () => void): TimerHandle {
    const timeoutId = setTimeout(task, delayMs)
    return {
      cancel: () => clearTimeout(timeoutId)
    }
  }
}
