/**
 * Clock abstraction for the sequence driver.
 *
 * Lets a break sequence run against real timers in Node.js or against
 * manually advanced time in tests.
 */

/** Handle returned by scheduling operations. Call `cancel()` to unschedule. */
export interface CancelHandle {
  cancel(): void;
}

/**
 * Time source and frame scheduler.
 *
 * The driver never calls `performance.now()` or `setTimeout` directly;
 * it always goes through a Clock, so timing stays deterministic under test.
 */
export interface Clock {
  /** Current time in milliseconds (monotonic). */
  now(): number;

  /**
   * Request a callback on the next frame.
   *
   * @param callback - Receives the current timestamp in ms.
   * @returns A handle to cancel the scheduled callback.
   */
  requestFrame(callback: (timestamp: number) => void): CancelHandle;
}
