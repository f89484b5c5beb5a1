/**
 * TimerClock — real-time clock for Node.js hosts.
 *
 * Uses `performance.now()` for timestamps and `setTimeout` for frames.
 * This is the production clock outside a browser; see `TestClock` for tests.
 */

import type { CancelHandle, Clock } from "./clock.js";

/** Default frame interval: 60 frames per second. */
export const DEFAULT_FRAME_INTERVAL_MS = 1000 / 60;

/**
 * A clock backed by `performance.now()` and `setTimeout`.
 *
 * @example
 * ```ts
 * const driver = new SequenceDriver(new TimerClock(), sequence);
 * driver.start(); // steps roughly every 16.7ms until the sequence is done
 * ```
 */
export class TimerClock implements Clock {
  private readonly frameIntervalMs: number;

  constructor(frameIntervalMs: number = DEFAULT_FRAME_INTERVAL_MS) {
    this.frameIntervalMs = frameIntervalMs;
  }

  /** Current monotonic time in milliseconds. */
  now(): number {
    return performance.now();
  }

  /** Schedule a callback one frame interval from now. */
  requestFrame(callback: (timestamp: number) => void): CancelHandle {
    const timer = setTimeout(() => {
      callback(this.now());
    }, this.frameIntervalMs);
    return { cancel: () => clearTimeout(timer) };
  }
}
