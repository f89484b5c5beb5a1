/**
 * TestClock — deterministic clock for sequence tests.
 *
 * Time moves only when `advance(ms)` is called; every scheduled frame
 * callback then fires synchronously with the new timestamp.
 */

import type { CancelHandle, Clock } from "./clock.js";

/**
 * A clock that advances time only when explicitly told to.
 *
 * @example
 * ```ts
 * const clock = new TestClock();
 * const driver = new SequenceDriver(clock, sequence);
 *
 * sequence.activate();
 * driver.start();
 * clock.advance(0);   // first frame, steps with dt = 0
 * clock.advance(250); // steps with dt = 0.25
 * ```
 */
export class TestClock implements Clock {
  private currentTime = 0;
  private nextId = 1;
  private scheduled = new Map<number, (timestamp: number) => void>();

  /** Current time in milliseconds. Starts at 0. */
  now(): number {
    return this.currentTime;
  }

  /** Schedule a callback for the next frame. */
  requestFrame(callback: (timestamp: number) => void): CancelHandle {
    const id = this.nextId++;
    this.scheduled.set(id, callback);
    return {
      cancel: () => {
        this.scheduled.delete(id);
      },
    };
  }

  /**
   * Advance time by the given number of milliseconds.
   *
   * Callbacks scheduled while this runs fire on the next `advance()`.
   */
  advance(ms: number): void {
    this.currentTime += ms;
    const callbacks = new Map(this.scheduled);
    this.scheduled.clear();
    for (const callback of callbacks.values()) {
      callback(this.currentTime);
    }
  }

  /** Number of currently pending frame callbacks. */
  get pendingCount(): number {
    return this.scheduled.size;
  }
}
