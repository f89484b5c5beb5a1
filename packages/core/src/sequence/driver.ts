/**
 * SequenceDriver — the frame loop that feeds a break sequence.
 *
 * Turns clock frames into `step(deltaTime)` calls, converting the clock's
 * milliseconds into seconds, and stops scheduling once the sequence is done.
 */

import type { CancelHandle, Clock } from "./clock.js";

/** The part of a sequence the driver needs. */
export interface Steppable {
  step(deltaTime: number): void;
  readonly done: boolean;
}

/**
 * Runs a sequence from a clock, one step per frame.
 *
 * The first frame steps with a delta of 0 and sets the reference
 * timestamp; each later frame steps with the time since the previous one.
 */
export class SequenceDriver {
  private readonly clock: Clock;
  private readonly target: Steppable;
  private frameHandle: CancelHandle | null = null;
  private lastTimestamp: number | null = null;

  constructor(clock: Clock, target: Steppable) {
    this.clock = clock;
    this.target = target;
  }

  /** Whether a frame is currently scheduled. */
  get running(): boolean {
    return this.frameHandle !== null;
  }

  /** Start the frame loop. No-op while already running or once the target is done. */
  start(): void {
    if (this.frameHandle || this.target.done) {
      return;
    }
    this.lastTimestamp = null;
    this.scheduleFrame();
  }

  /** Cancel the pending frame. The target keeps its state. */
  stop(): void {
    if (this.frameHandle) {
      this.frameHandle.cancel();
      this.frameHandle = null;
    }
  }

  private scheduleFrame(): void {
    this.frameHandle = this.clock.requestFrame((timestamp) => {
      this.tick(timestamp);
    });
  }

  private tick(timestamp: number): void {
    const deltaMs = this.lastTimestamp === null ? 0 : timestamp - this.lastTimestamp;
    this.lastTimestamp = timestamp;
    // The frame has fired; a throwing step leaves the driver stopped, not wedged.
    this.frameHandle = null;
    this.target.step(deltaMs / 1000);

    if (!this.target.done) {
      this.scheduleFrame();
    }
  }
}
