/**
 * @breakaway/core sequence module — public API exports.
 */

// Break sequence
export { BreakSequence, SETTLE_SECONDS } from "./break-sequence.js";
export type {
  BreakSequenceOptions,
  RotationState,
  SequencePhase,
} from "./break-sequence.js";

// Curve
export type { EasingFn, BreakCurveParams } from "./break-curve.js";
export {
  breakProgress,
  createBreakEasing,
  clamp01,
  RESISTANCE_CEILING,
  OSCILLATION_AMPLITUDE,
} from "./break-curve.js";

// Collaborators
export { FREE_MOVEMENT } from "./collaborators.js";
export type {
  AudioSink,
  OrientationStore,
  PlayerState,
  PlayerStateNotifier,
  SequenceSounds,
} from "./collaborators.js";

// Notifications
export { Notifier } from "./notifier.js";
export type { Listener, ListenerErrorHandler, Unsubscribe } from "./notifier.js";

// Clock & driver
export type { Clock, CancelHandle } from "./clock.js";
export { TimerClock, DEFAULT_FRAME_INTERVAL_MS } from "./timer-clock.js";
export { SequenceDriver } from "./driver.js";
export type { Steppable } from "./driver.js";

// Test utilities
export { TestClock } from "./test-clock.js";
export { RecordingHost } from "./recording-host.js";
export type { RecordedEvent, SequenceEvents } from "./recording-host.js";
