/**
 * @breakaway/core — break curve and tick-driven break sequence.
 *
 * Engine-agnostic. Runs in browser and Node.js environments.
 */

export {
  BreakSequence,
  SETTLE_SECONDS,
  breakProgress,
  createBreakEasing,
  clamp01,
  RESISTANCE_CEILING,
  OSCILLATION_AMPLITUDE,
  FREE_MOVEMENT,
  Notifier,
  TimerClock,
  DEFAULT_FRAME_INTERVAL_MS,
  SequenceDriver,
  TestClock,
  RecordingHost,
} from "./sequence/index.js";

export type {
  BreakSequenceOptions,
  RotationState,
  SequencePhase,
  EasingFn,
  BreakCurveParams,
  AudioSink,
  OrientationStore,
  PlayerState,
  PlayerStateNotifier,
  SequenceSounds,
  Listener,
  ListenerErrorHandler,
  Unsubscribe,
  Clock,
  CancelHandle,
  Steppable,
  RecordedEvent,
  SequenceEvents,
} from "./sequence/index.js";
