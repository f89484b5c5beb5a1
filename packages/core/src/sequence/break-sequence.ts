/**
 * BreakSequence — the timed run that breaks an object loose.
 *
 * One instance drives one run:
 *
 * ```
 * idle → delaying → animating → snapped → finishing → done
 * ```
 *
 * There is no internal timer. The host calls `step(deltaTime)` once per
 * frame and every wait is an elapsed-time comparison, so a run can be
 * replayed exactly from a list of frame deltas.
 */

import { parseSequenceConfig } from "@breakaway/schema";
import type { SequenceConfig } from "@breakaway/schema";
import { clamp01, createBreakEasing } from "./break-curve.js";
import type { EasingFn } from "./break-curve.js";
import { FREE_MOVEMENT } from "./collaborators.js";
import type {
  AudioSink,
  OrientationStore,
  PlayerStateNotifier,
  SequenceSounds,
} from "./collaborators.js";
import { Notifier } from "./notifier.js";
import type { Listener, ListenerErrorHandler, Unsubscribe } from "./notifier.js";

/** Wait after the snap before the unload cue and completion, in seconds. */
export const SETTLE_SECONDS = 0.6;

/** Lifecycle phase of a break sequence. Transitions only move forward. */
export type SequencePhase =
  | "idle"
  | "delaying"
  | "animating"
  | "snapped"
  | "finishing"
  | "done";

/** Start and end orientation of the run. */
export interface RotationState<O> {
  readonly initial: O;
  readonly target: O;
}

/** Options for creating a BreakSequence. */
export interface BreakSequenceOptions<O> {
  /** Tunables. Validated again on construction. */
  readonly config: SequenceConfig;
  /** The rotating object. */
  readonly orientation: OrientationStore<O>;
  /** Audio output. Without one, cues are skipped. */
  readonly audio?: AudioSink;
  /** Clip ids for the cues. */
  readonly sounds?: SequenceSounds;
  /** Receives the free-movement request on completion. */
  readonly player?: PlayerStateNotifier;
}

/**
 * A one-shot break sequence.
 *
 * @example
 * ```ts
 * const sequence = new BreakSequence({ config, orientation, audio, player });
 * sequence.onCompleted(() => showExit());
 *
 * sequence.activate();
 * // once per frame:
 * sequence.step(deltaSeconds);
 * ```
 */
export class BreakSequence<O> {
  readonly config: SequenceConfig;

  private readonly orientation: OrientationStore<O>;
  private readonly audio: AudioSink | undefined;
  private readonly sounds: SequenceSounds;
  private readonly player: PlayerStateNotifier | undefined;
  private readonly easing: EasingFn;
  private readonly started = new Notifier<void>(warnListenerFailure("started"));
  private readonly completed = new Notifier<void>(warnListenerFailure("completed"));

  private currentPhase: SequencePhase = "idle";
  private elapsedSeconds = 0;
  private captured: O | undefined;
  private rotation: RotationState<O> | null = null;
  private wasInterrupted = false;

  /** @throws SequenceConfigError when the config is invalid. */
  constructor(options: BreakSequenceOptions<O>) {
    this.config = parseSequenceConfig(options.config);
    this.orientation = options.orientation;
    this.audio = options.audio;
    this.sounds = options.sounds ?? {};
    this.player = options.player;
    this.easing = createBreakEasing(this.config);
  }

  /** Current phase. */
  get phase(): SequencePhase {
    return this.currentPhase;
  }

  /** Whether `activate()` has started the run. Never goes back to false. */
  get triggered(): boolean {
    return this.currentPhase !== "idle";
  }

  /** Whether the run has ended, normally or by interruption. */
  get done(): boolean {
    return this.currentPhase === "done";
  }

  /** Whether the run was stopped by `interrupt()`. */
  get interrupted(): boolean {
    return this.wasInterrupted;
  }

  /** Seconds accumulated in the current timed phase. */
  get elapsed(): number {
    return this.elapsedSeconds;
  }

  /** Copy of the orientation captured by `prime()` or the first activation. */
  get initialRotation(): O | undefined {
    return this.captured === undefined ? undefined : this.orientation.clone(this.captured);
  }

  /** Copy of the orientation the run ends on. Undefined until activated. */
  get targetRotation(): O | undefined {
    return this.rotation ? this.orientation.clone(this.rotation.target) : undefined;
  }

  /**
   * Subscribe to the start of the run. Fires inside `activate()`, before the
   * delay. A listener that throws is logged and does not stop the run.
   */
  onStarted(listener: Listener<void>): Unsubscribe {
    return this.started.on(listener);
  }

  /**
   * Subscribe to the end of a completed run. Never fires after `interrupt()`.
   * A listener that throws is logged; the run still reaches `done`.
   */
  onCompleted(listener: Listener<void>): Unsubscribe {
    return this.completed.on(listener);
  }

  /**
   * Capture the object's current orientation as the start of the run.
   * Only the first capture counts.
   */
  prime(): void {
    if (this.captured === undefined) {
      this.captured = this.orientation.getCurrentOrientation();
    }
  }

  /**
   * Start the run. Only the first call does anything.
   *
   * @returns true if this call started the run.
   */
  activate(): boolean {
    if (this.currentPhase !== "idle") {
      return false;
    }

    this.prime();
    const initial = this.captured ?? this.orientation.getCurrentOrientation();
    this.rotation = {
      initial,
      target: this.orientation.withPitch(initial, this.config.targetAngleX),
    };
    this.elapsedSeconds = 0;
    this.currentPhase = "delaying";
    this.started.emit();
    return true;
  }

  /**
   * Advance the run by one frame.
   *
   * @param deltaTime - Seconds since the previous frame. Negative or
   *   non-finite values count as zero.
   */
  step(deltaTime: number): void {
    const dt = Number.isFinite(deltaTime) && deltaTime > 0 ? deltaTime : 0;

    switch (this.currentPhase) {
      case "delaying":
        this.advanceDelay(dt);
        break;
      case "animating":
        this.advanceAnimation(dt);
        break;
      case "snapped":
        this.advanceSettle(dt);
        break;
      case "finishing":
        this.finish();
        break;
      default:
        break;
    }
  }

  /**
   * Stop a running sequence where it is. The object keeps its current
   * orientation; no further cues, completion or player-state change fire.
   * Once finishing has begun the run is complete and cannot be interrupted.
   *
   * @returns true if a running sequence was stopped.
   */
  interrupt(): boolean {
    if (
      this.currentPhase === "idle" ||
      this.currentPhase === "finishing" ||
      this.currentPhase === "done"
    ) {
      return false;
    }
    this.wasInterrupted = true;
    this.currentPhase = "done";
    return true;
  }

  // ---------------------------------------------------------------------------
  // Phases
  // ---------------------------------------------------------------------------

  private advanceDelay(dt: number): void {
    this.elapsedSeconds += dt;
    if (this.elapsedSeconds < this.config.initialDelaySeconds) {
      return;
    }
    this.playCue(this.sounds.creak);
    this.elapsedSeconds = 0;
    this.currentPhase = "animating";
  }

  private advanceAnimation(dt: number): void {
    const rotation = this.rotation;
    if (!rotation) {
      return;
    }

    this.elapsedSeconds += dt;
    const duration = this.config.durationSeconds;

    if (this.elapsedSeconds >= duration) {
      // Land exactly on the target, whatever the curve returned last.
      this.orientation.setOrientation(rotation.target);
      this.elapsedSeconds = 0;
      this.currentPhase = "snapped";
      return;
    }

    const normalized = clamp01(this.elapsedSeconds / duration);
    const t = this.easing(normalized);
    this.orientation.setOrientation(this.orientation.blend(rotation.initial, rotation.target, t));
  }

  private advanceSettle(dt: number): void {
    this.elapsedSeconds += dt;
    if (this.elapsedSeconds < SETTLE_SECONDS) {
      return;
    }
    this.playCue(this.sounds.unload);
    this.currentPhase = "finishing";
    this.finish();
  }

  private finish(): void {
    this.completed.emit();
    this.player?.setPlayerState(FREE_MOVEMENT);
    this.currentPhase = "done";
  }

  private playCue(clipId: string | undefined): void {
    if (clipId === undefined || !this.audio) {
      return;
    }
    try {
      this.audio.playOnce(clipId);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      console.warn(`[BreakSequence] Could not play "${clipId}": ${reason}`);
    }
  }
}

function warnListenerFailure(event: string): ListenerErrorHandler {
  return (err) => {
    const reason = err instanceof Error ? err.message : String(err);
    console.warn(`[BreakSequence] A ${event} listener failed: ${reason}`);
  };
}
