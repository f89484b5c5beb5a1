/**
 * Collaborators — the host capabilities a break sequence drives.
 *
 * The sequence never touches an engine directly. Orientation, audio and
 * player state all go through these interfaces; a Three.js host lives in
 * @breakaway/stage and tests use `RecordingHost`.
 */

/**
 * Read/write access to the rotating object's orientation, plus the math
 * needed to move between two orientations.
 *
 * `O` is opaque to the sequence (a quaternion, an angle, ...).
 */
export interface OrientationStore<O> {
  /** The object's orientation right now. */
  getCurrentOrientation(): O;
  /** Replace the object's orientation. */
  setOrientation(orientation: O): void;
  /**
   * Interpolate from `a` to `b`. `t` outside [0, 1] extrapolates
   * according to the implementation.
   */
  blend(a: O, b: O, t: number): O;
  /** `orientation` with its X (pitch) angle replaced, in degrees. */
  withPitch(orientation: O, degrees: number): O;
  /** An independent copy of `orientation`. */
  clone(orientation: O): O;
}

/** Fire-and-forget audio playback. */
export interface AudioSink {
  playOnce(clipId: string): void;
}

/** Player control states a sequence can request. */
export type PlayerState = "moving" | "interacting";

/** The state requested once the break completes. */
export const FREE_MOVEMENT: PlayerState = "moving";

/** Receives player-state transitions. */
export interface PlayerStateNotifier {
  setPlayerState(state: PlayerState): void;
}

/** Clip ids for the two cues. A missing id skips the cue. */
export interface SequenceSounds {
  /** Played when the object starts to give way, after the initial delay. */
  readonly creak?: string;
  /** Played once the object has settled after the snap. */
  readonly unload?: string;
}
