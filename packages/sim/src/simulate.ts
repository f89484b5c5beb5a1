/**
 * Headless break simulation.
 *
 * Runs a VentBreak on a bare Object3D at a fixed frame rate and records
 * when each checkpoint fires. Useful for tuning a config without a renderer.
 */

import * as THREE from "three";
import { DEFAULT_SEQUENCE_CONFIG } from "@breakaway/schema";
import type { SequenceConfig } from "@breakaway/schema";
import { PITCH_EULER_ORDER, VentBreak } from "@breakaway/stage";

/** Checkpoints recorded on the timeline. */
export type TimelineEvent = "started" | "sound" | "snapped" | "completed" | "playerState";

/** One checkpoint and the simulated time it fired at. */
export interface TimelineEntry {
  /** Seconds since activation. */
  readonly time: number;
  readonly event: TimelineEvent;
  /** Clip id for sounds, state name for player-state changes. */
  readonly detail?: string;
}

/** Options for a simulation run. */
export interface SimulationOptions {
  /** Tunables. Defaults to the original vent. */
  readonly config?: SequenceConfig;
  /** Frames per second. Default: 60. */
  readonly fps?: number;
  /** Give up after this much simulated time. Default: 60. */
  readonly maxSeconds?: number;
}

/** Outcome of a simulation run. */
export interface SimulationResult {
  readonly entries: readonly TimelineEntry[];
  /** Number of frames stepped. */
  readonly frames: number;
  /** X rotation of the cover after the last frame, in degrees. */
  readonly finalPitchDegrees: number;
  /** Whether the sequence reached done within `maxSeconds`. */
  readonly done: boolean;
}

/** Clip ids the simulation plays. */
export const SIMULATION_SOUNDS = { creak: "creak", unload: "unload" } as const;

/**
 * Simulate one full break.
 *
 * @throws RangeError when `fps` or `maxSeconds` is not a positive number.
 * @throws SequenceConfigError when the config is invalid.
 */
export function simulateBreak(options: SimulationOptions = {}): SimulationResult {
  const fps = options.fps ?? 60;
  const maxSeconds = options.maxSeconds ?? 60;
  if (!Number.isFinite(fps) || fps <= 0) {
    throw new RangeError(`fps must be a positive number, got ${fps}`);
  }
  if (!Number.isFinite(maxSeconds) || maxSeconds <= 0) {
    throw new RangeError(`maxSeconds must be a positive number, got ${maxSeconds}`);
  }

  const entries: TimelineEntry[] = [];
  let time = 0;

  const cover = new THREE.Object3D();
  const vent = new VentBreak({
    object: cover,
    config: options.config ?? DEFAULT_SEQUENCE_CONFIG,
    sounds: SIMULATION_SOUNDS,
    audio: {
      playOnce: (clipId) => {
        entries.push({ time, event: "sound", detail: clipId });
      },
    },
    player: {
      setPlayerState: (state) => {
        entries.push({ time, event: "playerState", detail: state });
      },
    },
  });
  const { sequence } = vent;
  sequence.onStarted(() => {
    entries.push({ time, event: "started" });
  });
  sequence.onCompleted(() => {
    entries.push({ time, event: "completed" });
  });

  vent.start();
  vent.debugTrigger();

  const dt = 1 / fps;
  let frames = 0;
  while (!sequence.done && time < maxSeconds) {
    time += dt;
    frames++;
    const before = sequence.phase;
    vent.update(dt);
    if (before === "animating" && sequence.phase === "snapped") {
      entries.push({ time, event: "snapped" });
    }
  }

  const euler = new THREE.Euler().setFromQuaternion(cover.quaternion, PITCH_EULER_ORDER);
  return {
    entries,
    frames,
    finalPitchDegrees: THREE.MathUtils.radToDeg(euler.x),
    done: sequence.done,
  };
}

/** Render a timeline as one `[  1.234s] event detail` line per entry. */
export function formatTimeline(entries: readonly TimelineEntry[]): string {
  return entries
    .map((entry) => {
      const stamp = `${entry.time.toFixed(3).padStart(7)}s`;
      const detail = entry.detail ? ` ${entry.detail}` : "";
      return `[${stamp}] ${entry.event}${detail}`;
    })
    .join("\n");
}
