/**
 * VentBreak — a break sequence wired to a Three.js scene.
 *
 * Owns the sequence, the camera rig and both triggers. The host forwards
 * its lifecycle to it: `start()` once the scene is ready, `update(dt)`
 * every frame, and input/contact events as they arrive.
 */

import type * as THREE from "three";
import { BreakSequence } from "@breakaway/core";
import type {
  AudioSink,
  PlayerStateNotifier,
  SequenceSounds,
} from "@breakaway/core";
import { DEFAULT_SEQUENCE_CONFIG } from "@breakaway/schema";
import type { SequenceConfig } from "@breakaway/schema";
import { CameraRig } from "./camera-rig.js";
import { ThreeOrientationStore } from "./three-orientation-store.js";
import { ContactTrigger, KeyTrigger } from "./triggers.js";
import type { KeyInput } from "./triggers.js";

/** Options for creating a VentBreak. */
export interface VentBreakOptions {
  /** The vent cover. Its quaternion is animated. */
  readonly object: THREE.Object3D;
  /** Tunables. Defaults to the original vent. */
  readonly config?: SequenceConfig;
  /** Main and end cameras. Without them no camera switch happens. */
  readonly cameras?: { readonly main: THREE.Camera; readonly end: THREE.Camera };
  readonly audio?: AudioSink;
  readonly sounds?: SequenceSounds;
  readonly player?: PlayerStateNotifier;
  /** `KeyboardEvent.code` that forces the break. Default: "F2". */
  readonly triggerKey?: string;
  /** `userData.tag` of the actor whose contact breaks the vent. Default: "Player". */
  readonly playerTag?: string;
}

/**
 * @example
 * ```ts
 * const vent = new VentBreak({ object: ventMesh, cameras: { main, end }, audio, player });
 * vent.start();
 * window.addEventListener("keydown", (e) => vent.handleKey(e));
 *
 * renderer.setAnimationLoop(() => {
 *   vent.update(clock.getDelta());
 *   renderer.render(scene, vent.rig?.active ?? main);
 * });
 * ```
 */
export class VentBreak {
  readonly sequence: BreakSequence<THREE.Quaternion>;
  readonly rig: CameraRig | null;

  private readonly keyTrigger: KeyTrigger;
  private readonly contactTrigger: ContactTrigger;

  /** @throws SequenceConfigError when the config is invalid. */
  constructor(options: VentBreakOptions) {
    this.sequence = new BreakSequence({
      config: options.config ?? DEFAULT_SEQUENCE_CONFIG,
      orientation: new ThreeOrientationStore(options.object),
      audio: options.audio,
      sounds: options.sounds,
      player: options.player,
    });
    this.rig = options.cameras ? new CameraRig(options.cameras.main, options.cameras.end) : null;

    const fire = (): void => {
      this.rig?.switchToEnd();
      this.sequence.activate();
    };
    this.keyTrigger = new KeyTrigger(fire, options.triggerKey);
    this.contactTrigger = new ContactTrigger(fire, options.playerTag);
  }

  /** Show the main camera and capture the vent's resting orientation. */
  start(): void {
    this.rig?.reset();
    this.sequence.prime();
  }

  /** Advance by one frame of `deltaTime` seconds. */
  update(deltaTime: number): void {
    this.sequence.step(deltaTime);
  }

  /** Forward a key press. @returns true if it was the trigger key. */
  handleKey(event: KeyInput): boolean {
    return this.keyTrigger.handleKey(event);
  }

  /** Forward a contact. @returns true if the other object was the player. */
  handleContact(other: THREE.Object3D): boolean {
    return this.contactTrigger.handleContact(other);
  }

  /** Start the break without switching cameras. @returns true if it started the run. */
  debugTrigger(): boolean {
    return this.sequence.activate();
  }
}
