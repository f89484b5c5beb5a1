/**
 * Activation triggers — the two ways a player sets off the break.
 *
 * Triggers only decide whether an input counts; what happens next is the
 * `onFire` callback's business. They fire on every match, so the callback
 * must tolerate repeats (a BreakSequence does).
 */

import type * as THREE from "three";

/** Key used to force the break. */
export const DEFAULT_TRIGGER_KEY = "F2";

/** Tag of the actor whose contact breaks the vent. */
export const DEFAULT_PLAYER_TAG = "Player";

/** The part of a keyboard event a KeyTrigger reads. `KeyboardEvent` fits. */
export interface KeyInput {
  readonly code: string;
}

/** Fires when a designated key is pressed. */
export class KeyTrigger {
  private readonly code: string;
  private readonly onFire: () => void;

  constructor(onFire: () => void, code: string = DEFAULT_TRIGGER_KEY) {
    this.onFire = onFire;
    this.code = code;
  }

  /** @returns true if the key matched and the trigger fired. */
  handleKey(event: KeyInput): boolean {
    if (event.code !== this.code) {
      return false;
    }
    this.onFire();
    return true;
  }
}

/**
 * Fires when an object tagged as the player touches the vent.
 * The tag is read from `userData.tag`.
 */
export class ContactTrigger {
  private readonly tag: string;
  private readonly onFire: () => void;

  constructor(onFire: () => void, tag: string = DEFAULT_PLAYER_TAG) {
    this.onFire = onFire;
    this.tag = tag;
  }

  /** @returns true if the other object carried the tag and the trigger fired. */
  handleContact(other: THREE.Object3D): boolean {
    if (other.userData["tag"] !== this.tag) {
      return false;
    }
    this.onFire();
    return true;
  }
}
