/**
 * @breakaway/stage — Three.js bindings for break sequences.
 *
 * Animates an Object3D's quaternion, switches cameras and routes key and
 * contact input into a BreakSequence from @breakaway/core.
 */

// Classes
export { VentBreak } from "./vent-break.js";
export { ThreeOrientationStore, PITCH_EULER_ORDER } from "./three-orientation-store.js";
export { CameraRig } from "./camera-rig.js";
export {
  KeyTrigger,
  ContactTrigger,
  DEFAULT_TRIGGER_KEY,
  DEFAULT_PLAYER_TAG,
} from "./triggers.js";

// Types (re-export)
export type { VentBreakOptions } from "./vent-break.js";
export type { KeyInput } from "./triggers.js";
