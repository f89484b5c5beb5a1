/**
 * Orientation store over a Three.js object's quaternion.
 *
 * Blends with spherical interpolation. The target pitch is applied in
 * Euler space, yaw first, then pitch, then roll (`"YXZ"`), so the object
 * tips about its own yawed hinge and keeps its yaw and roll.
 */

import * as THREE from "three";
import type { OrientationStore } from "@breakaway/core";

/** Euler order in which pitch is replaced: yaw, then pitch, then roll. */
export const PITCH_EULER_ORDER: THREE.EulerOrder = "YXZ";

/**
 * Reads and writes `object.quaternion`. Returned quaternions are copies;
 * mutating them never moves the object.
 */
export class ThreeOrientationStore implements OrientationStore<THREE.Quaternion> {
  private readonly object: THREE.Object3D;
  private readonly eulerOrder: THREE.EulerOrder;

  constructor(object: THREE.Object3D, eulerOrder: THREE.EulerOrder = PITCH_EULER_ORDER) {
    this.object = object;
    this.eulerOrder = eulerOrder;
  }

  getCurrentOrientation(): THREE.Quaternion {
    return this.object.quaternion.clone();
  }

  setOrientation(orientation: THREE.Quaternion): void {
    this.object.quaternion.copy(orientation);
  }

  blend(a: THREE.Quaternion, b: THREE.Quaternion, t: number): THREE.Quaternion {
    return new THREE.Quaternion().slerpQuaternions(a, b, t);
  }

  withPitch(orientation: THREE.Quaternion, degrees: number): THREE.Quaternion {
    const euler = new THREE.Euler().setFromQuaternion(orientation, this.eulerOrder);
    euler.x = THREE.MathUtils.degToRad(degrees);
    return new THREE.Quaternion().setFromEuler(euler);
  }

  clone(orientation: THREE.Quaternion): THREE.Quaternion {
    return orientation.clone();
  }
}
