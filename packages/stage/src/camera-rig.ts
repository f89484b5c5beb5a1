/**
 * Two-camera rig: the gameplay camera and the camera that frames the break.
 */

import type * as THREE from "three";

/**
 * Tracks which of two cameras the renderer should use.
 * The main camera is active until `switchToEnd()`.
 */
export class CameraRig<C extends THREE.Camera = THREE.Camera> {
  readonly main: C;
  readonly end: C;
  private current: C;

  constructor(main: C, end: C) {
    this.main = main;
    this.end = end;
    this.current = main;
  }

  /** The camera to render with. */
  get active(): C {
    return this.current;
  }

  get isEndActive(): boolean {
    return this.current === this.end;
  }

  /** Make the main camera active again. */
  reset(): void {
    this.current = this.main;
  }

  switchToEnd(): void {
    this.current = this.end;
  }
}
