import type { Aabb, Vec3 } from './geometry.js';
import type { CameraAngle, FrameSize } from './export-options.js';

export interface CameraTransform {
  readonly position: Vec3;
  readonly target: Vec3;
  readonly up: Vec3;
  /** Orientation as a unit quaternion (camera looks down its local -Z). */
  readonly quaternion: readonly [number, number, number, number];
}

export type CameraProjection =
  | {
      readonly kind: 'orthographic';
      readonly left: number;
      readonly right: number;
      readonly top: number;
      readonly bottom: number;
      readonly near: number;
      readonly far: number;
    }
  | {
      readonly kind: 'perspective';
      readonly fovDegrees: number;
      readonly aspect: number;
      readonly near: number;
      readonly far: number;
    };

/**
 * What a renderer needs to position its camera.
 */
export interface CameraSetup {
  readonly transform: CameraTransform;
  readonly projection: CameraProjection;
}

export interface CameraPlan extends CameraSetup {
  readonly angle: CameraAngle;
  readonly padding: number;
  /** Applied as a horizontal flip at composition time, never by moving the camera. */
  readonly mirror: boolean;
  /** Union of every sampled box; the single framing box for the whole job. */
  readonly framingBox: Aabb;
  readonly frameSize: FrameSize;
  /** World-space span that fills the shorter frame dimension, padding included. */
  readonly framedExtent: number;
}
