import * as THREE from 'three';

import { ValidationError } from '../../../shared/errors/validation.error.js';
import { ExportError } from '../errors/export-error.js';
import type { CameraPlan, CameraProjection } from '../value-objects/camera-plan.js';
import type { CameraAngle, FrameSize, ProjectionOptions } from '../value-objects/export-options.js';
import {
  aabbCenter,
  aabbCorners,
  aabbSize,
  hasVolume,
  unionAll,
  type Aabb,
  type Vec3,
} from '../value-objects/geometry.js';
import type { TimeSample } from '../value-objects/time-sample.js';

/** Camera distance for orthographic framing, in bounding radii. */
const ORTHO_DISTANCE_FACTOR = 2.5;
const CLIP_MARGIN = 1.25;
const PARALLEL_EPSILON = 1e-6;

const WORLD_UP = new THREE.Vector3(0, 0, 1);
const FALLBACK_UP = new THREE.Vector3(0, 1, 0);

export interface FramingOptions {
  readonly angle: CameraAngle;
  readonly padding: number;
  readonly mirror: boolean;
  readonly frameSize: FrameSize;
  readonly projection: ProjectionOptions;
}

/**
 * Offset from the subject toward the camera for each preset angle (Z-up world).
 */
const PRESET_DIRECTIONS: Record<Exclude<CameraAngle['kind'], 'custom'>, readonly [number, number, number]> = {
  front: [0, -1, 0],
  isometric: [1, -1, 1],
  side: [1, 0, 0],
};

export function resolveViewDirection(angle: CameraAngle): THREE.Vector3 {
  const [x, y, z] = angle.kind === 'custom' ? angle.direction : PRESET_DIRECTIONS[angle.kind];
  const direction = new THREE.Vector3(x, y, z);

  if (!Number.isFinite(direction.x) || !Number.isFinite(direction.y) || !Number.isFinite(direction.z)) {
    throw new ExportError({ kind: 'InvalidCameraAngle' });
  }
  if (direction.lengthSq() <= PARALLEL_EPSILON * PARALLEL_EPSILON) {
    throw new ExportError({ kind: 'InvalidCameraAngle' });
  }

  return direction.normalize();
}

/**
 * Rejects framing options that can never produce a plan. Runs before the
 * scene is touched.
 */
export function assertFramingOptions(options: FramingOptions): void {
  const { padding, projection } = options;
  if (!Number.isFinite(padding) || padding < 0 || padding > 1) {
    throw new ExportError({ kind: 'InvalidPadding', padding });
  }

  resolveViewDirection(options.angle);

  if (
    projection.kind === 'perspective' &&
    (!Number.isFinite(projection.fovDegrees) || projection.fovDegrees <= 0 || projection.fovDegrees >= 180)
  ) {
    throw new ValidationError('sprite-export.invalid-projection', {
      fovDegrees: projection.fovDegrees,
    });
  }
}

export function unionOfSamples(samples: readonly TimeSample[]): Aabb | null {
  return unionAll(samples.map((sample) => sample.bounds));
}

function toVec3(vector: THREE.Vector3): Vec3 {
  return { x: vector.x, y: vector.y, z: vector.z };
}

/**
 * Computes the one camera pose and projection used for every frame of the
 * job. The framing box is the union of all samples, so the camera never
 * moves between frames.
 */
export function planCamera(samples: readonly TimeSample[], options: FramingOptions): CameraPlan {
  assertFramingOptions(options);

  const framingBox = unionOfSamples(samples);
  if (!framingBox) {
    throw new ExportError({ kind: 'NoAnimationData' });
  }
  if (!hasVolume(framingBox)) {
    throw new ExportError({ kind: 'DegenerateBounds' });
  }

  const direction = resolveViewDirection(options.angle);
  const up = Math.abs(direction.dot(WORLD_UP)) > 1 - PARALLEL_EPSILON ? FALLBACK_UP : WORLD_UP;

  const centerVec = aabbCenter(framingBox);
  const center = new THREE.Vector3(centerVec.x, centerVec.y, centerVec.z);
  const basis = new THREE.Matrix4().lookAt(center.clone().add(direction), center, up);
  const right = new THREE.Vector3().setFromMatrixColumn(basis, 0);
  const screenUp = new THREE.Vector3().setFromMatrixColumn(basis, 1);

  let minRight = Infinity;
  let maxRight = -Infinity;
  let minUp = Infinity;
  let maxUp = -Infinity;
  let depthHalf = 0;
  const offset = new THREE.Vector3();

  for (const corner of aabbCorners(framingBox)) {
    offset.set(corner.x, corner.y, corner.z).sub(center);
    const alongRight = offset.dot(right);
    const alongUp = offset.dot(screenUp);
    minRight = Math.min(minRight, alongRight);
    maxRight = Math.max(maxRight, alongRight);
    minUp = Math.min(minUp, alongUp);
    maxUp = Math.max(maxUp, alongUp);
    depthHalf = Math.max(depthHalf, Math.abs(offset.dot(direction)));
  }

  const extent = Math.max(maxRight - minRight, maxUp - minUp);
  const framedExtent = extent * (1 + options.padding);
  const { width, height } = options.frameSize;
  const aspect = width / height;

  const size = aabbSize(framingBox);
  const radius = Math.hypot(size.x, size.y, size.z) / 2;

  let distance: number;
  let projection: CameraProjection;

  if (options.projection.kind === 'orthographic') {
    // The padded extent spans the shorter frame dimension exactly.
    const halfWidth = width <= height ? framedExtent / 2 : (framedExtent / 2) * aspect;
    const halfHeight = width <= height ? framedExtent / 2 / aspect : framedExtent / 2;
    distance = radius * ORTHO_DISTANCE_FACTOR;
    projection = {
      kind: 'orthographic',
      left: -halfWidth,
      right: halfWidth,
      top: halfHeight,
      bottom: -halfHeight,
      near: distance - radius * CLIP_MARGIN,
      far: distance + radius * CLIP_MARGIN,
    };
  } else {
    const verticalFov = THREE.MathUtils.degToRad(options.projection.fovDegrees);
    const horizontalFov = 2 * Math.atan(Math.tan(verticalFov / 2) * aspect);
    const shorterFov = width <= height ? horizontalFov : verticalFov;
    // Nearest face of the box fills the shorter dimension; everything behind it is smaller.
    const faceDistance = framedExtent / 2 / Math.tan(shorterFov / 2);
    distance = faceDistance + depthHalf;
    projection = {
      kind: 'perspective',
      fovDegrees: options.projection.fovDegrees,
      aspect,
      near: faceDistance / 2,
      far: (distance + depthHalf) * CLIP_MARGIN,
    };
  }

  const position = center.clone().addScaledVector(direction, distance);
  const orientation = new THREE.Matrix4().lookAt(position, center, up);
  const quaternion = new THREE.Quaternion().setFromRotationMatrix(orientation);

  const plan: CameraPlan = {
    angle: options.angle,
    padding: options.padding,
    mirror: options.mirror,
    frameSize: { width, height },
    framingBox,
    framedExtent,
    transform: {
      position: toVec3(position),
      target: toVec3(center),
      up: toVec3(up),
      quaternion: [quaternion.x, quaternion.y, quaternion.z, quaternion.w],
    },
    projection,
  };

  return Object.freeze(plan);
}
