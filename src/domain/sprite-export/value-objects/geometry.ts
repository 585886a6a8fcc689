export interface Vec3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/**
 * World-space axis-aligned bounding box.
 */
export interface Aabb {
  readonly min: Vec3;
  readonly max: Vec3;
}

export function isFiniteVec3(value: Vec3): boolean {
  return Number.isFinite(value.x) && Number.isFinite(value.y) && Number.isFinite(value.z);
}

export function aabbSize(box: Aabb): Vec3 {
  return {
    x: box.max.x - box.min.x,
    y: box.max.y - box.min.y,
    z: box.max.z - box.min.z,
  };
}

export function aabbCenter(box: Aabb): Vec3 {
  return {
    x: (box.min.x + box.max.x) / 2,
    y: (box.min.y + box.max.y) / 2,
    z: (box.min.z + box.max.z) / 2,
  };
}

/**
 * Volume of the box; inverted or non-finite boxes count as zero.
 */
export function aabbVolume(box: Aabb): number {
  if (!isFiniteVec3(box.min) || !isFiniteVec3(box.max)) {
    return 0;
  }
  const size = aabbSize(box);
  if (size.x <= 0 || size.y <= 0 || size.z <= 0) {
    return 0;
  }
  return size.x * size.y * size.z;
}

export function hasVolume(box: Aabb): boolean {
  return aabbVolume(box) > 0;
}

export function unionAabb(a: Aabb, b: Aabb): Aabb {
  return {
    min: {
      x: Math.min(a.min.x, b.min.x),
      y: Math.min(a.min.y, b.min.y),
      z: Math.min(a.min.z, b.min.z),
    },
    max: {
      x: Math.max(a.max.x, b.max.x),
      y: Math.max(a.max.y, b.max.y),
      z: Math.max(a.max.z, b.max.z),
    },
  };
}

export function unionAll(boxes: readonly Aabb[]): Aabb | null {
  const [first, ...rest] = boxes;
  if (!first) {
    return null;
  }
  return rest.reduce(unionAabb, first);
}

export function aabbCorners(box: Aabb): Vec3[] {
  const corners: Vec3[] = [];
  for (const x of [box.min.x, box.max.x]) {
    for (const y of [box.min.y, box.max.y]) {
      for (const z of [box.min.z, box.max.z]) {
        corners.push({ x, y, z });
      }
    }
  }
  return corners;
}
