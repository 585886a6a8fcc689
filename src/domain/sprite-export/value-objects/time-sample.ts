import type { Aabb } from './geometry.js';

export interface TimeSample {
  /** Animation frame the bounds were taken at. */
  readonly frame: number;
  readonly bounds: Aabb;
}
