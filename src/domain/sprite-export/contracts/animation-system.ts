import type { Aabb } from '../value-objects/geometry.js';

export type Awaitable<T> = T | Promise<T>;

/**
 * Narrow view of the host's animation evaluator. The evaluator is stateful
 * and not reentrant: calls are made strictly one at a time.
 */
export interface AnimationSystem {
  /** Current animation frame of the scene. */
  getTime(): Awaitable<number>;
  /** Advance (or rewind) the scene to `frame` and evaluate it. */
  setTime(frame: number): Awaitable<void>;
  /**
   * World-space bounds of every visible animated mesh at `frame`, or `null`
   * when the subject has no geometry.
   */
  getWorldBounds(frame: number): Awaitable<Aabb | null>;
}
