import type { AnimationSystem } from '../contracts/animation-system.js';
import { ExportError } from '../errors/export-error.js';
import { hasVolume } from '../value-objects/geometry.js';
import type { TimeSample } from '../value-objects/time-sample.js';

/**
 * Queries the animation system for the subject's world bounds at each
 * requested frame. Scene time is restored before returning, on success
 * and on failure.
 */
export class BoundingBoxSampler {
  public constructor(private readonly animation: AnimationSystem) {}

  public async sample(frames: readonly number[]): Promise<TimeSample[]> {
    const originalTime = await this.animation.getTime();

    try {
      const samples: TimeSample[] = [];

      for (const frame of frames) {
        await this.animation.setTime(frame);
        const bounds = await this.animation.getWorldBounds(frame);

        // Frames where the subject is hidden contribute nothing to the framing box.
        if (bounds && hasVolume(bounds)) {
          samples.push({ frame, bounds });
        }
      }

      if (samples.length === 0) {
        throw new ExportError({ kind: 'NoAnimationData' });
      }

      return samples;
    } finally {
      await this.animation.setTime(originalTime);
    }
  }
}
