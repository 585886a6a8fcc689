import type { FrameRange, SamplingStride } from '../value-objects/export-options.js';

const AUTO_STRIDE_SAMPLES = 20;

export function rangeLength(range: FrameRange): number {
  return range.end - range.start + 1;
}

/**
 * Animation frames to capture, in output order. Without a limit this is
 * every frame of the range; with one, frames are stepped evenly from the
 * range start.
 */
export function planCaptureFrames(range: FrameRange, frameLimit?: number): number[] {
  const total = rangeLength(range);
  const count = frameLimit === undefined ? total : Math.min(frameLimit, total);
  const step = Math.max(1, Math.floor(total / count));

  return Array.from({ length: count }, (_, index) => range.start + index * step);
}

export function resolveSamplingStride(range: FrameRange, stride: SamplingStride): number {
  if (stride === 'auto') {
    return Math.max(1, Math.floor((range.end - range.start) / AUTO_STRIDE_SAMPLES));
  }
  return Math.max(1, Math.floor(stride));
}

/**
 * Frames to sample bounds at. The range end is always included so a
 * coarse stride never misses the final pose.
 */
export function planSampleFrames(range: FrameRange, stride: SamplingStride): number[] {
  const step = resolveSamplingStride(range, stride);
  const frames: number[] = [];

  for (let frame = range.start; frame <= range.end; frame += step) {
    frames.push(frame);
  }

  if (frames[frames.length - 1] !== range.end) {
    frames.push(range.end);
  }

  return frames;
}
