import type { FrameSize } from './export-options.js';

export const RGBA_CHANNELS = 4;

/**
 * Straight (non-premultiplied) RGBA8 raster, rows top to bottom.
 */
export interface FrameBuffer {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array;
}

export function createFrameBuffer(size: FrameSize): FrameBuffer {
  return {
    width: size.width,
    height: size.height,
    data: new Uint8Array(size.width * size.height * RGBA_CHANNELS),
  };
}

export function hasRgbaLayout(frame: FrameBuffer): boolean {
  return (
    Number.isInteger(frame.width) &&
    Number.isInteger(frame.height) &&
    frame.width > 0 &&
    frame.height > 0 &&
    frame.data.length === frame.width * frame.height * RGBA_CHANNELS
  );
}

export function matchesSize(frame: FrameBuffer, size: FrameSize): boolean {
  return frame.width === size.width && frame.height === size.height;
}

/**
 * Mirrors the frame about its vertical center axis.
 */
export function flipHorizontally(frame: FrameBuffer): FrameBuffer {
  const { width, height, data } = frame;
  const flipped = new Uint8Array(data.length);
  const rowBytes = width * RGBA_CHANNELS;

  for (let y = 0; y < height; y += 1) {
    const rowStart = y * rowBytes;
    for (let x = 0; x < width; x += 1) {
      const source = rowStart + x * RGBA_CHANNELS;
      const target = rowStart + (width - 1 - x) * RGBA_CHANNELS;
      flipped[target] = data[source] ?? 0;
      flipped[target + 1] = data[source + 1] ?? 0;
      flipped[target + 2] = data[source + 2] ?? 0;
      flipped[target + 3] = data[source + 3] ?? 0;
    }
  }

  return { width, height, data: flipped };
}

/**
 * Copies `frame` into `canvas` at the given pixel offset, replacing
 * destination pixels verbatim (no blending, alpha untouched).
 */
export function blit(canvas: FrameBuffer, frame: FrameBuffer, offsetX: number, offsetY: number): void {
  const rowBytes = frame.width * RGBA_CHANNELS;

  for (let y = 0; y < frame.height; y += 1) {
    const sourceStart = y * rowBytes;
    const targetStart = ((offsetY + y) * canvas.width + offsetX) * RGBA_CHANNELS;
    canvas.data.set(frame.data.subarray(sourceStart, sourceStart + rowBytes), targetStart);
  }
}
