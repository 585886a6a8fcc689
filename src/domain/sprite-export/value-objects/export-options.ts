export type OutputFormat = 'png' | 'webp';

/**
 * `sheet` packs every frame into one image; `frames` writes one file per frame.
 */
export type OutputMode = 'sheet' | 'frames';

export type CameraAngle =
  | { readonly kind: 'front' }
  | { readonly kind: 'isometric' }
  | { readonly kind: 'side' }
  | { readonly kind: 'custom'; readonly direction: readonly [number, number, number] };

export type ProjectionOptions =
  | { readonly kind: 'orthographic' }
  | { readonly kind: 'perspective'; readonly fovDegrees: number };

export type SamplingStride = number | 'auto';

export interface FrameRange {
  /** First animation frame, inclusive. */
  readonly start: number;
  /** Last animation frame, inclusive. */
  readonly end: number;
}

export interface FrameSize {
  readonly width: number;
  readonly height: number;
}

export const MIN_FRAME_DIMENSION = 64;
export const MAX_FRAME_DIMENSION = 2048;

export function fileExtensionFor(format: OutputFormat): string {
  return format === 'png' ? 'png' : 'webp';
}
