import { ValidationError } from '../../../shared/errors/validation.error.js';
import { ExportError } from '../errors/export-error.js';
import type { FrameSize } from '../value-objects/export-options.js';
import {
  blit,
  createFrameBuffer,
  flipHorizontally,
  hasRgbaLayout,
  matchesSize,
  type FrameBuffer,
} from '../value-objects/frame-buffer.js';
import { cellForIndex, gridCanvasSize, type GridLayout } from '../value-objects/grid-layout.js';

export interface SheetOptions {
  readonly frameSize: FrameSize;
  readonly frameCount: number;
  readonly mirror: boolean;
}

/**
 * Mirrors the frame when requested; otherwise returns it untouched.
 */
export function orientFrame(frame: FrameBuffer, mirror: boolean): FrameBuffer {
  return mirror ? flipHorizontally(frame) : frame;
}

/**
 * Transparent canvas that frames are placed into one at a time, so only a
 * single frame needs to be resident alongside the sheet.
 */
export class SheetCanvas {
  private readonly canvas: FrameBuffer;

  private readonly placed = new Set<number>();

  public constructor(
    public readonly layout: GridLayout,
    private readonly options: SheetOptions,
  ) {
    const { rows, columns } = layout;
    if (!Number.isInteger(options.frameCount) || options.frameCount < 1) {
      throw new ValidationError('sprite-export.invalid-frame-count', { frameCount: options.frameCount });
    }
    if (rows * columns < options.frameCount) {
      throw new ExportError({ kind: 'GridTooSmall', rows, columns, frameCount: options.frameCount });
    }
    this.canvas = createFrameBuffer(gridCanvasSize(layout, options.frameSize));
  }

  public place(index: number, frame: FrameBuffer): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.options.frameCount) {
      throw new ValidationError('sprite-export.frame-index-out-of-range', {
        index,
        frameCount: this.options.frameCount,
      });
    }
    if (!hasRgbaLayout(frame) || !matchesSize(frame, this.options.frameSize)) {
      throw new ValidationError('sprite-export.frame-size-mismatch', {
        index,
        expected: this.options.frameSize,
        actual: { width: frame.width, height: frame.height },
      });
    }

    const { row, column } = cellForIndex(this.layout, index);
    const { width, height } = this.options.frameSize;
    blit(this.canvas, orientFrame(frame, this.options.mirror), column * width, row * height);
    this.placed.add(index);
  }

  public get placedCount(): number {
    return this.placed.size;
  }

  /**
   * Returns the finished sheet. Every frame index must have been placed.
   */
  public finish(): FrameBuffer {
    if (this.placed.size !== this.options.frameCount) {
      throw new ValidationError('sprite-export.incomplete-sheet', {
        placed: this.placed.size,
        frameCount: this.options.frameCount,
      });
    }
    return this.canvas;
  }
}

export function composeSheet(
  frames: readonly FrameBuffer[],
  layout: GridLayout,
  options: Omit<SheetOptions, 'frameCount'>,
): FrameBuffer {
  const sheet = new SheetCanvas(layout, { ...options, frameCount: frames.length });
  frames.forEach((frame, index) => sheet.place(index, frame));
  return sheet.finish();
}
