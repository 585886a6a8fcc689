import { describe, expect, it } from 'vitest';

import {
  composeSheet,
  flipHorizontally,
  SheetCanvas,
  solveGridLayout,
  type FrameBuffer,
} from '../../../../src/domain/sprite-export/index.js';

import { pixelAt, solidFrame } from '../../../support/fake-scene.js';

const size = { width: 2, height: 2 };

function gradientFrame(seed: number): FrameBuffer {
  const frame = solidFrame(2, 2, [0, 0, 0, 0]);
  for (let index = 0; index < 4; index += 1) {
    frame.data.set([seed, index, 10 * index, 50 + index], index * 4);
  }
  return frame;
}

describe('composeSheet', () => {
  it('returns a single frame unchanged on a one-cell grid', () => {
    const frame = gradientFrame(9);
    const sheet = composeSheet([frame], solveGridLayout(1), { frameSize: size, mirror: false });

    expect(sheet.width).toBe(2);
    expect(sheet.height).toBe(2);
    expect(Array.from(sheet.data)).toEqual(Array.from(frame.data));
  });

  it('places frames row-major and leaves trailing cells transparent', () => {
    const frames = [1, 2, 3].map((seed) => solidFrame(2, 2, [seed, 0, 0, 255]));
    const layout = solveGridLayout(3);
    const sheet = composeSheet(frames, layout, { frameSize: size, mirror: false });

    expect(layout).toEqual({ rows: 2, columns: 2 });
    expect(sheet.width).toBe(4);
    expect(sheet.height).toBe(4);
    expect(pixelAt(sheet, 0, 0)).toEqual([1, 0, 0, 255]);
    expect(pixelAt(sheet, 3, 1)).toEqual([2, 0, 0, 255]);
    expect(pixelAt(sheet, 1, 3)).toEqual([3, 0, 0, 255]);
    expect(pixelAt(sheet, 2, 2)).toEqual([0, 0, 0, 0]);
    expect(pixelAt(sheet, 3, 3)).toEqual([0, 0, 0, 0]);
  });

  it('copies alpha verbatim without blending', () => {
    const translucent = solidFrame(2, 2, [200, 100, 50, 17]);
    const sheet = composeSheet([translucent], solveGridLayout(1), { frameSize: size, mirror: false });

    expect(pixelAt(sheet, 1, 1)).toEqual([200, 100, 50, 17]);
  });

  it('mirrors each frame about its own vertical axis', () => {
    const frames = [gradientFrame(1), gradientFrame(2)];
    const layout = solveGridLayout(2);
    const mirrored = composeSheet(frames, layout, { frameSize: size, mirror: true });
    const expected = composeSheet(frames.map(flipHorizontally), layout, { frameSize: size, mirror: false });

    expect(Array.from(mirrored.data)).toEqual(Array.from(expected.data));
    // Left pixel of the first cell is the right pixel of the source frame.
    expect(pixelAt(mirrored, 0, 0)).toEqual([1, 1, 10, 51]);
  });

  it('rejects frames that do not match the job frame size', () => {
    const canvas = new SheetCanvas(solveGridLayout(1), { frameSize: size, frameCount: 1, mirror: false });

    expect(() => canvas.place(0, solidFrame(3, 2, [0, 0, 0, 255]))).toThrowError(
      expect.objectContaining({ code: 'sprite-export.frame-size-mismatch' }),
    );
  });

  it('refuses to finish before every frame is placed', () => {
    const canvas = new SheetCanvas(solveGridLayout(2), { frameSize: size, frameCount: 2, mirror: false });
    canvas.place(1, gradientFrame(4));

    expect(canvas.placedCount).toBe(1);
    expect(() => canvas.finish()).toThrowError(
      expect.objectContaining({ code: 'sprite-export.incomplete-sheet' }),
    );
  });

  it('rejects a grid with fewer cells than frames', () => {
    expect(
      () => new SheetCanvas({ rows: 1, columns: 1 }, { frameSize: size, frameCount: 2, mirror: false }),
    ).toThrowError(expect.objectContaining({ failure: { kind: 'GridTooSmall', rows: 1, columns: 1, frameCount: 2 } }));
  });
});
