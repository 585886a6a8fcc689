import { describe, expect, it } from 'vitest';

import { emptyCells, solveGridLayout } from '../../../../src/domain/sprite-export/index.js';

describe('solveGridLayout', () => {
  it('lays ten frames out as four columns by three rows', () => {
    expect(solveGridLayout(10)).toEqual({ rows: 3, columns: 4 });
  });

  it('packs a square count without empty cells', () => {
    const layout = solveGridLayout(16);
    expect(layout).toEqual({ rows: 4, columns: 4 });
    expect(emptyCells(layout, 16)).toBe(0);
  });

  it('uses a single cell for one frame', () => {
    expect(solveGridLayout(1)).toEqual({ rows: 1, columns: 1 });
  });

  it('never leaves a full row empty', () => {
    for (let frameCount = 1; frameCount <= 200; frameCount += 1) {
      const layout = solveGridLayout(frameCount);
      expect(layout.rows * layout.columns).toBeGreaterThanOrEqual(frameCount);
      expect(emptyCells(layout, frameCount)).toBeLessThan(layout.columns);
    }
  });

  it('accepts a manual layout with enough cells', () => {
    expect(solveGridLayout(5, { rows: 1, columns: 8 })).toEqual({ rows: 1, columns: 8 });
  });

  it('rejects a manual layout that cannot hold every frame', () => {
    expect(() => solveGridLayout(5, { rows: 2, columns: 2 })).toThrowError(
      expect.objectContaining({
        failure: { kind: 'GridTooSmall', rows: 2, columns: 2, frameCount: 5 },
      }),
    );
  });

  it('rejects an empty frame set', () => {
    expect(() => solveGridLayout(0)).toThrowError(
      expect.objectContaining({ code: 'sprite-export.invalid-frame-count' }),
    );
  });
});
