import type { FrameSize } from './export-options.js';

export interface GridLayout {
  readonly rows: number;
  readonly columns: number;
}

export interface GridCell {
  readonly row: number;
  readonly column: number;
}

export function gridCanvasSize(layout: GridLayout, frame: FrameSize): FrameSize {
  return {
    width: layout.columns * frame.width,
    height: layout.rows * frame.height,
  };
}

/** Row-major placement: left to right, top to bottom. */
export function cellForIndex(layout: GridLayout, index: number): GridCell {
  return {
    row: Math.floor(index / layout.columns),
    column: index % layout.columns,
  };
}
