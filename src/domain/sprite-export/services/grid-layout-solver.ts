import { ValidationError } from '../../../shared/errors/validation.error.js';
import { ExportError } from '../errors/export-error.js';
import type { GridLayout } from '../value-objects/grid-layout.js';

/**
 * Chooses the sheet grid for `frameCount` frames. A manual layout is only
 * validated; otherwise `columns = ceil(sqrt(n))`, `rows = ceil(n / columns)`,
 * which leaves at most `columns - 1` empty trailing cells and keeps the
 * grid as square as that waste allows.
 */
export function solveGridLayout(frameCount: number, manual?: GridLayout): GridLayout {
  if (!Number.isInteger(frameCount) || frameCount < 1) {
    throw new ValidationError('sprite-export.invalid-frame-count', { frameCount });
  }

  if (manual) {
    const { rows, columns } = manual;
    const valid = Number.isInteger(rows) && Number.isInteger(columns) && rows >= 1 && columns >= 1;
    if (!valid || rows * columns < frameCount) {
      throw new ExportError({ kind: 'GridTooSmall', rows, columns, frameCount });
    }
    return { rows, columns };
  }

  const columns = Math.ceil(Math.sqrt(frameCount));
  const rows = Math.ceil(frameCount / columns);
  return { rows, columns };
}

export function emptyCells(layout: GridLayout, frameCount: number): number {
  return layout.rows * layout.columns - frameCount;
}
