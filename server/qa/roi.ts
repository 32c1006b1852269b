import type { PixelArray } from './dicom-reader';

/** Half-open rectangle in pixel coordinates: rows [rowStart, rowEnd), columns [colStart, colEnd). */
export interface Roi {
  rowStart: number;
  rowEnd: number;
  colStart: number;
  colEnd: number;
}

export interface RoiStats {
  count: number;
  mean: number;
  std: number;
}

const clamp = (value: number, max: number) => Math.max(0, Math.min(max, value));

export function clampRoi(roi: Roi, rows: number, columns: number): Roi {
  return {
    rowStart: clamp(roi.rowStart, rows),
    rowEnd: clamp(roi.rowEnd, rows),
    colStart: clamp(roi.colStart, columns),
    colEnd: clamp(roi.colEnd, columns),
  };
}

/**
 * ROI spanning the given fractions of each axis. Bounds are truncated to
 * whole pixels the same way for every metric.
 */
export function fractionalRoi(
  rows: number,
  columns: number,
  [rowFrom, rowTo]: [number, number],
  [colFrom, colTo]: [number, number],
): Roi {
  return clampRoi(
    {
      rowStart: Math.floor(rows * rowFrom),
      rowEnd: Math.floor(rows * rowTo),
      colStart: Math.floor(columns * colFrom),
      colEnd: Math.floor(columns * colTo),
    },
    rows,
    columns,
  );
}

/** Mean and population standard deviation inside `roi`; null when the clamped region is empty. */
export function roiStats(pixels: PixelArray, roi: Roi): RoiStats | null {
  const { rowStart, rowEnd, colStart, colEnd } = clampRoi(roi, pixels.rows, pixels.columns);
  const count = Math.max(0, rowEnd - rowStart) * Math.max(0, colEnd - colStart);
  if (count === 0) return null;

  let sum = 0;
  for (let r = rowStart; r < rowEnd; r++) {
    const base = r * pixels.columns;
    for (let c = colStart; c < colEnd; c++) sum += pixels.data[base + c];
  }
  const mean = sum / count;

  let squares = 0;
  for (let r = rowStart; r < rowEnd; r++) {
    const base = r * pixels.columns;
    for (let c = colStart; c < colEnd; c++) {
      const delta = pixels.data[base + c] - mean;
      squares += delta * delta;
    }
  }

  return { count, mean, std: Math.sqrt(squares / count) };
}

export function rowProfile(pixels: PixelArray, row: number): number[] {
  const start = row * pixels.columns;
  return Array.from(pixels.data.subarray(start, start + pixels.columns));
}

export function columnProfile(pixels: PixelArray, column: number): number[] {
  const profile: number[] = [];
  for (let r = 0; r < pixels.rows; r++) profile.push(pixels.data[r * pixels.columns + column]);
  return profile;
}
