import { clampRoi, columnProfile, fractionalRoi, roiStats, rowProfile } from '../roi';
import type { PixelArray } from '../dicom-reader';

function grid(rows: number, columns: number, fill: (r: number, c: number) => number): PixelArray {
  const data = new Float32Array(rows * columns);
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < columns; c++) data[r * columns + c] = fill(r, c);
  }
  return { rows, columns, data };
}

describe('ROI helpers', () => {
  it('should truncate fractional bounds to whole pixels', () => {
    expect(fractionalRoi(65, 33, [0.4, 0.6], [0, 0.1])).toEqual({
      rowStart: 26,
      rowEnd: 39,
      colStart: 0,
      colEnd: 3,
    });
  });

  it('should clamp bounds into the image', () => {
    expect(clampRoi({ rowStart: -4, rowEnd: 12, colStart: 2, colEnd: 50 }, 10, 8)).toEqual({
      rowStart: 0,
      rowEnd: 10,
      colStart: 2,
      colEnd: 8,
    });
  });

  it('should compute mean and population standard deviation', () => {
    const pixels = grid(2, 2, (r, c) => [2, 4, 4, 6][r * 2 + c]);

    expect(roiStats(pixels, { rowStart: 0, rowEnd: 2, colStart: 0, colEnd: 2 })).toEqual({
      count: 4,
      mean: 4,
      std: Math.sqrt(2),
    });
  });

  it('should only count pixels inside the half-open region', () => {
    const pixels = grid(4, 4, (r) => (r < 2 ? 10 : 30));

    expect(roiStats(pixels, { rowStart: 0, rowEnd: 2, colStart: 1, colEnd: 3 })).toEqual({
      count: 4,
      mean: 10,
      std: 0,
    });
  });

  it('should return null for an empty region', () => {
    const pixels = grid(3, 3, () => 1);

    expect(roiStats(pixels, fractionalRoi(3, 3, [0, 0.1], [0, 0.1]))).toBeNull();
    expect(roiStats(pixels, { rowStart: 5, rowEnd: 9, colStart: 0, colEnd: 3 })).toBeNull();
  });

  it('should extract row and column profiles', () => {
    const pixels = grid(3, 4, (r, c) => r * 10 + c);

    expect(rowProfile(pixels, 1)).toEqual([10, 11, 12, 13]);
    expect(columnProfile(pixels, 2)).toEqual([2, 12, 22]);
  });
});
