/**
 * DICOM loading tests
 *
 * Full decode of detected files into datasets with tag values and a float
 * pixel array. Files that cannot be used for QA are dropped, never fatal.
 */

import fs from 'fs';
import { loadDicomDatasets } from '../dicom-loader';
import { dicomParserReader, guessTransferSyntax } from '../dicom-reader';
import { JPEG_BASELINE, MR_IMAGE_STORAGE, buildDicom, makeTempDir, writeFixture } from './fixtures/dicom-fixtures';

describe('DICOM loading', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('readDataset', () => {
    it('should read geometry tags and pixels from a Part 10 file', () => {
      const file = writeFixture(
        dir,
        'IM0001',
        buildDicom({ rows: 4, columns: 3, pixel: (r, c) => r * 10 + c, pixelSpacing: [0.9, 0.9], sliceThickness: 5 }),
      );

      const result = dicomParserReader.readDataset(file);
      if (!result.ok) throw new Error(result.error);

      const { tags, pixels, hasPixelData } = result.value;
      expect(hasPixelData).toBe(true);
      expect(tags.Rows).toBe(4);
      expect(tags.Columns).toBe(3);
      expect(tags.SliceThickness).toBe('5');
      expect(tags.PixelSpacing).toEqual(['0.9', '0.9']);
      expect(tags.Modality).toBe('MR');
      expect(tags.SOPClassUID).toBe(MR_IMAGE_STORAGE);
      expect(pixels?.rows).toBe(4);
      expect(pixels?.columns).toBe(3);
      expect(Array.from(pixels?.data ?? [])).toEqual([0, 1, 2, 10, 11, 12, 20, 21, 22, 30, 31, 32]);
    });

    it('should decode signed samples', () => {
      const file = writeFixture(
        dir,
        'signed',
        buildDicom({ rows: 1, columns: 3, signed: true, pixel: (_r, c) => [-5, 0, 7][c] }),
      );

      const result = dicomParserReader.readDataset(file);
      if (!result.ok) throw new Error(result.error);

      expect(Array.from(result.value.pixels?.data ?? [])).toEqual([-5, 0, 7]);
    });

    it.each([
      { bitsAllocated: 8, signed: false, samples: [0, 128, 255] },
      { bitsAllocated: 8, signed: true, samples: [-128, -1, 127] },
      { bitsAllocated: 32, signed: false, samples: [0, 70000, 4000000000] },
      { bitsAllocated: 32, signed: true, samples: [-100000, 0, 2000000000] },
    ] as const)('should decode $bitsAllocated-bit samples (signed: $signed)', ({ bitsAllocated, signed, samples }) => {
      const file = writeFixture(
        dir,
        `bits-${bitsAllocated}-${signed}`,
        buildDicom({ rows: 1, columns: 3, bitsAllocated, signed, pixel: (_r, c) => samples[c] }),
      );

      const result = dicomParserReader.readDataset(file);
      if (!result.ok) throw new Error(result.error);

      expect(result.value.tags.BitsAllocated).toBe(bitsAllocated);
      expect(Array.from(result.value.pixels?.data ?? [])).toEqual([...samples]);
    });

    it('should decode explicit VR big endian files', () => {
      const file = writeFixture(
        dir,
        'big-endian',
        buildDicom({ layout: 'part10-big-endian', rows: 2, columns: 2, pixel: (r, c) => r * 300 + c }),
      );

      const result = dicomParserReader.readDataset(file);
      if (!result.ok) throw new Error(result.error);

      expect(result.value.tags.TransferSyntaxUID).toBe('1.2.840.10008.1.2.2');
      expect(result.value.tags.Rows).toBe(2);
      expect(result.value.tags.Columns).toBe(2);
      expect(Array.from(result.value.pixels?.data ?? [])).toEqual([0, 1, 300, 301]);
    });

    it('should decode signed big endian samples', () => {
      const file = writeFixture(
        dir,
        'big-endian-signed',
        buildDicom({ layout: 'part10-big-endian', rows: 1, columns: 2, signed: true, pixel: (_r, c) => [-2, 513][c] }),
      );

      const result = dicomParserReader.readDataset(file);
      if (!result.ok) throw new Error(result.error);

      expect(Array.from(result.value.pixels?.data ?? [])).toEqual([-2, 513]);
    });

    it('should leave pixels undecoded for a compressed transfer syntax', () => {
      const file = writeFixture(dir, 'jpeg', buildDicom({ transferSyntaxUid: JPEG_BASELINE, rows: 2, columns: 2 }));

      const result = dicomParserReader.readDataset(file);
      if (!result.ok) throw new Error(result.error);

      expect(result.value.tags.TransferSyntaxUID).toBe(JPEG_BASELINE);
      expect(result.value.hasPixelData).toBe(true);
      expect(result.value.pixels).toBeUndefined();
    });

    it('should read files written without the Part 10 preamble', () => {
      const file = writeFixture(
        dir,
        'raw',
        buildDicom({ layout: 'raw-implicit', rows: 2, columns: 2, pixel: () => 42 }),
      );

      const result = dicomParserReader.readDataset(file);
      if (!result.ok) throw new Error(result.error);

      expect(result.value.tags.Rows).toBe(2);
      expect(Array.from(result.value.pixels?.data ?? [])).toEqual([42, 42, 42, 42]);
    });

    it('should report a failure for non-DICOM content instead of throwing', () => {
      const bytes = Buffer.alloc(200, 0x41);
      bytes.write('DICM', 128, 'latin1');
      const file = writeFixture(dir, 'broken.dcm', bytes);

      expect(dicomParserReader.readDataset(file).ok).toBe(false);
    });
  });

  describe('guessTransferSyntax', () => {
    it('should recognise explicit VR by the VR characters after the first tag', () => {
      const explicit = Buffer.from([0x08, 0x00, 0x16, 0x00, 0x55, 0x49, 0x1a, 0x00]);
      const implicit = Buffer.from([0x08, 0x00, 0x16, 0x00, 0x1a, 0x00, 0x00, 0x00]);

      expect(guessTransferSyntax(explicit)).toBe('1.2.840.10008.1.2.1');
      expect(guessTransferSyntax(implicit)).toBe('1.2.840.10008.1.2');
    });
  });

  describe('loadDicomDatasets', () => {
    it('should keep walk order and drop files without pixel data', () => {
      const first = writeFixture(dir, 'a', buildDicom({ sliceThickness: 3 }));
      const noPixels = writeFixture(dir, 'b', buildDicom({ includePixelData: false }));
      const text = writeFixture(dir, 'c', 'plain text');
      const last = writeFixture(dir, 'd', buildDicom({ layout: 'raw-implicit', sliceThickness: 4 }));

      const { datasets, skipped } = loadDicomDatasets([first, noPixels, text, last]);

      expect(datasets.map((d) => d.path)).toEqual([first, last]);
      expect(datasets.map((d) => d.tags.SliceThickness)).toEqual(['3', '4']);
      expect(skipped.map((s) => s.path)).toEqual([noPixels, text]);
      expect(skipped[0].reason).toBe('no pixel data');
    });

    it('should keep a compressed file as a dataset without pixels', () => {
      const file = writeFixture(dir, 'jpeg', buildDicom({ transferSyntaxUid: JPEG_BASELINE }));

      const { datasets, skipped } = loadDicomDatasets([file]);

      expect(skipped).toEqual([]);
      expect(datasets).toHaveLength(1);
      expect(datasets[0].tags.Rows).toBe(64);
      expect(datasets[0].pixels).toBeUndefined();
    });

    it('should return nothing for an empty path list', () => {
      expect(loadDicomDatasets([])).toEqual({ datasets: [], skipped: [] });
    });
  });
});
