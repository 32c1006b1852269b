import { dicomParserReader, type DicomReader, type DicomTags, type PixelArray } from './dicom-reader';

export interface DicomDataset {
  path: string;
  tags: DicomTags;
  /** Absent when the pixel data is present but cannot be decoded (e.g. compressed). */
  pixels?: PixelArray;
}

export interface SkippedFile {
  path: string;
  reason: string;
}

export interface LoadResult {
  datasets: DicomDataset[];
  skipped: SkippedFile[];
}

/**
 * Fully decode each path. Files that fail to parse or carry no PixelData
 * element are left out; the order of `paths` is preserved.
 */
export function loadDicomDatasets(paths: Iterable<string>, reader: DicomReader = dicomParserReader): LoadResult {
  const datasets: DicomDataset[] = [];
  const skipped: SkippedFile[] = [];

  for (const filePath of paths) {
    const result = reader.readDataset(filePath);
    if (!result.ok) {
      skipped.push({ path: filePath, reason: result.error });
      continue;
    }
    if (!result.value.hasPixelData) {
      skipped.push({ path: filePath, reason: 'no pixel data' });
      continue;
    }
    datasets.push({ path: filePath, tags: result.value.tags, pixels: result.value.pixels });
  }

  return { datasets, skipped };
}
