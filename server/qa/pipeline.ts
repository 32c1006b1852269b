import type { Report } from '@shared/schema';
import { extractArchive, type ExtractionSummary, type RawArchive } from './archive-ingestor';
import { findDicomFiles } from './dicom-detector';
import { loadDicomDatasets, type SkippedFile } from './dicom-loader';
import { dicomParserReader, type DicomReader } from './dicom-reader';
import { computeQaReport } from './metrics-engine';
import { errorReport } from './report-assembler';

export const NO_DICOM_MESSAGE =
  'No DICOM files found inside the ZIP. Please ensure the ZIP contains MRI DICOM files (it can be nested in folders).';
export const NO_PIXEL_DATA_MESSAGE = 'None of the detected DICOM files contain readable pixel data.';

export interface PipelineOptions {
  plotDir: string;
  plotUrlPrefix?: string;
  reader?: DicomReader;
}

export interface ArchiveRunOptions extends PipelineOptions {
  workDir: string;
}

export interface PipelineResult {
  report: Report;
  detected: string[];
  skippedFiles: SkippedFile[];
}

export interface ArchiveRunResult extends PipelineResult {
  extraction: ExtractionSummary;
}

/** Load the given DICOM paths and compute the QA report. */
export async function runPhantomQa(paths: readonly string[], options: PipelineOptions): Promise<PipelineResult> {
  const reader = options.reader ?? dicomParserReader;
  const { datasets, skipped } = loadDicomDatasets(paths, reader);

  const report = paths.length > 0 && datasets.length === 0
    ? errorReport(NO_PIXEL_DATA_MESSAGE)
    : await computeQaReport(datasets, {
        plotDir: options.plotDir,
        plotUrlPrefix: options.plotUrlPrefix,
        detectedCount: paths.length,
      });

  return { report, detected: [...paths], skippedFiles: skipped };
}

/** Detect DICOM files under an already populated working directory and run QA on them. */
export async function runPhantomQaOnDirectory(workDir: string, options: PipelineOptions): Promise<PipelineResult> {
  const detected = findDicomFiles(workDir, options.reader ?? dicomParserReader);
  if (detected.length === 0) {
    return { report: errorReport(NO_DICOM_MESSAGE), detected, skippedFiles: [] };
  }
  return runPhantomQa(detected, options);
}

/** Extract `archive` into `workDir`, then detect, load and measure. */
export async function processArchive(
  archive: RawArchive | string,
  options: ArchiveRunOptions,
): Promise<ArchiveRunResult> {
  const extraction = await extractArchive(archive, options.workDir);
  const result = await runPhantomQaOnDirectory(options.workDir, options);
  return { ...result, extraction };
}
