/**
 * ROI-based image quality metrics for a phantom series.
 *
 * Measurements come from the first dataset with decodable pixels; slice
 * thickness and geometry fall back to the first dataset's tags when no
 * pixels decode. High-contrast resolution and low-contrast detectability are
 * not computed and always report "na".
 */

import type { MetricRow, PlotSpec, Report } from '@shared/schema';
import type { DicomDataset } from './dicom-loader';
import type { PixelArray } from './dicom-reader';
import { assembleReport, errorReport, metricRow } from './report-assembler';
import { columnProfile, fractionalRoi, roiStats, rowProfile, type RoiStats } from './roi';
import { writeLinePlot } from './svg-plot';

export const EPSILON = 1e-6;

export const THRESHOLDS = {
  snrMin: 20,
  piuMin: 85,
  ghostingMax: 0.025,
  spacingTolerance: 0.02,
} as const;

type Span = [number, number];

const CENTER: Span = [0.4, 0.6];
const NEAR: Span = [0.2, 0.35];
const FAR: Span = [0.65, 0.8];
const CORNER: Span = [0, 0.1];

export interface GeometryMeasurement {
  fovX: number;
  fovY: number;
  spacingX: number;
  spacingY: number;
  pass: boolean;
}

export interface Measurements {
  sliceThickness: number | null;
  geometry: GeometryMeasurement | null;
  snr: number | null;
  piu: number | null;
  ghosting: number | null;
}

export interface QaOptions {
  plotDir: string;
  /** Files classified as DICOM before loading; defaults to the dataset count. */
  detectedCount?: number;
  plotUrlPrefix?: string;
}

/** Coerce a tag value to a finite number, or null. */
export function safeFloat(value: string | number | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' && value.trim() === '') return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

export function selectRepresentative(datasets: readonly DicomDataset[]): DicomDataset | undefined {
  return datasets.find((dataset) => dataset.pixels !== undefined) ?? datasets[0];
}

function imageShape(dataset: DicomDataset): { rows: number; columns: number } {
  return {
    rows: dataset.tags.Rows ?? dataset.pixels?.rows ?? 0,
    columns: dataset.tags.Columns ?? dataset.pixels?.columns ?? 0,
  };
}

export function measureGeometry(dataset: DicomDataset): GeometryMeasurement | null {
  const { rows, columns } = imageShape(dataset);
  const spacing = dataset.tags.PixelSpacing;
  const spacingY = safeFloat(spacing?.[0]);
  const spacingX = safeFloat(spacing?.[1]);
  if (!spacingX || !spacingY || !rows || !columns) return null;

  return {
    fovX: spacingX * columns,
    fovY: spacingY * rows,
    spacingX,
    spacingY,
    pass: Math.abs(spacingX - spacingY) <= Math.max(spacingX, spacingY) * THRESHOLDS.spacingTolerance,
  };
}

function measureRois(pixels: PixelArray): Pick<Measurements, 'snr' | 'piu' | 'ghosting'> {
  const { rows, columns } = pixels;
  const center = roiStats(pixels, fractionalRoi(rows, columns, CENTER, CENTER));
  if (!center) return { snr: null, piu: null, ghosting: null };

  const snr = center.mean / (center.std + EPSILON);

  const quadrants: Array<[Span, Span]> = [
    [NEAR, NEAR],
    [NEAR, FAR],
    [FAR, NEAR],
    [FAR, FAR],
  ];
  const means = quadrants
    .map(([rowSpan, colSpan]) => roiStats(pixels, fractionalRoi(rows, columns, rowSpan, colSpan)))
    .filter((stats): stats is RoiStats => stats !== null)
    .map((stats) => stats.mean);
  let piu: number | null = null;
  if (means.length === quadrants.length) {
    const max = Math.max(...means);
    const min = Math.min(...means);
    piu = 100 * (1 - (max - min) / (max + min + EPSILON));
  }

  const corner = roiStats(pixels, fractionalRoi(rows, columns, CORNER, CORNER));
  const ghosting = corner ? corner.mean / (center.mean + EPSILON) : null;

  return { snr, piu, ghosting };
}

export function measure(dataset: DicomDataset): Measurements {
  const rois = dataset.pixels
    ? measureRois(dataset.pixels)
    : { snr: null, piu: null, ghosting: null };

  return {
    sliceThickness: safeFloat(dataset.tags.SliceThickness),
    geometry: measureGeometry(dataset),
    ...rois,
  };
}

async function renderProfilePlots(pixels: PixelArray, options: QaOptions): Promise<PlotSpec[]> {
  const { rows, columns } = pixels;
  const urlPrefix = options.plotUrlPrefix ?? '/plots';
  const toSpec = (title: string, fileName: string): PlotSpec => ({ title, fileName, url: `${urlPrefix}/${fileName}` });

  const columnAxis = Array.from({ length: columns }, (_, i) => i);
  const rampName = await writeLinePlot(options.plotDir, 'ramp', {
    title: 'MTF / Ramp Analysis',
    x: columnAxis,
    series: [
      { label: 'Top Ramp', values: rowProfile(pixels, Math.floor(rows * 0.45)) },
      { label: 'Bottom Ramp', values: rowProfile(pixels, Math.floor(rows * 0.55)) },
    ],
  });

  const rowAxis = Array.from({ length: rows }, (_, i) => i);
  const sliceName = await writeLinePlot(options.plotDir, 'slice', {
    title: 'Slice Thickness Profile',
    x: rowAxis,
    series: [{ label: 'Center Line', values: columnProfile(pixels, Math.floor(columns / 2)) }],
  });

  return [toSpec('MTF / ramp analysis', rampName), toSpec('Slice thickness', sliceName)];
}

const fixed = (value: number | null, digits: number, suffix = ''): string | null =>
  value === null ? null : `${value.toFixed(digits)}${suffix}`;

const verdict = (value: number | null, pass: (v: number) => boolean): string =>
  value === null ? 'na' : pass(value) ? 'pass' : 'fail';

export function buildMetricRows(measurements: Measurements, plots: readonly PlotSpec[]): MetricRow[] {
  const { sliceThickness, geometry, snr, piu, ghosting } = measurements;

  return [
    metricRow('Slice thickness', fixed(sliceThickness, 2, ' mm'), 'DICOM tag', sliceThickness === null ? 'na' : 'pass'),
    metricRow(
      'Geometric accuracy',
      geometry
        ? `FOV ~ ${geometry.fovX.toFixed(1)} mm x ${geometry.fovY.toFixed(1)} mm ` +
            `(pixel ${geometry.spacingX.toFixed(3)} x ${geometry.spacingY.toFixed(3)} mm)`
        : null,
      'Pixel spacing check',
      geometry ? (geometry.pass ? 'pass' : 'fail') : 'na',
    ),
    metricRow('High-contrast resolution', null, 'Not calculated', 'na', 'Algorithm can be added'),
    metricRow('Low-contrast detectability', null, 'Not calculated', 'na', 'Algorithm can be added'),
    metricRow(
      'Intensity uniformity (PIU)',
      fixed(piu, 2, '%'),
      `>= ${THRESHOLDS.piuMin}%`,
      verdict(piu, (v) => v >= THRESHOLDS.piuMin),
    ),
    metricRow(
      'Ghosting',
      fixed(ghosting, 4),
      `<= ${THRESHOLDS.ghostingMax}`,
      verdict(ghosting, (v) => v <= THRESHOLDS.ghostingMax),
    ),
    metricRow('SNR', fixed(snr, 2), `>= ${THRESHOLDS.snrMin}`, verdict(snr, (v) => v >= THRESHOLDS.snrMin)),
    metricRow(
      'MTF / ramp analysis',
      plots.length ? 'Plot generated' : null,
      'See plot',
      plots.length ? 'pass' : 'na',
    ),
  ];
}

export async function computeQaReport(datasets: readonly DicomDataset[], options: QaOptions): Promise<Report> {
  const representative = selectRepresentative(datasets);
  if (!representative) return errorReport('No DICOM datasets provided.');

  const measurements = measure(representative);
  const plots = representative.pixels ? await renderProfilePlots(representative.pixels, options) : [];

  return assembleReport({
    detectedCount: options.detectedCount ?? datasets.length,
    loadedCount: datasets.length,
    imageShape: imageShape(representative),
    metrics: buildMetricRows(measurements, plots),
    plots,
  });
}
