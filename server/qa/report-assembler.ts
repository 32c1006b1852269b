import {
  VALUE_PLACEHOLDER,
  type KeyValueSection,
  type MetricRow,
  type MetricStatus,
  type MetricsSection,
  type PlotSpec,
  type Report,
} from '@shared/schema';

export const REPORT_TITLE = 'ACR QA Report';

/** Anything other than pass/fail/na (including empty) folds to na. */
export function normalizeStatus(status: string | null | undefined): MetricStatus {
  const normalized = (status ?? '').trim().toLowerCase();
  switch (normalized) {
    case 'pass':
    case 'fail':
    case 'na':
      return normalized;
    default:
      return 'na';
  }
}

export function metricRow(
  label: string,
  value: string | null,
  expected: string,
  status: string,
  notes = '',
): MetricRow {
  return {
    label,
    value: value ?? VALUE_PLACEHOLDER,
    expected,
    status: normalizeStatus(status),
    notes,
  };
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

export interface ReportInput {
  detectedCount: number;
  loadedCount: number;
  imageShape: { rows: number; columns: number };
  metrics: MetricRow[];
  plots: PlotSpec[];
}

export function assembleReport(input: ReportInput): Report {
  const summary: KeyValueSection = {
    kind: 'kv',
    name: 'Input Summary',
    rows: [
      { label: 'DICOM files detected', value: String(input.detectedCount) },
      { label: 'Slices read', value: String(input.loadedCount) },
      { label: 'Image shape', value: `${input.imageShape.rows} x ${input.imageShape.columns}` },
    ],
  };
  const results: MetricsSection = {
    kind: 'metrics',
    name: 'QA Results',
    rows: input.metrics.map((row) => ({ ...row })),
  };

  const report: Report = {
    title: REPORT_TITLE,
    status: 'ok',
    message: 'Report generated.',
    plots: input.plots.map((plot) => ({ ...plot })),
    sections: [summary, results],
  };
  return deepFreeze(report);
}

export function errorReport(message: string): Report {
  const report: Report = { title: REPORT_TITLE, status: 'error', message, plots: [], sections: [] };
  return deepFreeze(report);
}
