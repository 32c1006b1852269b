/**
 * SVG line plots for the QA report.
 *
 * Output is a standalone document with explicit width/height/viewBox so it
 * can be served as a static asset and referenced by URL from the report.
 */

import fs from 'fs/promises';
import path from 'path';
import { nanoid } from 'nanoid';
import { PlotInputError } from '../errors';

export const CANVAS = { width: 900, height: 420 } as const;
export const MARGIN = { left: 70, right: 20, top: 45, bottom: 55 } as const;
export const PALETTE = ['#2563eb', '#ef4444', '#10b981', '#a855f7'] as const;

const FONT = 'Segoe UI, Arial';
const GRID_LINES = 6;

export interface PlotSeries {
  label: string;
  values: readonly number[];
}

export interface LinePlot {
  title: string;
  x: readonly number[];
  series: readonly PlotSeries[];
}

export interface AxisRange {
  min: number;
  max: number;
}

const ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export const escapeXml = (text: string): string => text.replace(/[&<>"']/g, (ch) => ESCAPES[ch]);

/** Data range of `values`; a flat range is widened by one unit. */
export function axisRange(values: Iterable<number>): AxisRange {
  let min = Infinity;
  let max = -Infinity;
  for (const value of values) {
    if (value < min) min = value;
    if (value > max) max = value;
  }
  if (max === min) max = min + 1;
  return { min, max };
}

function validate(plot: LinePlot): void {
  if (plot.x.length === 0) throw new PlotInputError(`Plot "${plot.title}" has no x values`);
  if (plot.series.length === 0) throw new PlotInputError(`Plot "${plot.title}" has no series`);
  for (const series of plot.series) {
    if (series.values.length !== plot.x.length) {
      throw new PlotInputError(
        `Series "${series.label}" has ${series.values.length} values, expected ${plot.x.length}`,
      );
    }
  }
}

export function renderLinePlotSvg(plot: LinePlot): string {
  validate(plot);

  const { width: W, height: H } = CANVAS;
  const { left, right, top, bottom } = MARGIN;
  const pw = W - left - right;
  const ph = H - top - bottom;

  const xRange = axisRange(plot.x);
  const yRange = axisRange(plot.series.flatMap((s) => s.values));
  const sx = (v: number) => left + ((v - xRange.min) / (xRange.max - xRange.min)) * pw;
  const sy = (v: number) => top + (1 - (v - yRange.min) / (yRange.max - yRange.min)) * ph;

  const parts: string[] = [];
  parts.push(`<svg xmlns='http://www.w3.org/2000/svg' width='${W}' height='${H}' viewBox='0 0 ${W} ${H}'>`);
  parts.push(`<rect x='0' y='0' width='${W}' height='${H}' rx='16' fill='white' stroke='#e5e7eb' />`);
  parts.push(
    `<text x='${left}' y='28' font-family='${FONT}' font-size='18' font-weight='600' fill='#111827'>${escapeXml(plot.title)}</text>`,
  );

  // grid
  for (let i = 0; i < GRID_LINES; i++) {
    const yy = (top + i * (ph / (GRID_LINES - 1))).toFixed(2);
    parts.push(`<line x1='${left}' y1='${yy}' x2='${left + pw}' y2='${yy}' stroke='#f3f4f6' />`);
  }
  for (let i = 0; i < GRID_LINES; i++) {
    const xx = (left + i * (pw / (GRID_LINES - 1))).toFixed(2);
    parts.push(`<line x1='${xx}' y1='${top}' x2='${xx}' y2='${top + ph}' stroke='#f3f4f6' />`);
  }

  // axes
  parts.push(`<line x1='${left}' y1='${top}' x2='${left}' y2='${top + ph}' stroke='#9ca3af' />`);
  parts.push(`<line x1='${left}' y1='${top + ph}' x2='${left + pw}' y2='${top + ph}' stroke='#9ca3af' />`);

  const legendX = left + pw - 170;
  const legendY = 60;
  plot.series.forEach((series, idx) => {
    const color = PALETTE[idx % PALETTE.length];
    const points = plot.x.map((x, i) => `${sx(x).toFixed(2)},${sy(series.values[i]).toFixed(2)}`).join(' ');
    parts.push(`<polyline fill='none' stroke='${color}' stroke-width='2.5' points='${points}' />`);

    const ly = legendY + idx * 20;
    parts.push(`<line x1='${legendX}' y1='${ly - 6}' x2='${legendX + 26}' y2='${ly - 6}' stroke='${color}' stroke-width='3' />`);
    parts.push(
      `<text x='${legendX + 32}' y='${ly - 2}' font-family='${FONT}' font-size='12' fill='#111827'>${escapeXml(series.label)}</text>`,
    );
  });

  const midY = (top + ph / 2).toFixed(2);
  parts.push(
    `<text x='${(left + pw / 2).toFixed(2)}' y='${H - 18}' text-anchor='middle' font-family='${FONT}' font-size='12' fill='#374151'>Pixel Number</text>`,
  );
  parts.push(
    `<text x='18' y='${midY}' transform='rotate(-90 18 ${midY})' text-anchor='middle' font-family='${FONT}' font-size='12' fill='#374151'>Pixel Value</text>`,
  );
  parts.push('</svg>\n');

  return parts.join('\n');
}

export const plotFileName = (prefix: string): string => `${prefix}_${nanoid()}.svg`;

/**
 * Render `plot` into `plotDir` under a fresh random name and return the name.
 * Concurrent runs sharing `plotDir` never collide.
 */
export async function writeLinePlot(plotDir: string, prefix: string, plot: LinePlot): Promise<string> {
  const svg = renderLinePlotSvg(plot);
  await fs.mkdir(plotDir, { recursive: true });
  const fileName = plotFileName(prefix);
  await fs.writeFile(path.join(plotDir, fileName), svg, 'utf-8');
  return fileName;
}
