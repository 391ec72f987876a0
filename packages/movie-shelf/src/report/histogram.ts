/**
 * Rating histogram
 * Renders ratings as a standalone SVG bar chart, one bar per half point.
 */

import fs from 'node:fs';
import path from 'node:path';

import { EmptyCollectionError, StorageWriteError, errorMessage } from '../shared/errors.js';
import { ratingHistogram, type HistogramBin } from '../library/views.js';

export interface HistogramOptions {
  width?: number;
  height?: number;
  title?: string;
  binWidth?: number;
}

const MARGIN = { top: 56, right: 24, bottom: 56, left: 56 };

function fmt(n: number): string {
  return Number.isInteger(n) ? String(n) : n.toFixed(1);
}

function escapeXml(s: string): string {
  return s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

function barLabel(bin: HistogramBin): string {
  return `${fmt(bin.from)}–${fmt(bin.to)}: ${bin.count} ${bin.count === 1 ? 'movie' : 'movies'}`;
}

export function renderHistogramSvg(ratings: number[], opts: HistogramOptions = {}): string {
  const width = opts.width ?? 720;
  const height = opts.height ?? 440;
  const title = opts.title ?? 'Rating Histogram for Movies';
  const bins = ratingHistogram(ratings, opts.binWidth);

  const plotW = width - MARGIN.left - MARGIN.right;
  const plotH = height - MARGIN.top - MARGIN.bottom;
  const maxCount = Math.max(1, ...bins.map((b) => b.count));
  const x = (rating: number) => MARGIN.left + (rating / 10) * plotW;
  const y = (count: number) => MARGIN.top + plotH - (count / maxCount) * plotH;
  const baseline = MARGIN.top + plotH;

  const parts: string[] = [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    `  <rect width="${width}" height="${height}" fill="honeydew"/>`,
    `  <text x="${width / 2}" y="32" text-anchor="middle" font-size="20" font-weight="bold">${escapeXml(title)}</text>`,
  ];

  // y grid + labels
  const yStep = Math.max(1, Math.ceil(maxCount / 8));
  for (let c = 0; c <= maxCount; c += yStep) {
    parts.push(
      `  <line x1="${MARGIN.left}" x2="${MARGIN.left + plotW}" y1="${y(c)}" y2="${y(c)}" stroke="#ccc"/>`,
      `  <text x="${MARGIN.left - 8}" y="${y(c) + 4}" text-anchor="end" font-size="12">${c}</text>`
    );
  }

  for (const bin of bins) {
    if (bin.count === 0) continue;
    const left = x(bin.from);
    const barW = x(bin.to) - left;
    const gap = barW * 0.1;
    parts.push(
      `  <rect class="bar" x="${left + gap}" y="${y(bin.count)}" width="${barW - 2 * gap}" height="${baseline - y(bin.count)}" fill="gold" fill-opacity="0.7" stroke="black">`,
      `    <title>${barLabel(bin)}</title>`,
      '  </rect>'
    );
  }

  // x axis, one tick per whole rating
  parts.push(`  <line x1="${MARGIN.left}" x2="${MARGIN.left + plotW}" y1="${baseline}" y2="${baseline}" stroke="black"/>`);
  for (let r = 0; r <= 10; r++) {
    parts.push(
      `  <line x1="${x(r)}" x2="${x(r)}" y1="${baseline}" y2="${baseline + 6}" stroke="black"/>`,
      `  <text x="${x(r)}" y="${baseline + 20}" text-anchor="middle" font-size="12">${r}</text>`
    );
  }

  parts.push(
    `  <text x="${MARGIN.left + plotW / 2}" y="${height - 12}" text-anchor="middle" font-size="14" font-weight="bold">Rating between 0 - 10</text>`,
    `  <text x="16" y="${MARGIN.top + plotH / 2}" text-anchor="middle" font-size="14" font-weight="bold" transform="rotate(-90 16 ${MARGIN.top + plotH / 2})">Movie count</text>`,
    '</svg>'
  );
  return `${parts.join('\n')}\n`;
}

/** Writes the histogram image and returns its path */
export function writeHistogram(ratings: number[], outputPath: string, opts?: HistogramOptions): string {
  if (ratings.length === 0) throw new EmptyCollectionError('a histogram');
  const svg = renderHistogramSvg(ratings, opts);
  try {
    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    fs.writeFileSync(outputPath, svg, 'utf-8');
  } catch (err) {
    throw new StorageWriteError(`Cannot write histogram ${outputPath}: ${errorMessage(err)}`, { path: outputPath });
  }
  return outputPath;
}
