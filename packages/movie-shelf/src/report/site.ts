/**
 * Static site generator
 * Fills an HTML template with one grid item per movie.
 *
 * Placeholders: {{title}}, {{movieGrid}}
 */

import fs from 'node:fs';
import path from 'node:path';

import { StorageReadError, StorageWriteError, errorMessage } from '../shared/errors.js';
import type { MovieRecord } from '../shared/types.js';

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function applyTemplate(s: string, vars: Record<string, string>): string {
  let out = s;
  for (const [k, v] of Object.entries(vars)) {
    out = out.split(`{{${k}}}`).join(v);
  }
  return out;
}

export function renderMovieItem(movie: MovieRecord): string {
  const lines = ['    <li>', '      <div class="movie">'];
  if (movie.poster) {
    lines.push(`        <img class="movie-poster" src="${escapeHtml(movie.poster)}" alt="${escapeHtml(movie.title)} poster"/>`);
  }
  lines.push(
    `        <div class="movie-title">${escapeHtml(movie.title)}</div>`,
    `        <div class="movie-year">${movie.year}</div>`,
    '      </div>',
    '    </li>'
  );
  return lines.join('\n');
}

export function renderSite(movies: MovieRecord[], template: string, opts: { title: string }): string {
  return applyTemplate(template, {
    title: escapeHtml(opts.title),
    movieGrid: movies.map(renderMovieItem).join('\n'),
  });
}

/** Reads the template, writes the page and returns its path */
export function writeSite(movies: MovieRecord[], templatePath: string, outputPath: string, title: string): string {
  let template: string;
  try {
    template = fs.readFileSync(templatePath, 'utf-8');
  } catch (err) {
    throw new StorageReadError(`Cannot read site template ${templatePath}: ${errorMessage(err)}`, { path: templatePath });
  }
  const html = renderSite(movies, template, { title });
  try {
    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    fs.writeFileSync(outputPath, html, 'utf-8');
  } catch (err) {
    throw new StorageWriteError(`Cannot write site ${outputPath}: ${errorMessage(err)}`, { path: outputPath });
  }
  return outputPath;
}
