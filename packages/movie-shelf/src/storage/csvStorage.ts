/**
 * CSV backend
 *
 * title,year,rating,poster
 * Titanic,1997,9,https://...
 */

import { CsvError } from 'csv-parse';
import { parse } from 'csv-parse/sync';

import { StorageReadError } from '../shared/errors.js';
import type { MovieCollection } from '../shared/types.js';
import { formatCsvRow } from './csv.js';
import { FileStorage, type CollectionCodec, type MovieStorage } from './storage.js';

export const CSV_COLUMNS = ['title', 'year', 'rating', 'poster'] as const;
const REQUIRED_COLUMNS = ['title', 'year', 'rating'];

interface CsvRow {
  /** Line the record was read from */
  line: number;
  fields: string[];
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** One `{ info, record }` entry as csv-parse emits it with `info: true` */
function toRow(entry: unknown, source: string): CsvRow {
  if (isObject(entry)) {
    const { info, record } = entry;
    if (isObject(info) && typeof info.lines === 'number' && Array.isArray(record)) {
      return { line: info.lines, fields: record.map((field) => String(field)) };
    }
  }
  throw new StorageReadError(`${source}: unexpected CSV parser output`, { path: source });
}

function readRows(content: string, source: string): CsvRow[] {
  let parsed: unknown;
  try {
    parsed = parse(content, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
      info: true,
    });
  } catch (err) {
    if (err instanceof CsvError) {
      const lines: unknown = 'lines' in err ? err.lines : undefined;
      throw new StorageReadError(`${source}: ${err.message}`, {
        path: source,
        code: err.code,
        line: typeof lines === 'number' ? lines : undefined,
      });
    }
    throw err;
  }
  if (!Array.isArray(parsed)) {
    throw new StorageReadError(`${source}: unexpected CSV parser output`, { path: source });
  }
  return parsed.map((entry: unknown) => toRow(entry, source));
}

export const csvCodec: CollectionCodec = {
  format: 'csv',

  decode(content, source) {
    const movies: MovieCollection = new Map();
    const [header, ...rows] = readRows(content, source);
    if (!header) return movies;

    const columns = header.fields.map((h) => h.trim().toLowerCase());
    const missing = REQUIRED_COLUMNS.filter((c) => !columns.includes(c));
    if (missing.length) {
      throw new StorageReadError(`${source}: header is missing column(s) ${missing.join(', ')}`, { path: source });
    }
    const idx = (name: string) => columns.indexOf(name);
    const titleIdx = idx('title');
    const yearIdx = idx('year');
    const ratingIdx = idx('rating');
    const posterIdx = idx('poster');

    for (const row of rows) {
      const fail = (why: string) => new StorageReadError(`${source} line ${row.line}: ${why}`, { path: source, line: row.line });
      const title = row.fields[titleIdx] ?? '';
      const yearText = (row.fields[yearIdx] ?? '').trim();
      const ratingText = (row.fields[ratingIdx] ?? '').trim();
      if (!title.trim()) throw fail('empty title');
      if (!/^-?\d+$/.test(yearText)) throw fail(`year "${yearText}" is not an integer`);
      const rating = Number(ratingText);
      if (ratingText === '' || !Number.isFinite(rating)) throw fail(`rating "${ratingText}" is not a number`);
      if (movies.has(title)) throw fail(`duplicate title "${title}"`);
      const poster = posterIdx >= 0 ? (row.fields[posterIdx] ?? '') : '';
      movies.set(title, { year: Number(yearText), rating, poster });
    }
    return movies;
  },

  encode(collection) {
    const lines = [CSV_COLUMNS.join(',')];
    for (const [title, info] of collection) {
      lines.push(formatCsvRow([title, String(info.year), String(info.rating), info.poster]));
    }
    return `${lines.join('\n')}\n`;
  },
};

export function createCsvStorage(filePath: string): MovieStorage {
  return new FileStorage(filePath, csvCodec);
}
