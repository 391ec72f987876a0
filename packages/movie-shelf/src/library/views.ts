/**
 * Derived views over a loaded collection: stats, random pick, search, sort,
 * filter and histogram bins. Nothing here touches storage.
 */

import { EmptyCollectionError, ValidationError } from '../shared/errors.js';
import type { MovieCollection, MovieRecord } from '../shared/types.js';
import { titleScore } from './similarity.js';

export const DEFAULT_FUZZY_THRESHOLD = 0.7;

export type SortOrder = 'asc' | 'desc';

export interface MovieStats {
  count: number;
  average: number;
  median: number;
  /** Every record sharing the highest rating, in collection order */
  best: MovieRecord[];
  worst: MovieRecord[];
}

export interface FuzzyMatch {
  record: MovieRecord;
  score: number;
}

export type SearchResult =
  | { kind: 'exact'; matches: MovieRecord[] }
  | { kind: 'fuzzy'; matches: FuzzyMatch[] }
  | { kind: 'none' };

export interface MovieFilter {
  minRating?: number;
  startYear?: number;
  endYear?: number;
}

export interface HistogramBin {
  from: number;
  to: number;
  count: number;
}

export function toRecords(collection: MovieCollection): MovieRecord[] {
  return [...collection].map(([title, info]) => ({ title, ...info }));
}

export function computeStats(records: MovieRecord[]): MovieStats {
  if (records.length === 0) throw new EmptyCollectionError('statistics');

  const ratings = records.map((r) => r.rating).sort((a, b) => a - b);
  const mid = Math.floor(ratings.length / 2);
  const median = ratings.length % 2 === 1 ? ratings[mid] : (ratings[mid - 1] + ratings[mid]) / 2;
  const average = ratings.reduce((sum, r) => sum + r, 0) / ratings.length;
  const max = ratings[ratings.length - 1];
  const min = ratings[0];

  return {
    count: records.length,
    average,
    median,
    best: records.filter((r) => r.rating === max),
    worst: records.filter((r) => r.rating === min),
  };
}

export function pickRandom(records: MovieRecord[], rng: () => number = Math.random): MovieRecord {
  if (records.length === 0) throw new EmptyCollectionError('a random pick');
  const idx = Math.min(records.length - 1, Math.floor(rng() * records.length));
  return records[idx];
}

/**
 * Case-insensitive substring match first; when nothing matches, every title
 * scoring at least `threshold` on indel similarity, best first.
 */
export function searchMovies(
  records: MovieRecord[],
  query: string,
  opts: { threshold?: number } = {}
): SearchResult {
  const q = query.trim().toLowerCase();
  if (!q) throw new ValidationError('Search term must not be empty.');

  const exact = records.filter((r) => r.title.toLowerCase().includes(q));
  if (exact.length) return { kind: 'exact', matches: exact };

  const threshold = opts.threshold ?? DEFAULT_FUZZY_THRESHOLD;
  const fuzzy = records
    .map((record) => ({ record, score: titleScore(q, record.title) }))
    .filter((m) => m.score >= threshold)
    .sort((a, b) => b.score - a.score);

  return fuzzy.length ? { kind: 'fuzzy', matches: fuzzy } : { kind: 'none' };
}

/** Highest rating first; equal ratings keep collection order */
export function sortByRating(records: MovieRecord[]): MovieRecord[] {
  return [...records].sort((a, b) => b.rating - a.rating);
}

/** Equal years keep collection order in both directions */
export function sortByYear(records: MovieRecord[], order: SortOrder): MovieRecord[] {
  const dir = order === 'asc' ? 1 : -1;
  return [...records].sort((a, b) => (a.year - b.year) * dir);
}

export function filterMovies(records: MovieRecord[], filter: MovieFilter): MovieRecord[] {
  const { minRating, startYear, endYear } = filter;
  return records.filter(
    (r) =>
      (minRating === undefined || r.rating >= minRating) &&
      (startYear === undefined || r.year >= startYear) &&
      (endYear === undefined || r.year <= endYear)
  );
}

/** Counts ratings into equal bins over 0..10; a 10 lands in the last bin */
export function ratingHistogram(ratings: number[], binWidth = 0.5): HistogramBin[] {
  const binCount = Math.round(10 / binWidth);
  const bins: HistogramBin[] = Array.from({ length: binCount }, (_, i) => ({
    from: i * binWidth,
    to: (i + 1) * binWidth,
    count: 0,
  }));
  for (const rating of ratings) {
    const clamped = Math.min(10, Math.max(0, rating));
    const idx = Math.min(binCount - 1, Math.floor(clamped / binWidth));
    bins[idx].count++;
  }
  return bins;
}
