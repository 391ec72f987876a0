/**
 * JSON backend
 *
 * {
 *   "Titanic": { "year": 1997, "rating": 9, "poster": "https://..." },
 *   ...
 * }
 */

import { StorageReadError, errorMessage } from '../shared/errors.js';
import type { MovieCollection, MovieInfo } from '../shared/types.js';
import { FileStorage, type CollectionCodec, type MovieStorage } from './storage.js';

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decodeEntry(title: string, value: unknown, source: string): MovieInfo {
  const fail = (why: string) => new StorageReadError(`${source}: movie "${title}" ${why}`, { path: source, title });
  if (!isObject(value)) throw fail('is not an object');
  const { year, rating, poster } = value;
  if (typeof year !== 'number' || !Number.isInteger(year)) throw fail('has no integer year');
  if (typeof rating !== 'number' || !Number.isFinite(rating)) throw fail('has no numeric rating');
  if (poster !== undefined && poster !== null && typeof poster !== 'string') throw fail('has a non-text poster');
  return { year, rating, poster: poster ?? '' };
}

export const jsonCodec: CollectionCodec = {
  format: 'json',

  decode(content, source) {
    if (content.trim() === '') return new Map();
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      throw new StorageReadError(`${source} is not valid JSON: ${errorMessage(err)}`, { path: source });
    }
    if (!isObject(parsed)) {
      throw new StorageReadError(`${source} must hold an object keyed by title`, { path: source });
    }
    const movies: MovieCollection = new Map();
    for (const [title, value] of Object.entries(parsed)) {
      if (title.trim() === '') {
        throw new StorageReadError(`${source} contains a movie with an empty title`, { path: source });
      }
      movies.set(title, decodeEntry(title, value, source));
    }
    return movies;
  },

  encode(collection) {
    // fromEntries defines own properties, so a title like "__proto__" survives
    const out = Object.fromEntries(
      [...collection].map(([title, info]) => [title, { year: info.year, rating: info.rating, poster: info.poster }])
    );
    return `${JSON.stringify(out, null, 2)}\n`;
  },
};

export function createJsonStorage(filePath: string): MovieStorage {
  return new FileStorage(filePath, jsonCodec);
}
