/**
 * Storage backend contract.
 *
 * Every backend keeps the whole collection in one local file: each call reads
 * the file in full, and each mutation rewrites it in full. Nothing is cached
 * between calls. An interrupted write can leave a truncated file behind; the
 * next read then fails with StorageReadError.
 */

import fs from 'node:fs';
import path from 'node:path';

import { NotFoundError, StorageReadError, StorageWriteError, errorMessage } from '../shared/errors.js';
import type { MovieCollection, StorageFormat } from '../shared/types.js';

export interface MovieStorage {
  /** Full collection; a missing file reads as empty */
  listMovies(): MovieCollection;
  /** Inserts, or overwrites the record with the same title in place */
  addMovie(title: string, year: number, rating: number, poster: string): void;
  /** Returns false when the title is absent; the file is left untouched */
  deleteMovie(title: string): boolean;
  /** Replaces only the rating; throws NotFoundError for an absent title */
  updateMovie(title: string, rating: number): void;
  describe(): string;
}

/** Serialization of a whole collection to and from file content */
export interface CollectionCodec {
  readonly format: StorageFormat;
  decode(content: string, source: string): MovieCollection;
  encode(collection: MovieCollection): string;
}

export class FileStorage implements MovieStorage {
  constructor(
    private readonly filePath: string,
    private readonly codec: CollectionCodec
  ) {}

  describe(): string {
    return `${this.codec.format}:${this.filePath}`;
  }

  listMovies(): MovieCollection {
    let content: string;
    try {
      content = fs.readFileSync(this.filePath, 'utf-8');
    } catch (err: unknown) {
      if (isErrno(err) && err.code === 'ENOENT') return new Map();
      throw new StorageReadError(`Cannot read ${this.filePath}: ${errorMessage(err)}`, { path: this.filePath });
    }
    return this.codec.decode(content, this.filePath);
  }

  addMovie(title: string, year: number, rating: number, poster: string): void {
    const movies = this.listMovies();
    movies.set(title, { year, rating, poster });
    this.save(movies);
  }

  deleteMovie(title: string): boolean {
    const movies = this.listMovies();
    if (!movies.delete(title)) return false;
    this.save(movies);
    return true;
  }

  updateMovie(title: string, rating: number): void {
    const movies = this.listMovies();
    const info = movies.get(title);
    if (!info) throw new NotFoundError(title);
    movies.set(title, { ...info, rating });
    this.save(movies);
  }

  private save(movies: MovieCollection): void {
    const content = this.codec.encode(movies);
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(this.filePath, content, 'utf-8');
    } catch (err) {
      throw new StorageWriteError(`Cannot write ${this.filePath}: ${errorMessage(err)}`, { path: this.filePath });
    }
  }
}

function isErrno(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
