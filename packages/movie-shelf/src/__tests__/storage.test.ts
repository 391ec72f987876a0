import fs from 'node:fs';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { NotFoundError, StorageReadError, StorageWriteError } from '../shared/errors.js';
import type { StorageFormat } from '../shared/types.js';
import { createStorage, csvCodec, jsonCodec, type MovieStorage } from '../storage/index.js';
import { classics, makeTmpDir, removeDir, toCollection } from './helpers.js';

describe('storage backends', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTmpDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  const formats: StorageFormat[] = ['json', 'csv'];

  for (const format of formats) {
    describe(`${format} storage`, () => {
      let file: string;
      let storage: MovieStorage;

      beforeEach(() => {
        file = path.join(dir, 'nested', `movies.${format}`);
        storage = createStorage({ format, path: file });
      });

      it('should read a missing file as an empty collection', () => {
        expect(storage.listMovies().size).toBe(0);
        expect(fs.existsSync(file)).toBe(false);
      });

      it('should return what was added, in insertion order', () => {
        storage.addMovie('Titanic', 1997, 9, 'https://img.test/titanic.jpg');
        storage.addMovie('Crouching Tiger, Hidden Dragon', 2000, 7.9, '');
        storage.addMovie('Heat', 1995, 8.3, '');

        const movies = storage.listMovies();
        expect([...movies.keys()]).toEqual(['Titanic', 'Crouching Tiger, Hidden Dragon', 'Heat']);
        expect(movies.get('Titanic')).toEqual({ year: 1997, rating: 9, poster: 'https://img.test/titanic.jpg' });
        expect(movies.get('Crouching Tiger, Hidden Dragon')).toEqual({ year: 2000, rating: 7.9, poster: '' });
      });

      it('should overwrite an existing title in place', () => {
        storage.addMovie('Titanic', 1997, 9, '');
        storage.addMovie('Matrix', 1999, 8.7, '');
        storage.addMovie('Titanic', 1953, 7.1, 'p.jpg');

        const movies = storage.listMovies();
        expect([...movies.keys()]).toEqual(['Titanic', 'Matrix']);
        expect(movies.get('Titanic')).toEqual({ year: 1953, rating: 7.1, poster: 'p.jpg' });
      });

      it('should delete a present title and report an absent one', () => {
        storage.addMovie('Titanic', 1997, 9, '');
        storage.addMovie('Matrix', 1999, 8.7, '');

        expect(storage.deleteMovie('Titanic')).toBe(true);
        expect([...storage.listMovies().keys()]).toEqual(['Matrix']);

        const before = fs.readFileSync(file, 'utf-8');
        expect(storage.deleteMovie('Titanic')).toBe(false);
        expect(fs.readFileSync(file, 'utf-8')).toBe(before);
      });

      it('should update only the rating', () => {
        storage.addMovie('Heat', 1995, 8.3, 'heat.jpg');
        storage.updateMovie('Heat', 8.5);
        expect(storage.listMovies().get('Heat')).toEqual({ year: 1995, rating: 8.5, poster: 'heat.jpg' });
      });

      it('should throw NotFoundError when updating an absent title', () => {
        expect(() => storage.updateMovie('Nope', 5)).toThrow(NotFoundError);
        expect(() => storage.updateMovie('Nope', 5)).toThrow('Movie "Nope" does not exist.');
      });

      it('should describe itself by format and path', () => {
        expect(storage.describe()).toBe(`${format}:${file}`);
      });
    });
  }

  describe('write failures', () => {
    it('should wrap a failed write in StorageWriteError', () => {
      // the link resolves into a directory that does not exist, so reads see
      // an empty collection but writes fail
      const link = path.join(dir, 'movies.json');
      fs.symlinkSync(path.join(dir, 'missing', 'target.json'), link);
      const storage = createStorage({ format: 'json', path: link });

      expect(storage.listMovies().size).toBe(0);
      expect(() => storage.addMovie('Heat', 1995, 8.3, '')).toThrow(StorageWriteError);
      expect(() => storage.addMovie('Heat', 1995, 8.3, '')).toThrow(`Cannot write ${link}:`);
      expect(fs.existsSync(path.join(dir, 'missing'))).toBe(false);
    });
  });

  describe('json file layout', () => {
    it('should write an object keyed by title', () => {
      const file = path.join(dir, 'movies.json');
      createStorage({ format: 'json', path: file }).addMovie('Titanic', 1997, 9, '');
      expect(fs.readFileSync(file, 'utf-8')).toBe(
        '{\n  "Titanic": {\n    "year": 1997,\n    "rating": 9,\n    "poster": ""\n  }\n}\n'
      );
    });

    it('should keep a title that collides with an object prototype key', () => {
      const collection = toCollection([{ title: '__proto__', year: 2001, rating: 5, poster: '' }]);
      const decoded = jsonCodec.decode(jsonCodec.encode(collection), 'mem.json');
      expect(decoded.get('__proto__')).toEqual({ year: 2001, rating: 5, poster: '' });
    });

    it('should default a missing or null poster to empty', () => {
      const decoded = jsonCodec.decode('{"Heat": {"year": 1995, "rating": 8.3, "poster": null}}', 'mem.json');
      expect(decoded.get('Heat')).toEqual({ year: 1995, rating: 8.3, poster: '' });
    });

    it('should treat empty content as an empty collection', () => {
      expect(jsonCodec.decode('  \n', 'mem.json').size).toBe(0);
    });

    it('should reject malformed content', () => {
      expect(() => jsonCodec.decode('{not json', 'mem.json')).toThrow(StorageReadError);
      expect(() => jsonCodec.decode('[1, 2]', 'mem.json')).toThrow('mem.json must hold an object keyed by title');
      expect(() => jsonCodec.decode('{"Heat": {"year": "1995", "rating": 8}}', 'mem.json')).toThrow(
        'mem.json: movie "Heat" has no integer year'
      );
      expect(() => jsonCodec.decode('{"Heat": {"year": 1995}}', 'mem.json')).toThrow(
        'mem.json: movie "Heat" has no numeric rating'
      );
    });

    it('should surface a corrupt backing file as StorageReadError', () => {
      const file = path.join(dir, 'movies.json');
      fs.writeFileSync(file, '{"Titanic": {"year": 19');
      expect(() => createStorage({ format: 'json', path: file }).listMovies()).toThrow(StorageReadError);
    });
  });

  describe('csv file layout', () => {
    it('should write a header and quote fields that need it', () => {
      const file = path.join(dir, 'movies.csv');
      const storage = createStorage({ format: 'csv', path: file });
      storage.addMovie('Titanic', 1997, 9, '');
      storage.addMovie('Crouching Tiger, Hidden Dragon', 2000, 7.9, '');
      expect(fs.readFileSync(file, 'utf-8')).toBe(
        'title,year,rating,poster\nTitanic,1997,9,\n"Crouching Tiger, Hidden Dragon",2000,7.9,\n'
      );
    });

    it('should read the scenario collection written by hand', () => {
      const content = [
        'Title,Year,Rating',
        'Titanic,1997,9.0',
        'Inception,2010,8.8',
        'Matrix,1999,8.7',
        'Godfather,1972,9.2',
        'Shawshank,1994,9.3',
      ].join('\r\n');
      expect(csvCodec.decode(content, 'mem.csv')).toEqual(toCollection(classics()));
    });

    it('should report the offending line for bad rows', () => {
      expect(() => csvCodec.decode('title,year,rating\nHeat,abc,8.3\n', 'mem.csv')).toThrow(
        'mem.csv line 2: year "abc" is not an integer'
      );
      expect(() => csvCodec.decode('title,year,rating\nHeat,1995,good\n', 'mem.csv')).toThrow(
        'mem.csv line 2: rating "good" is not a number'
      );
      expect(() => csvCodec.decode('title,year,rating\n,1995,8\n', 'mem.csv')).toThrow('mem.csv line 2: empty title');
    });

    it('should reject a header without the required columns', () => {
      expect(() => csvCodec.decode('name,year\nHeat,1995\n', 'mem.csv')).toThrow(
        'mem.csv: header is missing column(s) title, rating'
      );
    });

    it('should surface an unterminated quote as StorageReadError', () => {
      let caught: unknown;
      try {
        csvCodec.decode('title,year,rating\n"Heat,1995,8\n', 'mem.csv');
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(StorageReadError);
      expect(caught).toMatchObject({ details: { path: 'mem.csv', code: 'CSV_QUOTE_NOT_CLOSED' } });
    });

    it('should refuse a title that appears twice', () => {
      expect(() => csvCodec.decode('title,year,rating\nHeat,1995,8.3\nHeat,1986,6.0\n', 'mem.csv')).toThrow(
        'mem.csv line 3: duplicate title "Heat"'
      );
    });

    it('should treat empty content as an empty collection', () => {
      expect(csvCodec.decode('', 'mem.csv').size).toBe(0);
    });
  });
});
