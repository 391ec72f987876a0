/**
 * Shared fixtures for the movie-shelf tests
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import type { Prompt } from '../app/prompt.js';
import type { Enrichment, MovieEnricher } from '../enrichment/omdbClient.js';
import { EnrichmentUnavailableError } from '../shared/errors.js';
import type { Output, Tone } from '../shared/output.js';
import type { MovieCollection, MovieRecord, MovieShelfConfig } from '../shared/types.js';

export function makeTmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'movie-shelf-'));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Titanic, Inception, Matrix, Godfather, Shawshank in that insertion order */
export function classics(): MovieRecord[] {
  return [
    { title: 'Titanic', year: 1997, rating: 9.0, poster: '' },
    { title: 'Inception', year: 2010, rating: 8.8, poster: '' },
    { title: 'Matrix', year: 1999, rating: 8.7, poster: '' },
    { title: 'Godfather', year: 1972, rating: 9.2, poster: '' },
    { title: 'Shawshank', year: 1994, rating: 9.3, poster: '' },
  ];
}

export function toCollection(records: MovieRecord[]): MovieCollection {
  return new Map(records.map(({ title, ...info }) => [title, info]));
}

export function testConfig(dir: string, overrides: Partial<MovieShelfConfig> = {}): MovieShelfConfig {
  return {
    storage: { format: 'json', path: path.join(dir, 'movies.json') },
    omdb: { apiKey: '', baseUrl: 'https://omdb.test', timeoutMs: 1000 },
    reports: {
      histogramPath: path.join(dir, 'out', 'histogram.svg'),
      sitePath: path.join(dir, 'out', 'index.html'),
      templatePath: path.join(dir, 'template.html'),
      siteTitle: 'Test Shelf',
    },
    search: { fuzzyThreshold: 0.7 },
    activity: { enabled: true, path: path.join(dir, 'activity.json') },
    ...overrides,
  };
}

/** Answers questions from a fixed script; null once the script runs out */
export class ScriptedPrompt implements Prompt {
  readonly questions: string[] = [];
  private readonly answers: string[];

  constructor(answers: string[]) {
    this.answers = [...answers];
  }

  async ask(query: string): Promise<string | null> {
    this.questions.push(query);
    return this.answers.shift() ?? null;
  }

  close(): void {}
}

export interface Printed {
  text: string;
  tone: Tone;
}

export class MemoryOutput implements Output {
  readonly printed: Printed[] = [];

  print(text: string, tone: Tone = 'plain'): void {
    this.printed.push({ text, tone });
  }

  texts(): string[] {
    return this.printed.map((p) => p.text);
  }

  last(): Printed | undefined {
    return this.printed[this.printed.length - 1];
  }
}

/** Enricher that knows a fixed set of titles */
export class FakeEnricher implements MovieEnricher {
  readonly lookups: string[] = [];

  constructor(
    private readonly known: Record<string, Enrichment>,
    readonly enabled = true
  ) {}

  async lookup(title: string): Promise<Enrichment> {
    this.lookups.push(title);
    const hit = this.known[title];
    if (!hit) throw new EnrichmentUnavailableError(title, 'Movie not found!');
    return hit;
  }
}
