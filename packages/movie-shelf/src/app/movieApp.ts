/**
 * Interactive movie database
 *
 * Owns one storage backend for the process lifetime and maps numbered menu
 * choices to storage mutations and derived views. Every action loads the
 * collection fresh; nothing is cached between choices.
 */

import type { MovieEnricher, Enrichment } from '../enrichment/omdbClient.js';
import {
  computeStats,
  filterMovies,
  pickRandom,
  searchMovies,
  sortByRating,
  sortByYear,
  toRecords,
} from '../library/views.js';
import {
  assertYearRange,
  parseOptional,
  parseRating,
  parseSortOrder,
  parseTitle,
  parseYear,
} from '../library/validation.js';
import { writeHistogram } from '../report/histogram.js';
import { writeSite } from '../report/site.js';
import type { ActivityLog } from '../shared/activityLog.js';
import {
  EnrichmentUnavailableError,
  MovieShelfError,
  NotFoundError,
  ValidationError,
  errorMessage,
} from '../shared/errors.js';
import type { Output } from '../shared/output.js';
import type { ActivityAction, MovieRecord, MovieShelfConfig } from '../shared/types.js';
import type { MovieStorage } from '../storage/storage.js';
import { InputClosedError, type Prompt } from './prompt.js';

export type ChoiceOutcome = 'continue' | 'exit';

export interface MovieAppDeps {
  storage: MovieStorage;
  enricher: MovieEnricher;
  prompt: Prompt;
  out: Output;
  config: MovieShelfConfig;
  activity?: ActivityLog;
  rng?: () => number;
  now?: () => Date;
}

interface MenuEntry {
  label: string;
  run: () => void | Promise<void>;
}

const MAX_ATTEMPTS = 3;

export function formatRating(rating: number): string {
  return rating.toFixed(1);
}

export function formatMovie(movie: MovieRecord): string {
  return `${movie.title} (${movie.year}): ${formatRating(movie.rating)}`;
}

export class MovieApp {
  private readonly storage: MovieStorage;
  private readonly enricher: MovieEnricher;
  private readonly prompt: Prompt;
  private readonly out: Output;
  private readonly config: MovieShelfConfig;
  private readonly activity?: ActivityLog;
  private readonly rng: () => number;
  private readonly now: () => Date;
  private readonly menu: MenuEntry[];

  constructor(deps: MovieAppDeps) {
    this.storage = deps.storage;
    this.enricher = deps.enricher;
    this.prompt = deps.prompt;
    this.out = deps.out;
    this.config = deps.config;
    this.activity = deps.activity;
    this.rng = deps.rng ?? Math.random;
    this.now = deps.now ?? (() => new Date());

    this.menu = [
      { label: 'Exit', run: () => undefined },
      { label: 'List movies', run: () => this.listMovies() },
      { label: 'Add movie', run: () => this.addMovie() },
      { label: 'Delete movie', run: () => this.deleteMovie() },
      { label: 'Update movie rating', run: () => this.updateMovie() },
      { label: 'Stats', run: () => this.showStats() },
      { label: 'Random movie', run: () => this.randomMovie() },
      { label: 'Search movie', run: () => this.searchMovie() },
      { label: 'Movies sorted by rating', run: () => this.sortedByRating() },
      { label: 'Movies sorted by year', run: () => this.sortedByYear() },
      { label: 'Filter movies', run: () => this.filterMovies() },
      {
        label: 'Create rating histogram',
        run: () => {
          this.createHistogram();
        },
      },
      {
        label: 'Generate website',
        run: () => {
          this.generateWebsite();
        },
      },
    ];
  }

  /** Backend label, e.g. `json:/home/me/movies.json` */
  describeStorage(): string {
    return this.storage.describe();
  }

  get maxChoice(): number {
    return this.menu.length - 1;
  }

  async run(): Promise<void> {
    this.out.print('********** My Movies Database **********', 'menu');
    for (;;) {
      this.printMenu();
      const choice = await this.prompt.ask(`\nEnter choice (0-${this.maxChoice}): `);
      if (choice === null) {
        this.out.print('\nBye!');
        return;
      }
      if ((await this.runChoice(choice)) === 'exit') return;
    }
  }

  printMenu(): void {
    const lines = ['', 'Menu:', ...this.menu.map((entry, i) => `${i}. ${entry.label}`)];
    this.out.print(lines.join('\n'), 'menu');
  }

  /** Runs one menu choice; errors are reported and never escape */
  async runChoice(choice: string): Promise<ChoiceOutcome> {
    const trimmed = choice.trim();
    const idx = /^\d+$/.test(trimmed) ? Number(trimmed) : -1;
    const entry = this.menu[idx];
    if (!entry) {
      this.out.print(`Invalid choice. Please enter a number between 0 and ${this.maxChoice}.`, 'error');
      return 'continue';
    }
    if (idx === 0) {
      this.out.print('Bye!');
      return 'exit';
    }
    try {
      await entry.run();
    } catch (err) {
      if (err instanceof InputClosedError) {
        this.out.print('\nBye!');
        return 'exit';
      }
      if (err instanceof MovieShelfError) {
        this.out.print(err.message, 'error');
      } else {
        this.out.print(`Unexpected error: ${errorMessage(err)}`, 'error');
      }
    }
    return 'continue';
  }

  // ──────────────────────────────────────────────────────────────────
  // Prompts
  // ──────────────────────────────────────────────────────────────────

  private async askLine(query: string): Promise<string> {
    const answer = await this.prompt.ask(query);
    if (answer === null) throw new InputClosedError();
    return answer;
  }

  /** Re-asks on ValidationError; the last failure propagates */
  private async askValid<T>(query: string, parse: (input: string) => T): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      const answer = await this.askLine(query);
      try {
        return parse(answer);
      } catch (err) {
        if (!(err instanceof ValidationError) || attempt >= MAX_ATTEMPTS) throw err;
        this.out.print(err.message, 'error');
      }
    }
  }

  private records(): MovieRecord[] {
    return toRecords(this.storage.listMovies());
  }

  private printMovies(movies: MovieRecord[], header?: string): void {
    const lines = header ? [header, ...movies.map(formatMovie)] : movies.map(formatMovie);
    this.out.print(lines.join('\n'), 'response');
  }

  private logActivity(action: ActivityAction, title: string, details?: Record<string, unknown>): void {
    if (!this.activity) return;
    try {
      this.activity.record(action, title, details);
    } catch (err) {
      this.out.print(`Could not update activity log: ${errorMessage(err)}`, 'warn');
    }
  }

  // ──────────────────────────────────────────────────────────────────
  // Actions
  // ──────────────────────────────────────────────────────────────────

  listMovies(): void {
    const movies = this.records();
    if (!movies.length) {
      this.out.print('No movies found.', 'response');
      return;
    }
    this.printMovies(movies, `\n${movies.length} movies in total`);
  }

  async addMovie(): Promise<void> {
    const typed = await this.askValid('\nEnter new movie name: ', parseTitle);
    const existing = this.storage.listMovies();
    if (existing.has(typed)) {
      throw new ValidationError(`Movie "${typed}" already exists!`);
    }

    const fetched = await this.tryEnrich(typed);
    let record: MovieRecord;
    let source: 'omdb' | 'manual';
    if (fetched) {
      if (fetched.title !== typed && existing.has(fetched.title)) {
        throw new ValidationError(`Movie "${fetched.title}" already exists!`);
      }
      record = fetched;
      source = 'omdb';
      this.out.print(`Found on OMDb: ${formatMovie(record)}`, 'response');
    } else {
      const now = this.now();
      const year = await this.askValid('Enter new movie year: ', (input) => parseYear(input, now));
      const rating = await this.askValid('Enter new movie rating (0-10): ', parseRating);
      const poster = (await this.askLine('Enter poster URL (leave blank for none): ')).trim();
      record = { title: typed, year, rating, poster };
      source = 'manual';
    }

    this.storage.addMovie(record.title, record.year, record.rating, record.poster);
    this.logActivity('add', record.title, { year: record.year, rating: record.rating, source });
    const via = source === 'omdb' ? 'OMDb' : 'manual entry';
    this.out.print(`Movie "${record.title}" successfully added (${via}).`, 'success');
  }

  /** null means "fall back to manual entry"; the reason is already printed */
  private async tryEnrich(title: string): Promise<Enrichment | null> {
    if (!this.enricher.enabled) {
      this.out.print('OMDb lookup is disabled (no API key). Enter the details manually.', 'warn');
      return null;
    }
    try {
      return await this.enricher.lookup(title);
    } catch (err) {
      if (!(err instanceof EnrichmentUnavailableError)) throw err;
      this.out.print(err.message, 'warn');
      this.out.print('Falling back to manual entry.', 'warn');
      return null;
    }
  }

  async deleteMovie(): Promise<void> {
    const title = await this.askValid('\nEnter movie name to delete: ', parseTitle);
    if (!this.storage.deleteMovie(title)) {
      this.out.print(`Movie "${title}" does not exist!`, 'error');
      return;
    }
    this.logActivity('delete', title);
    this.out.print(`Movie "${title}" successfully deleted.`, 'success');
  }

  async updateMovie(): Promise<void> {
    const title = await this.askValid('\nEnter movie name: ', parseTitle);
    const current = this.storage.listMovies().get(title);
    if (!current) throw new NotFoundError(title);

    const rating = await this.askValid('Enter new movie rating (0-10): ', parseRating);
    this.storage.updateMovie(title, rating);
    this.logActivity('update', title, { from: current.rating, to: rating });
    this.out.print(`Movie "${title}" successfully updated.`, 'success');
  }

  showStats(): void {
    const stats = computeStats(this.records());
    const names = (movies: MovieRecord[]) =>
      movies.map((m) => `${m.title} (${formatRating(m.rating)})`).join(', ');
    this.out.print(
      [
        `\nAverage rating: ${formatRating(stats.average)}`,
        `Median rating: ${formatRating(stats.median)}`,
        `Best movie${stats.best.length > 1 ? 's' : ''}: ${names(stats.best)}`,
        `Worst movie${stats.worst.length > 1 ? 's' : ''}: ${names(stats.worst)}`,
      ].join('\n'),
      'response'
    );
  }

  randomMovie(): void {
    const movie = pickRandom(this.records(), this.rng);
    this.out.print(`\nYour movie for tonight: ${movie.title} (${movie.year}), it's rated ${formatRating(movie.rating)}`, 'response');
  }

  async searchMovie(): Promise<void> {
    const query = await this.askLine('\nEnter part of movie name: ');
    const result = searchMovies(this.records(), query, { threshold: this.config.search.fuzzyThreshold });
    switch (result.kind) {
      case 'exact':
        this.printMovies(result.matches);
        return;
      case 'fuzzy':
        this.printMovies(
          result.matches.map((m) => m.record),
          `The movie "${query.trim()}" does not exist. Did you mean:`
        );
        return;
      case 'none':
        this.out.print('No matching movies found.', 'response');
    }
  }

  sortedByRating(): void {
    const movies = sortByRating(this.records());
    if (!movies.length) {
      this.out.print('No movies found.', 'response');
      return;
    }
    this.printMovies(movies, '\nMovies sorted by rating:');
  }

  async sortedByYear(): Promise<void> {
    const order = await this.askValid('\nDo you want the latest movies first? (Y/N): ', parseSortOrder);
    const movies = sortByYear(this.records(), order);
    if (!movies.length) {
      this.out.print('No movies found.', 'response');
      return;
    }
    this.printMovies(movies, '\nMovies sorted by year:');
  }

  async filterMovies(): Promise<void> {
    const now = this.now();
    const optionalYear = (input: string) => parseOptional(input, (v) => parseYear(v, now));
    const minRating = await this.askValid(
      '\nEnter minimum rating (leave blank for no minimum rating): ',
      (input) => parseOptional(input, parseRating)
    );
    const startYear = await this.askValid('Enter start year (leave blank for no start year): ', optionalYear);
    const endYear = await this.askValid('Enter end year (leave blank for no end year): ', optionalYear);
    assertYearRange(startYear, endYear);

    const movies = filterMovies(this.records(), { minRating, startYear, endYear });
    if (!movies.length) {
      this.out.print('No movies match the filter criteria.', 'response');
      return;
    }
    this.printMovies(movies, '\nFiltered movies:');
  }

  createHistogram(): string {
    const file = writeHistogram(
      this.records().map((m) => m.rating),
      this.config.reports.histogramPath
    );
    this.out.print(`Histogram was successfully saved as "${file}".`, 'success');
    return file;
  }

  generateWebsite(): string {
    const { templatePath, sitePath, siteTitle } = this.config.reports;
    const file = writeSite(this.records(), templatePath, sitePath, siteTitle);
    this.out.print(`Website was generated successfully: "${file}".`, 'success');
    return file;
  }
}
