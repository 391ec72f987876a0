/**
 * OMDb API client
 * Looks a title up once and returns year, IMDb rating and poster.
 *
 * API key: omdb.apiKey in config, or OMDB_API_KEY in the environment
 */

import { EnrichmentUnavailableError, errorMessage } from '../shared/errors.js';
import type { OmdbConfig } from '../shared/types.js';

export interface Enrichment {
  /** Canonical title as OMDb spells it */
  title: string;
  year: number;
  rating: number;
  poster: string;
}

export interface MovieEnricher {
  readonly enabled: boolean;
  lookup(title: string): Promise<Enrichment>;
}

/** Fields of the OMDb `?t=` response this app reads; checked one by one */
interface OmdbMovie {
  Title?: unknown;
  Year?: unknown;
  imdbRating?: unknown;
  Poster?: unknown;
  Response?: unknown;
  Error?: unknown;
}

type FetchFn = typeof fetch;

function isOmdbMovie(value: unknown): value is OmdbMovie {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function field(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export class OmdbClient implements MovieEnricher {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;

  constructor(config: OmdbConfig, opts?: { fetch?: FetchFn }) {
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.apiKey = config.apiKey;
    this.timeoutMs = config.timeoutMs;
    this.fetchFn = opts?.fetch ?? ((input, init) => fetch(input, init));
  }

  get enabled(): boolean {
    return this.apiKey !== '';
  }

  async lookup(title: string): Promise<Enrichment> {
    if (!this.enabled) {
      throw new EnrichmentUnavailableError(title, 'no OMDb API key configured (set OMDB_API_KEY)');
    }

    const url = new URL(`${this.baseUrl}/`);
    url.searchParams.set('apikey', this.apiKey);
    url.searchParams.set('t', title);
    url.searchParams.set('type', 'movie');

    let body: unknown;
    try {
      const res = await this.fetchFn(url.toString(), { signal: AbortSignal.timeout(this.timeoutMs) });
      if (!res.ok) {
        throw new EnrichmentUnavailableError(title, `OMDb request failed with HTTP ${res.status}`);
      }
      body = await res.json();
    } catch (err) {
      if (err instanceof EnrichmentUnavailableError) throw err;
      throw new EnrichmentUnavailableError(title, `OMDb request failed: ${errorMessage(err)}`);
    }

    return parseOmdbMovie(title, body);
  }
}

/** Maps an OMDb payload to an Enrichment, rejecting "N/A" year or rating */
export function parseOmdbMovie(title: string, body: unknown): Enrichment {
  if (!isOmdbMovie(body)) {
    throw new EnrichmentUnavailableError(title, 'OMDb returned an unexpected payload');
  }
  if (field(body.Response) === 'False') {
    throw new EnrichmentUnavailableError(title, field(body.Error) ?? 'movie not found');
  }

  // Series report "2008–2013"; the first year is the release year
  const yearMatch = /^\d{4}/.exec(field(body.Year) ?? '');
  if (!yearMatch) {
    throw new EnrichmentUnavailableError(title, `OMDb has no release year (got "${field(body.Year) ?? ''}")`);
  }
  const ratingText = field(body.imdbRating) ?? '';
  const rating = Number(ratingText);
  if (ratingText === '' || !Number.isFinite(rating)) {
    throw new EnrichmentUnavailableError(title, `OMDb has no IMDb rating (got "${ratingText}")`);
  }
  const poster = field(body.Poster);

  return {
    title: field(body.Title)?.trim() || title,
    year: Number(yearMatch[0]),
    rating,
    poster: poster && poster !== 'N/A' ? poster : '',
  };
}
