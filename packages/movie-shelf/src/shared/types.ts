/**
 * Shared types for movie-shelf
 */

// ============================================================================
// Records
// ============================================================================

/** Stored attributes of one movie, keyed externally by title */
export interface MovieInfo {
  year: number;
  rating: number;
  /** Poster URL or path; empty string when unknown */
  poster: string;
}

export interface MovieRecord extends MovieInfo {
  title: string;
}

/**
 * Full collection for one operation.
 * Map order mirrors the backing file and is the tie-break for every sort.
 */
export type MovieCollection = Map<string, MovieInfo>;

// ============================================================================
// Configuration
// ============================================================================

export type StorageFormat = 'json' | 'csv';

export interface StorageConfig {
  format: StorageFormat;
  path: string;
}

export interface OmdbConfig {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
}

export interface ReportsConfig {
  histogramPath: string;
  sitePath: string;
  templatePath: string;
  siteTitle: string;
}

export interface SearchConfig {
  fuzzyThreshold: number;
}

export interface ActivityConfig {
  enabled: boolean;
  path: string;
}

export interface MovieShelfConfig {
  storage: StorageConfig;
  omdb: OmdbConfig;
  reports: ReportsConfig;
  search: SearchConfig;
  activity: ActivityConfig;
}

// ============================================================================
// Activity log
// ============================================================================

export type ActivityAction = 'add' | 'delete' | 'update';

export interface ActivityEntry {
  at: string;
  action: ActivityAction;
  title: string;
  details?: Record<string, unknown>;
}
