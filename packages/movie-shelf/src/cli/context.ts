/**
 * Shared wiring for every subcommand: config, storage, enrichment, activity log.
 */

import { Command } from 'commander';

import { MovieApp } from '../app/movieApp.js';
import type { Prompt } from '../app/prompt.js';
import { OmdbClient } from '../enrichment/omdbClient.js';
import { ActivityLog } from '../shared/activityLog.js';
import { loadConfig } from '../shared/config.js';
import { errorMessage } from '../shared/errors.js';
import { ConsoleOutput, type Output } from '../shared/output.js';
import type { MovieShelfConfig } from '../shared/types.js';
import { createStorage } from '../storage/index.js';

export interface CommonOptions {
  config?: string;
  storage?: string;
  file?: string;
}

export function withCommonOptions(cmd: Command): Command {
  return cmd
    .option('-c, --config <path>', 'Config file (default: MOVIE_SHELF_CONFIG or movie-shelf.yaml)')
    .option('--storage <format>', 'Storage format: json | csv')
    .option('--file <path>', 'Backing file for the movie collection');
}

export function loadCommandConfig(baseDir: string, opts: CommonOptions): MovieShelfConfig {
  return loadConfig(baseDir, {
    configPath: opts.config,
    storageFormat: opts.storage,
    storagePath: opts.file,
  });
}

export function createApp(config: MovieShelfConfig, prompt: Prompt, out: Output = new ConsoleOutput()): MovieApp {
  return new MovieApp({
    storage: createStorage(config.storage),
    enricher: new OmdbClient(config.omdb),
    prompt,
    out,
    config,
    activity: config.activity.enabled ? new ActivityLog(config.activity.path) : undefined,
  });
}

/** Prints the failure and exits 1; used by the one-shot commands */
export function fail(err: unknown): never {
  new ConsoleOutput().print(errorMessage(err), 'error');
  process.exit(1);
}
