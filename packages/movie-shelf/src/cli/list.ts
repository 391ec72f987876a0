/**
 * movie-shelf list
 */

import { Command } from 'commander';

import { ClosedPrompt } from '../app/prompt.js';
import { toRecords } from '../library/views.js';
import { createStorage } from '../storage/index.js';
import { createApp, fail, loadCommandConfig, withCommonOptions, type CommonOptions } from './context.js';

interface ListOptions extends CommonOptions {
  json?: boolean;
}

export function listCommand(baseDir: string): Command {
  return withCommonOptions(new Command('list'))
    .description('Print every movie in the collection')
    .option('--json', 'Output as JSON')
    .action((opts: ListOptions) => {
      try {
        const config = loadCommandConfig(baseDir, opts);
        if (opts.json) {
          const movies = toRecords(createStorage(config.storage).listMovies());
          console.log(JSON.stringify(movies, null, 2));
          return;
        }
        createApp(config, new ClosedPrompt()).listMovies();
      } catch (err) {
        fail(err);
      }
    });
}
