/**
 * movie-shelf stats
 */

import { Command } from 'commander';

import { ClosedPrompt } from '../app/prompt.js';
import { createApp, fail, loadCommandConfig, withCommonOptions, type CommonOptions } from './context.js';

export function statsCommand(baseDir: string): Command {
  return withCommonOptions(new Command('stats'))
    .description('Print average, median, best and worst rated movies')
    .action((opts: CommonOptions) => {
      try {
        createApp(loadCommandConfig(baseDir, opts), new ClosedPrompt()).showStats();
      } catch (err) {
        fail(err);
      }
    });
}
