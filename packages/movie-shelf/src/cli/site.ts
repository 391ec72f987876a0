/**
 * movie-shelf site
 * Generate the static HTML page listing every movie.
 */

import path from 'node:path';

import { Command } from 'commander';

import { ClosedPrompt } from '../app/prompt.js';
import { createApp, fail, loadCommandConfig, withCommonOptions, type CommonOptions } from './context.js';

interface SiteOptions extends CommonOptions {
  out?: string;
  template?: string;
  title?: string;
}

export function siteCommand(baseDir: string): Command {
  return withCommonOptions(new Command('site'))
    .description('Generate a static HTML page of the collection')
    .option('-o, --out <path>', 'Output file (default: reports.sitePath)')
    .option('--template <path>', 'HTML template with {{title}} and {{movieGrid}} placeholders')
    .option('--title <title>', 'Page title')
    .action((opts: SiteOptions) => {
      try {
        const config = loadCommandConfig(baseDir, opts);
        if (opts.out) config.reports.sitePath = path.resolve(opts.out);
        if (opts.template) config.reports.templatePath = path.resolve(opts.template);
        if (opts.title) config.reports.siteTitle = opts.title;
        createApp(config, new ClosedPrompt()).generateWebsite();
      } catch (err) {
        fail(err);
      }
    });
}
