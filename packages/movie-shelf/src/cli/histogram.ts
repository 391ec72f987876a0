/**
 * movie-shelf histogram
 * Write the rating histogram as an SVG image.
 */

import path from 'node:path';

import { Command } from 'commander';

import { ClosedPrompt } from '../app/prompt.js';
import { createApp, fail, loadCommandConfig, withCommonOptions, type CommonOptions } from './context.js';

interface HistogramOptions extends CommonOptions {
  out?: string;
}

export function histogramCommand(baseDir: string): Command {
  return withCommonOptions(new Command('histogram'))
    .description('Write a rating histogram (SVG)')
    .option('-o, --out <path>', 'Output file (default: reports.histogramPath)')
    .action((opts: HistogramOptions) => {
      try {
        const config = loadCommandConfig(baseDir, opts);
        if (opts.out) config.reports.histogramPath = path.resolve(opts.out);
        createApp(config, new ClosedPrompt()).createHistogram();
      } catch (err) {
        fail(err);
      }
    });
}
