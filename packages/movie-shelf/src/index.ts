#!/usr/bin/env node
/**
 * movie-shelf - a small movie collection kept in a JSON or CSV file
 */

import { fileURLToPath } from 'node:url';

import { Command } from 'commander';

import { histogramCommand } from './cli/histogram.js';
import { listCommand } from './cli/list.js';
import { menuCommand } from './cli/menu.js';
import { siteCommand } from './cli/site.js';
import { statsCommand } from './cli/stats.js';

const baseDir = fileURLToPath(new URL('..', import.meta.url));

const program = new Command();

program
  .name('movie-shelf')
  .description('Keep, rate and browse a personal movie collection')
  .version('0.1.0');

// Register subcommands
program.addCommand(menuCommand(baseDir), { isDefault: true });
program.addCommand(listCommand(baseDir));
program.addCommand(statsCommand(baseDir));
program.addCommand(histogramCommand(baseDir));
program.addCommand(siteCommand(baseDir));

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
