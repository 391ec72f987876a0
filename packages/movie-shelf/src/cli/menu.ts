/**
 * movie-shelf menu
 * Interactive numbered menu over stdin (the default command).
 */

import { Command } from 'commander';

import { ReadlinePrompt } from '../app/prompt.js';
import { getConfigPath } from '../shared/config.js';
import { loadEnv } from '../shared/env.js';
import { ConsoleOutput } from '../shared/output.js';
import { createApp, fail, loadCommandConfig, withCommonOptions, type CommonOptions } from './context.js';

export function menuCommand(baseDir: string): Command {
  return withCommonOptions(new Command('menu'))
    .description('Open the interactive movie menu')
    .action(async (opts: CommonOptions) => {
      const out = new ConsoleOutput();
      const prompt = new ReadlinePrompt();
      try {
        const config = loadCommandConfig(baseDir, opts);
        const configPath = opts.config ?? getConfigPath(baseDir, process.cwd(), loadEnv(process.cwd()));
        const app = createApp(config, prompt, out);
        out.print(`Config: ${configPath ?? 'defaults (no config file found)'}`, 'hint');
        out.print(`Storage: ${app.describeStorage()}`, 'hint');
        if (!config.omdb.apiKey) {
          out.print('OMDB_API_KEY is not set: OMDb lookups will fail and movies must be entered manually.', 'warn');
        }
        await app.run();
      } catch (err) {
        prompt.close();
        fail(err);
      }
      prompt.close();
    });
}
