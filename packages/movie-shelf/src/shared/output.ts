/**
 * Terminal output
 * Every line the app prints goes through an Output so tests can capture it.
 */

import { bold, cyan, dim, green, red, yellow } from 'colorette';

export type Tone = 'plain' | 'menu' | 'response' | 'success' | 'warn' | 'error' | 'hint';

export interface Output {
  print(text: string, tone?: Tone): void;
}

const painters: Record<Tone, (s: string) => string> = {
  plain: (s) => s,
  menu: cyan,
  response: yellow,
  success: green,
  warn: (s) => bold(yellow(s)),
  error: red,
  hint: dim,
};

export class ConsoleOutput implements Output {
  print(text: string, tone: Tone = 'plain'): void {
    const painted = painters[tone](text);
    if (tone === 'error') {
      console.error(painted);
      return;
    }
    console.log(painted);
  }
}

const ANSI_SGR = /\x1b\[[0-9;]*m/g;

/** Drops color codes, e.g. from captured console output */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_SGR, '');
}
