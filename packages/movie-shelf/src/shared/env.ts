import fs from 'node:fs';
import path from 'node:path';

export type EnvVars = Record<string, string | undefined>;

const ENV_LINE = /^(?:export\s+)?([A-Za-z_][A-Za-z0-9_.]*)\s*=\s*(.*)$/;

/** Process environment layered over an optional .env file in `dir` */
export function loadEnv(dir: string, processEnv: EnvVars = process.env): EnvVars {
  const envPath = path.join(dir, '.env');
  if (!fs.existsSync(envPath)) return { ...processEnv };
  return { ...parseEnv(fs.readFileSync(envPath, 'utf-8')), ...processEnv };
}

function unquote(raw: string): string {
  const quote = raw[0];
  if (raw.length >= 2 && (quote === '"' || quote === "'") && raw.endsWith(quote)) {
    const inner = raw.slice(1, -1);
    // only double quotes understand \n
    return quote === '"' ? inner.replace(/\\n/g, '\n') : inner;
  }
  return raw;
}

/** KEY=value lines; comments, blanks and malformed lines are skipped */
export function parseEnv(content: string): EnvVars {
  const vars: EnvVars = {};
  for (const line of content.split(/\r?\n/)) {
    const text = line.trim();
    if (text === '' || text.startsWith('#')) continue;
    const match = ENV_LINE.exec(text);
    if (match) vars[match[1]] = unquote(match[2].trim());
  }
  return vars;
}
