import fs from 'node:fs';
import path from 'node:path';

import { StorageReadError, StorageWriteError, errorMessage } from './errors.js';
import type { ActivityAction, ActivityEntry } from './types.js';

/**
 * JSON log of every mutation applied to the collection.
 * The file holds one array; each record() rewrites it through a tmp file.
 */
export class ActivityLog {
  private readonly logPath: string;
  private readonly clock: () => Date;

  constructor(logPath: string, opts?: { clock?: () => Date }) {
    this.logPath = logPath;
    this.clock = opts?.clock ?? (() => new Date());
  }

  entries(): ActivityEntry[] {
    if (!fs.existsSync(this.logPath)) return [];
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.logPath, 'utf-8'));
    } catch (err) {
      throw new StorageReadError(`Activity log ${this.logPath} is unreadable: ${errorMessage(err)}`);
    }
    if (!Array.isArray(parsed)) {
      throw new StorageReadError(`Activity log ${this.logPath} must hold a JSON array`);
    }
    return parsed.filter(isActivityEntry);
  }

  record(action: ActivityAction, title: string, details?: Record<string, unknown>): ActivityEntry {
    const entry: ActivityEntry = { at: this.clock().toISOString(), action, title };
    if (details) entry.details = details;
    this.writeAtomic([...this.entries(), entry]);
    return entry;
  }

  private writeAtomic(entries: ActivityEntry[]): void {
    const tmpPath = `${this.logPath}.tmp`;
    try {
      fs.mkdirSync(path.dirname(this.logPath), { recursive: true });
      fs.writeFileSync(tmpPath, JSON.stringify(entries, null, 2));
      fs.renameSync(tmpPath, this.logPath);
    } catch (err) {
      throw new StorageWriteError(`Cannot write activity log ${this.logPath}: ${errorMessage(err)}`);
    }
  }
}

const ACTIONS: readonly string[] = ['add', 'delete', 'update'];

function isActivityEntry(value: unknown): value is ActivityEntry {
  if (typeof value !== 'object' || value === null) return false;
  if (!('at' in value) || !('action' in value) || !('title' in value)) return false;
  return (
    typeof value.at === 'string' &&
    typeof value.action === 'string' &&
    ACTIONS.includes(value.action) &&
    typeof value.title === 'string'
  );
}
