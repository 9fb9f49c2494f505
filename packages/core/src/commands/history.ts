/**
 * @fileoverview Command History
 *
 * Fixed-capacity ring buffer of raw input lines with:
 * - Oldest-first eviction once full
 * - Consecutive duplicate suppression
 * - Substring search, most recent first
 * - Plain-text persistence, one line per entry, oldest first
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createLogger } from '../logging/index.js';

const log = createLogger('commands:history');

export const DEFAULT_HISTORY_CAPACITY = 100;
const HISTORY_FILE = '.necromancers_shell_history';

/**
 * Get the default history file path (~/.necromancers_shell_history)
 */
export function getDefaultHistoryPath(homeDir?: string): string {
  return path.join(homeDir ?? os.homedir(), HISTORY_FILE);
}

export class CommandHistory {
  private buffer: (string | undefined)[];
  /** Slot of the most recent entry */
  private head = -1;
  private count = 0;
  readonly capacity: number;

  constructor(capacity: number = DEFAULT_HISTORY_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.buffer = new Array<string | undefined>(capacity).fill(undefined);
  }

  /**
   * Add a line. Empty lines and repeats of the most recent line are ignored.
   * Returns true if the line was stored.
   */
  add(line: string): boolean {
    if (line === '' || this.get(0) === line) {
      return false;
    }
    this.head = (this.head + 1) % this.capacity;
    this.buffer[this.head] = line;
    if (this.count < this.capacity) {
      this.count++;
    }
    return true;
  }

  /**
   * Entry at index, 0 being the most recent
   */
  get(index: number): string | undefined {
    if (index < 0 || index >= this.count) {
      return undefined;
    }
    const slot = (this.head - index + this.capacity) % this.capacity;
    return this.buffer[slot];
  }

  size(): number {
    return this.count;
  }

  /**
   * All entries, oldest first
   */
  entries(): string[] {
    const result: string[] = [];
    for (let i = this.count - 1; i >= 0; i--) {
      const entry = this.get(i);
      if (entry !== undefined) {
        result.push(entry);
      }
    }
    return result;
  }

  /**
   * Entries containing the query, most recent first
   */
  search(query: string): string[] {
    const matches: string[] = [];
    for (let i = 0; i < this.count; i++) {
      const entry = this.get(i);
      if (entry !== undefined && entry.includes(query)) {
        matches.push(entry);
      }
    }
    return matches;
  }

  clear(): void {
    this.buffer.fill(undefined);
    this.head = -1;
    this.count = 0;
  }

  /**
   * Write the history to a file, oldest first, readable only by the owner
   */
  save(filePath: string): boolean {
    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      const lines = this.entries();
      const content = lines.length > 0 ? `${lines.join('\n')}\n` : '';
      fs.writeFileSync(filePath, content, { encoding: 'utf-8', mode: 0o600 });
      fs.chmodSync(filePath, 0o600);
      log.debug('History saved', { path: filePath, entries: lines.length });
      return true;
    } catch (error) {
      log.warn('Failed to save history', {
        path: filePath,
        err: error instanceof Error ? error : new Error(String(error)),
      });
      return false;
    }
  }

  /**
   * Replay a history file through add(). A missing file is not an error.
   */
  load(filePath: string): boolean {
    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return true;
      }
      log.warn('Failed to load history', {
        path: filePath,
        err: error instanceof Error ? error : new Error(String(error)),
      });
      return false;
    }

    for (const line of content.split('\n')) {
      this.add(line.endsWith('\r') ? line.slice(0, -1) : line);
    }
    log.debug('History loaded', { path: filePath, entries: this.count });
    return true;
  }
}
