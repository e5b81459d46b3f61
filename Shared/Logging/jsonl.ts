/**
 * Append-only JSONL (JSON Lines) log.
 */

import { appendFile, readFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { isErrnoException } from '../Types/errors.js';

/**
 * Every entry carries an ISO-8601 timestamp.
 */
export interface BaseLogEntry {
  timestamp: string;
}

export interface JsonlReadOptions {
  /** Maximum number of entries to return (default: 100) */
  limit?: number;
}

/**
 * @example
 * ```typescript
 * interface RunEntry extends BaseLogEntry {
 *   language: string;
 *   exit_code: number;
 * }
 *
 * const history = new JsonlLogger<RunEntry>('/tmp/runs.jsonl', isRunEntry);
 * await history.write({ timestamp: createTimestamp(), language: 'sh', exit_code: 0 });
 * ```
 */
export class JsonlLogger<T extends BaseLogEntry> {
  private readonly logPath: string;
  private readonly isEntry: (value: unknown) => value is T;
  private dirReady = false;

  /**
   * @param isEntry - guard applied to every parsed line on read; lines that
   *   fail it (or are not JSON) are skipped
   */
  constructor(logPath: string, isEntry: (value: unknown) => value is T) {
    this.logPath = logPath;
    this.isEntry = isEntry;
  }

  async write(entry: T): Promise<void> {
    if (!this.dirReady) {
      await mkdir(dirname(this.logPath), { recursive: true });
      this.dirReady = true;
    }
    await appendFile(this.logPath, JSON.stringify(entry) + '\n', 'utf-8');
  }

  async read(options: JsonlReadOptions = {}): Promise<T[]> {
    let content: string;
    try {
      content = await readFile(this.logPath, 'utf-8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return [];
      throw err;
    }

    const entries: T[] = [];
    for (const line of content.split('\n')) {
      if (!line.trim()) continue;
      const parsed = parseLine(line);
      if (this.isEntry(parsed)) entries.push(parsed);
    }

    // Newest first. Reversed before the stable sort so entries sharing a
    // timestamp keep later-written-first order.
    entries.reverse();
    entries.sort((a, b) => new Date(b.timestamp).getTime() - new Date(a.timestamp).getTime());

    return entries.slice(0, options.limit ?? 100);
  }

  getPath(): string {
    return this.logPath;
  }
}

function parseLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    // Torn or hand-edited line
    return undefined;
  }
}

export function createTimestamp(): string {
  return new Date().toISOString();
}
