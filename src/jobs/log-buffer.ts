/**
 * Append-only log buffer
 * One writer, any number of readers. A read copies the entries present at
 * call time, so readers never observe a half-written line.
 */

import type { LogEntry, LogLevel } from '../types.js';

export function formatLogEntry(entry: LogEntry): string {
  return `${new Date(entry.timestamp).toISOString()} - ${entry.level.toUpperCase()} - ${entry.message}`;
}

export class LogBuffer {
  private entries: LogEntry[] = [];
  private appended = 0;

  /**
   * @param retention max entries kept, 0 keeps everything
   */
  constructor(
    private readonly retention: number = 0,
    private readonly now: () => number = Date.now
  ) {}

  append(level: LogLevel, message: string, timestamp: number = this.now()): LogEntry {
    // Multi-line messages become one entry per line
    const lines = message.split(/\r?\n/);
    let last: LogEntry | undefined;
    for (const line of lines) {
      this.appended++;
      last = { seq: this.appended, timestamp, level, message: line };
      this.entries.push(last);
    }

    if (this.retention > 0 && this.entries.length > this.retention) {
      this.entries.splice(0, this.entries.length - this.retention);
    }

    // split() always yields at least one element
    return last ?? { seq: this.appended, timestamp, level, message };
  }

  /**
   * The most recent `maxLines` entries, oldest first
   */
  tail(maxLines: number): LogEntry[] {
    if (maxLines <= 0) return [];
    return this.entries.slice(-maxLines);
  }
}
