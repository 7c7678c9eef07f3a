/**
 * Log Tail Service
 * Per-session research logs, mirrored to the service logger, tailed by pollers
 */

import { EventEmitter } from 'events';
import type { LogConfig, LogLevel } from '../types.js';
import { Logger } from '../utils/logger.js';
import { LogBuffer, formatLogEntry } from './log-buffer.js';

/**
 * Writer handed to whoever produces lines for a session (and optionally a job)
 */
export class ResearchLog {
  constructor(
    private readonly sessionId: string,
    private readonly targets: LogBuffer[],
    private readonly logger: Logger,
    private readonly onLine: (sessionId: string, line: string) => void
  ) {}

  debug(message: string): void {
    this.write('debug', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  error(message: string): void {
    this.write('error', message);
  }

  write(level: LogLevel, message: string): void {
    this.logger.log(level, message);
    // One timestamp so the session and job logs carry identical lines
    const timestamp = Date.now();
    let line: string | null = null;
    for (const buffer of this.targets) {
      const entry = buffer.append(level, message, timestamp);
      line ??= formatLogEntry(entry);
    }
    if (line !== null) {
      this.onLine(this.sessionId, line);
    }
  }
}

export class LogTailService extends EventEmitter {
  private sessions: Map<string, LogBuffer> = new Map();
  private config: LogConfig;

  constructor(config: LogConfig) {
    super();
    this.config = config;
  }

  /**
   * Writer for a session's log, optionally also feeding a job's own buffer
   */
  forSession(sessionId: string, jobBuffer?: LogBuffer): ResearchLog {
    const targets = [this.sessionBuffer(sessionId)];
    if (jobBuffer) targets.push(jobBuffer);
    return new ResearchLog(
      sessionId,
      targets,
      new Logger(`research.${sessionId}`),
      (id, line) => this.emit('line', id, line)
    );
  }

  dropSession(sessionId: string): void {
    this.sessions.delete(sessionId);
  }

  /**
   * Most recent lines of a session's log, oldest first. Never blocks.
   */
  tailSession(sessionId: string, maxLines?: number): string[] {
    const buffer = this.sessions.get(sessionId);
    if (!buffer) return [];
    return buffer.tail(this.clamp(maxLines)).map(formatLogEntry);
  }

  /**
   * Same as tailSession for a job's own buffer
   */
  tailBuffer(buffer: LogBuffer, maxLines?: number): string[] {
    return buffer.tail(this.clamp(maxLines)).map(formatLogEntry);
  }

  private clamp(maxLines: number | undefined): number {
    if (maxLines === undefined) return this.config.defaultTailLines;
    return Math.min(Math.max(0, Math.floor(maxLines)), this.config.maxTailLines);
  }

  private sessionBuffer(sessionId: string): LogBuffer {
    let buffer = this.sessions.get(sessionId);
    if (!buffer) {
      buffer = new LogBuffer(this.config.retentionLines);
      this.sessions.set(sessionId, buffer);
    }
    return buffer;
  }
}
