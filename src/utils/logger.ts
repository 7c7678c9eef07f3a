/**
 * Logger
 * Context-named logger with a global level and an optional file sink
 */

import { appendFileSync, mkdirSync, existsSync } from 'fs';
import { dirname } from 'path';
import type { LogLevel } from '../types.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let currentLevel: LogLevel = 'info';
let logFile: string | null = null;

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

/**
 * Mirror every emitted line into a file. Pass null to disable.
 */
export function setLogFile(path: string | null): void {
  if (path) {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }
  logFile = path;
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function formatData(data: unknown): string {
  if (data === undefined) return '';
  if (data instanceof Error) {
    return ` ${data.name}: ${data.message}`;
  }
  if (typeof data === 'string') return ` ${data}`;
  try {
    return ` ${JSON.stringify(data)}`;
  } catch {
    return ` ${String(data)}`;
  }
}

export class Logger {
  constructor(private readonly context: string) {}

  debug(message: string, data?: unknown): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.write('error', message, data);
  }

  log(level: LogLevel, message: string, data?: unknown): void {
    this.write(level, message, data);
  }

  private write(level: LogLevel, message: string, data?: unknown): void {
    if (!isLevelEnabled(level)) return;

    const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] [${this.context}] ${message}${formatData(data)}`;

    // stderr keeps stdout clean for CLI output
    if (level === 'error' || level === 'warn') {
      console.error(line);
    } else {
      console.log(line);
    }

    if (logFile) {
      try {
        appendFileSync(logFile, line + '\n');
      } catch (error) {
        console.error(`[Logger] Failed to write log file ${logFile}:`, error);
        logFile = null;
      }
    }
  }
}
