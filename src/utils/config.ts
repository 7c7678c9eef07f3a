/**
 * Configuration Manager
 * Defaults, then <dataDir>/config.json, then environment overrides
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { dirname, join } from 'path';
import type { Config, LogLevel } from '../types.js';
import { DEFAULT_CONFIG } from '../types.js';
import { ValidationError } from './errors.js';

export type ConfigOverrides = {
  [K in keyof Config]?: Config[K] extends unknown[]
    ? Config[K]
    : Config[K] extends object
      ? Partial<Config[K]>
      : Config[K];
};

export interface ConfigManagerOptions {
  /** File to load and persist; null keeps the configuration in memory only */
  configPath?: string | null;
  overrides?: ConfigOverrides;
  env?: NodeJS.ProcessEnv;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function cloneDefaults(): Config {
  return {
    ...DEFAULT_CONFIG,
    queue: { ...DEFAULT_CONFIG.queue },
    logs: { ...DEFAULT_CONFIG.logs },
    search: { ...DEFAULT_CONFIG.search, engines: [...DEFAULT_CONFIG.search.engines] },
    rag: { ...DEFAULT_CONFIG.rag },
    ai: { ...DEFAULT_CONFIG.ai },
  };
}

export function expandHome(path: string): string {
  return path.startsWith('~') ? join(homedir(), path.slice(1)) : path;
}

export class ConfigManager {
  private config: Config;
  private configPath: string | null;

  constructor(options: ConfigManagerOptions = {}) {
    const env = options.env ?? process.env;
    this.config = cloneDefaults();

    const dataDir = env.RESEARCHFLOW_DATA_DIR ?? options.overrides?.dataDir ?? DEFAULT_CONFIG.dataDir;
    this.configPath = options.configPath === undefined
      ? join(expandHome(dataDir), 'config.json')
      : options.configPath;

    if (this.configPath && existsSync(this.configPath)) {
      const parsed: unknown = JSON.parse(readFileSync(this.configPath, 'utf-8'));
      this.merge(this.config, parsed);
    }

    if (options.overrides) {
      this.merge(this.config, options.overrides);
    }

    this.applyEnv(env);
    this.validate(this.config);
  }

  get(): Config {
    return this.config;
  }

  getValue<K extends keyof Config>(key: K): Config[K] {
    return this.config[key];
  }

  /**
   * Merge a partial configuration (e.g. a PATCH body) into the current one
   */
  update(partial: unknown): void {
    // Checked on a copy first: components hold the live sections
    const candidate = structuredClone(this.config);
    this.merge(candidate, partial);
    this.validate(candidate);

    this.merge(this.config, partial);
    this.save();
  }

  getDataDir(): string {
    return expandHome(this.config.dataDir);
  }

  private merge(target: Config, partial: unknown): void {
    if (!isRecord(partial)) {
      throw new ValidationError('Configuration must be an object');
    }

    if (typeof partial.port === 'number') target.port = partial.port;
    if (typeof partial.dataDir === 'string') target.dataDir = partial.dataDir;
    if (typeof partial.logLevel === 'string') target.logLevel = this.parseLogLevel(partial.logLevel);

    if (isRecord(partial.queue)) {
      const queue = partial.queue;
      if (typeof queue.maxConcurrent === 'number') target.queue.maxConcurrent = queue.maxConcurrent;
      if (typeof queue.taskTimeoutMs === 'number') target.queue.taskTimeoutMs = queue.taskTimeoutMs;
      if (typeof queue.retryAttempts === 'number') target.queue.retryAttempts = queue.retryAttempts;
      if (typeof queue.taskDelayMs === 'number') target.queue.taskDelayMs = queue.taskDelayMs;
    }

    if (isRecord(partial.logs)) {
      const logs = partial.logs;
      if (typeof logs.retentionLines === 'number') target.logs.retentionLines = logs.retentionLines;
      if (typeof logs.defaultTailLines === 'number') target.logs.defaultTailLines = logs.defaultTailLines;
      if (typeof logs.maxTailLines === 'number') target.logs.maxTailLines = logs.maxTailLines;
    }

    if (isRecord(partial.search)) {
      const search = partial.search;
      if (Array.isArray(search.engines)) {
        target.search.engines = search.engines.filter((e): e is string => typeof e === 'string');
      }
      if (typeof search.maxResults === 'number') target.search.maxResults = search.maxResults;
      if (typeof search.scrapeTop === 'number') target.search.scrapeTop = search.scrapeTop;
      if (typeof search.timeoutMs === 'number') target.search.timeoutMs = search.timeoutMs;
    }

    if (isRecord(partial.rag) && typeof partial.rag.topK === 'number') {
      target.rag.topK = partial.rag.topK;
    }

    if (isRecord(partial.ai) && typeof partial.ai.model === 'string') {
      target.ai.model = partial.ai.model;
    }
  }

  private applyEnv(env: NodeJS.ProcessEnv): void {
    if (env.PORT) this.config.port = this.parseInteger('PORT', env.PORT);
    if (env.RESEARCHFLOW_DATA_DIR) this.config.dataDir = env.RESEARCHFLOW_DATA_DIR;
    if (env.LOG_LEVEL) this.config.logLevel = this.parseLogLevel(env.LOG_LEVEL);
    if (env.RESEARCHFLOW_MAX_CONCURRENT) {
      this.config.queue.maxConcurrent = this.parseInteger('RESEARCHFLOW_MAX_CONCURRENT', env.RESEARCHFLOW_MAX_CONCURRENT);
    }
  }

  private parseInteger(name: string, raw: string): number {
    const value = Number.parseInt(raw, 10);
    if (Number.isNaN(value)) {
      throw new ValidationError(`${name} must be an integer, got "${raw}"`);
    }
    return value;
  }

  private parseLogLevel(raw: string): LogLevel {
    const level = LOG_LEVELS.find((l) => l === raw.toLowerCase());
    if (!level) {
      throw new ValidationError(`logLevel must be one of ${LOG_LEVELS.join(', ')}`);
    }
    return level;
  }

  private validate(config: Config): void {
    const { port, queue, logs, rag } = config;
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
      throw new ValidationError('port must be between 0 and 65535');
    }
    if (queue.maxConcurrent < 1) {
      throw new ValidationError('queue.maxConcurrent must be at least 1');
    }
    if (queue.retryAttempts < 1) {
      throw new ValidationError('queue.retryAttempts must be at least 1');
    }
    if (queue.taskTimeoutMs <= 0 || queue.taskDelayMs < 0) {
      throw new ValidationError('queue timings must be positive');
    }
    if (logs.retentionLines < 0 || logs.defaultTailLines < 1 || logs.maxTailLines < logs.defaultTailLines) {
      throw new ValidationError('logs limits are inconsistent');
    }
    if (rag.topK < 1) {
      throw new ValidationError('rag.topK must be at least 1');
    }
  }

  private save(): void {
    if (!this.configPath) return;
    const dir = dirname(this.configPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    writeFileSync(this.configPath, JSON.stringify(this.config, null, 2));
  }
}

// Singleton instance
let instance: ConfigManager | null = null;

export function getConfig(): ConfigManager {
  if (!instance) {
    instance = new ConfigManager();
  }
  return instance;
}
