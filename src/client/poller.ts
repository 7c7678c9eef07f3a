/**
 * Client Pollers
 * Cooperative polling of research progress and logs.
 *
 * At most one query is in flight per loop: the next tick is scheduled only
 * after the previous query settles. Stopping a loop bumps its generation, so a
 * query that settles afterwards cannot reschedule, and ticks check `active`
 * before calling handlers.
 */

import type { ProgressSnapshot } from '../types.js';
import type { LogQuery, LogSource, ProgressSource } from './api-client.js';
import { Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

export const DEFAULT_POLL_INTERVAL_MS = 2000;
export const DEFAULT_RETRY_DELAY_MS = 5000;

export interface PollerOptions {
  intervalMs?: number;
  retryDelayMs?: number;
}

type TickResult = 'continue' | 'stop';

export class PollingLoop {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private generation = 0;
  private running = false;
  private logger = new Logger('PollingLoop');

  constructor(
    private readonly tick: () => Promise<TickResult>,
    private readonly intervalMs: number,
    private readonly retryDelayMs: number,
    private readonly onError: (error: unknown, retryMs: number) => void = () => {}
  ) {}

  get active(): boolean {
    return this.running;
  }

  /**
   * Tick now, then keep ticking until the tick asks to stop. Restarts a running loop.
   */
  start(): void {
    this.stop();
    this.running = true;
    this.run(this.generation);
  }

  stop(): void {
    this.generation++;
    this.running = false;
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private run(generation: number): void {
    this.timer = null;
    this.tick()
      .then(
        (result) => {
          if (generation !== this.generation) return;
          if (result === 'stop') {
            this.running = false;
            return;
          }
          this.schedule(generation, this.intervalMs);
        },
        (error: unknown) => {
          if (generation !== this.generation) {
            this.logger.debug(`Poll settled after stop: ${errorMessage(error)}`);
            return;
          }
          // Keep polling; the handler only reports
          this.schedule(generation, this.retryDelayMs);
          this.onError(error, this.retryDelayMs);
        }
      )
      .catch((error: unknown) => {
        this.logger.error('Poll handler failed', error);
      });
  }

  private schedule(generation: number, delayMs: number): void {
    this.timer = setTimeout(() => this.run(generation), delayMs);
  }
}

// ============================================================================
// Progress
// ============================================================================

export interface ProgressDiff {
  newlyCompleted: number[];
  currentChanged: boolean;
  previousTask: number | null;
  currentTask: number | null;
}

/**
 * What changed between two polls, for incremental rendering
 */
export function diffProgress(previous: ProgressSnapshot | null, next: ProgressSnapshot): ProgressDiff {
  const known = new Set(previous?.completed_tasks ?? []);
  const previousTask = previous?.current_task_index ?? null;
  return {
    newlyCompleted: next.completed_tasks.filter((index) => !known.has(index)),
    currentChanged: previousTask !== next.current_task_index,
    previousTask,
    currentTask: next.current_task_index,
  };
}

export interface ProgressHandlers {
  onProgress?: (snapshot: ProgressSnapshot, diff: ProgressDiff) => void;
  /** Run finished; the caller refreshes its full state */
  onComplete: (snapshot: ProgressSnapshot) => void;
  /** Nothing is running and nothing finished: the run was interrupted */
  onIdle?: (snapshot: ProgressSnapshot) => void;
  onError?: (error: unknown, retryMs: number) => void;
}

export class ProgressPoller {
  private watches: Map<string, PollingLoop> = new Map();
  private intervalMs: number;
  private retryDelayMs: number;

  constructor(
    private readonly source: ProgressSource,
    options: PollerOptions = {}
  ) {
    this.intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  }

  /**
   * Poll a group until it completes or goes idle. Replaces any watch on the same group.
   */
  watch(researchId: string, groupIndex: number, handlers: ProgressHandlers): void {
    const key = watchKey(researchId, groupIndex);
    this.stop(researchId, groupIndex);

    let previous: ProgressSnapshot | null = null;
    const loop: PollingLoop = new PollingLoop(
      async () => {
        const snapshot = await this.source.checkProgress(researchId, groupIndex);
        if (!loop.active) return 'stop';

        if (snapshot.completed) {
          this.release(key, loop);
          loop.stop();
          handlers.onComplete(snapshot);
          return 'stop';
        }
        if (!snapshot.in_progress) {
          this.release(key, loop);
          loop.stop();
          handlers.onIdle?.(snapshot);
          return 'stop';
        }

        handlers.onProgress?.(snapshot, diffProgress(previous, snapshot));
        previous = snapshot;
        return 'continue';
      },
      this.intervalMs,
      this.retryDelayMs,
      handlers.onError
    );

    this.watches.set(key, loop);
    loop.start();
  }

  stop(researchId: string, groupIndex: number): void {
    const key = watchKey(researchId, groupIndex);
    const loop = this.watches.get(key);
    if (loop) {
      loop.stop();
      this.watches.delete(key);
    }
  }

  stopAll(): void {
    for (const loop of this.watches.values()) {
      loop.stop();
    }
    this.watches.clear();
  }

  isActive(researchId: string, groupIndex: number): boolean {
    return this.watches.get(watchKey(researchId, groupIndex))?.active ?? false;
  }

  get activeCount(): number {
    return this.watches.size;
  }

  private release(key: string, loop: PollingLoop): void {
    if (this.watches.get(key) === loop) {
      this.watches.delete(key);
    }
  }
}

function watchKey(researchId: string, groupIndex: number): string {
  return `${researchId}:${groupIndex}`;
}

// ============================================================================
// Logs
// ============================================================================

export interface LogTailPollerOptions extends PollerOptions, LogQuery {}

/**
 * Log panel poller: hands the latest tail to the panel on every tick until closed
 */
export class LogTailPoller {
  private loop: PollingLoop;

  constructor(
    source: LogSource,
    researchId: string,
    onLines: (lines: string[]) => void,
    options: LogTailPollerOptions = {},
    onError?: (error: unknown, retryMs: number) => void
  ) {
    const query: LogQuery = { lines: options.lines, jobId: options.jobId };
    this.loop = new PollingLoop(
      async () => {
        const lines = await source.getLogs(researchId, query);
        if (!this.loop.active) return 'stop';
        onLines(lines);
        return 'continue';
      },
      options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS,
      options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS,
      onError
    );
  }

  open(): void {
    this.loop.start();
  }

  close(): void {
    this.loop.stop();
  }

  get isOpen(): boolean {
    return this.loop.active;
  }
}
