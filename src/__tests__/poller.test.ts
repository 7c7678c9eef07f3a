import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from 'vitest';
import { ProgressPoller, LogTailPoller, diffProgress } from '../client/poller.js';
import type { LogQuery, LogSource, ProgressSource } from '../client/api-client.js';
import type { ProgressSnapshot } from '../types.js';
import { TransientIOError } from '../utils/errors.js';
import { setLogLevel } from '../utils/logger.js';

function running(completed: number[], current: number | null): ProgressSnapshot {
  return { completed: false, in_progress: true, completed_tasks: completed, current_task_index: current, rag_id: null };
}

const done: ProgressSnapshot = {
  completed: true,
  in_progress: false,
  completed_tasks: [0, 1],
  current_task_index: null,
  rag_id: 'rag_r1_g1',
};

const idle: ProgressSnapshot = {
  completed: false,
  in_progress: false,
  completed_tasks: [],
  current_task_index: null,
  rag_id: null,
};

/**
 * Progress source answering from a script, one entry per call
 */
function scriptedSource(script: Array<ProgressSnapshot | Error>) {
  const checkProgress = vi.fn<ProgressSource['checkProgress']>(async () => {
    const next = script.shift();
    if (!next) return running([], 0);
    if (next instanceof Error) throw next;
    return next;
  });
  const source: ProgressSource = { checkProgress };
  return { source, checkProgress };
}

describe('diffProgress', () => {
  it('reports everything as new against no previous poll', () => {
    expect(diffProgress(null, running([0], 1))).toEqual({
      newlyCompleted: [0],
      currentChanged: true,
      previousTask: null,
      currentTask: 1,
    });
  });

  it('reports only newly completed tasks and the move of the current task', () => {
    expect(diffProgress(running([0], 1), running([0, 1], 2))).toEqual({
      newlyCompleted: [1],
      currentChanged: true,
      previousTask: 1,
      currentTask: 2,
    });
    expect(diffProgress(running([0], 1), running([0], 1))).toEqual({
      newlyCompleted: [],
      currentChanged: false,
      previousTask: 1,
      currentTask: 1,
    });
  });
});

describe('ProgressPoller', () => {
  beforeAll(() => {
    setLogLevel('error');
  });

  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('polls every two seconds until the run completes', async () => {
    const { source, checkProgress } = scriptedSource([running([], 0), running([0], 1), done]);
    const poller = new ProgressPoller(source);
    const onProgress = vi.fn();
    const onComplete = vi.fn();

    poller.watch('r1', 0, { onProgress, onComplete });
    expect(checkProgress).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(0);
    expect(onProgress).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1999);
    expect(checkProgress).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(checkProgress).toHaveBeenCalledTimes(2);
    expect(onProgress).toHaveBeenLastCalledWith(running([0], 1), {
      newlyCompleted: [0],
      currentChanged: true,
      previousTask: 0,
      currentTask: 1,
    });

    await vi.advanceTimersByTimeAsync(2000);
    expect(onComplete).toHaveBeenCalledWith(done);
    expect(poller.isActive('r1', 0)).toBe(false);

    await vi.advanceTimersByTimeAsync(10000);
    expect(checkProgress).toHaveBeenCalledTimes(3);
  });

  it('stops and reports an interrupted run when the group goes idle', async () => {
    const { source, checkProgress } = scriptedSource([running([], 0), idle]);
    const poller = new ProgressPoller(source);
    const onIdle = vi.fn();
    const onComplete = vi.fn();

    poller.watch('r1', 0, { onComplete, onIdle });
    await vi.advanceTimersByTimeAsync(2000);

    expect(onIdle).toHaveBeenCalledWith(idle);
    expect(onComplete).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(10000);
    expect(checkProgress).toHaveBeenCalledTimes(2);
  });

  it('retries after five seconds when a poll fails', async () => {
    const failure = new TransientIOError('Request failed');
    const { source, checkProgress } = scriptedSource([failure, running([], 0)]);
    const poller = new ProgressPoller(source);
    const onError = vi.fn();

    poller.watch('r1', 0, { onComplete: vi.fn(), onError });
    await vi.advanceTimersByTimeAsync(0);
    expect(onError).toHaveBeenCalledWith(failure, 5000);

    await vi.advanceTimersByTimeAsync(4999);
    expect(checkProgress).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(checkProgress).toHaveBeenCalledTimes(2);
    expect(poller.isActive('r1', 0)).toBe(true);
    poller.stopAll();
  });

  it('keeps one query in flight at a time', async () => {
    const checkProgress = vi.fn<ProgressSource['checkProgress']>(() => new Promise<ProgressSnapshot>(() => {}));
    const poller = new ProgressPoller({ checkProgress });

    poller.watch('r1', 0, { onComplete: vi.fn() });
    await vi.advanceTimersByTimeAsync(20000);

    expect(checkProgress).toHaveBeenCalledTimes(1);
    poller.stopAll();
  });

  it('replaces the watch on the same group instead of stacking timers', async () => {
    const { source, checkProgress } = scriptedSource([]);
    const poller = new ProgressPoller(source);
    const first = vi.fn();
    const second = vi.fn();

    poller.watch('r1', 0, { onComplete: vi.fn(), onProgress: first });
    poller.watch('r1', 0, { onComplete: vi.fn(), onProgress: second });
    expect(poller.activeCount).toBe(1);
    expect(checkProgress).toHaveBeenCalledTimes(2);

    await vi.advanceTimersByTimeAsync(2000);
    expect(checkProgress).toHaveBeenCalledTimes(3);
    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(2);
    poller.stopAll();
  });

  it('watches different groups independently', async () => {
    const { source, checkProgress } = scriptedSource([]);
    const poller = new ProgressPoller(source);

    poller.watch('r1', 0, { onComplete: vi.fn() });
    poller.watch('r1', 1, { onComplete: vi.fn() });
    await vi.advanceTimersByTimeAsync(2000);

    expect(poller.activeCount).toBe(2);
    expect(checkProgress).toHaveBeenCalledTimes(4);
    poller.stop('r1', 1);
    await vi.advanceTimersByTimeAsync(2000);
    expect(checkProgress).toHaveBeenCalledTimes(5);
    poller.stopAll();
  });

  it('ignores an answer that arrives after the watch stopped', async () => {
    let answer: (snapshot: ProgressSnapshot) => void = () => {};
    const checkProgress = vi.fn<ProgressSource['checkProgress']>(
      () => new Promise<ProgressSnapshot>((resolve) => {
        answer = resolve;
      })
    );
    const poller = new ProgressPoller({ checkProgress });
    const onComplete = vi.fn();

    poller.watch('r1', 0, { onComplete });
    poller.stop('r1', 0);
    answer(done);
    await vi.advanceTimersByTimeAsync(10000);

    expect(onComplete).not.toHaveBeenCalled();
    expect(checkProgress).toHaveBeenCalledTimes(1);
  });
});

describe('LogTailPoller', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('refreshes the panel until it is closed', async () => {
    const getLogs = vi.fn<LogSource['getLogs']>(async (_researchId: string, _query?: LogQuery) => ['line']);
    const onLines = vi.fn();
    const panel = new LogTailPoller({ getLogs }, 'r1', onLines, { lines: 50, jobId: 'job-1' });

    panel.open();
    await vi.advanceTimersByTimeAsync(4000);
    expect(getLogs).toHaveBeenCalledTimes(3);
    expect(getLogs).toHaveBeenCalledWith('r1', { lines: 50, jobId: 'job-1' });
    expect(onLines).toHaveBeenCalledWith(['line']);

    panel.close();
    expect(panel.isOpen).toBe(false);
    await vi.advanceTimersByTimeAsync(10000);
    expect(getLogs).toHaveBeenCalledTimes(3);
  });
});
