/**
 * Job Runner
 * Starts research runs for task groups and executes them on a bounded worker pool
 */

import { EventEmitter } from 'events';
import type {
  QueueConfig,
  ResearchDocument,
  ResearchPipeline,
  StartResult,
  TaskOutcome,
  TaskStore,
} from '../types.js';
import { JobRun, type RunTask } from '../jobs/job-run.js';
import type { LogTailService, ResearchLog } from '../jobs/log-tail.js';
import { RagStorage } from '../rag/storage.js';
import { withTimeout } from '../agents/web-search.js';
import { Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

export interface JobRunnerDeps {
  store: TaskStore;
  pipeline: ResearchPipeline;
  rag: RagStorage;
  logs: LogTailService;
  config: QueueConfig;
  logRetention?: number;
}

/**
 * Events:
 * - jobQueued(run), jobStarted(run), jobProgress(run, snapshot), jobCompleted(run), jobCancelled(run)
 */
export class JobRunner extends EventEmitter {
  private store: TaskStore;
  private pipeline: ResearchPipeline;
  private rag: RagStorage;
  private logs: LogTailService;
  private config: QueueConfig;
  private logRetention: number;
  private logger = new Logger('JobRunner');

  // Latest run per group id; a finished run stays until the next start replaces it
  private runsByGroup: Map<string, JobRun> = new Map();
  private runsById: Map<string, JobRun> = new Map();
  private pending: JobRun[] = [];
  private running: Map<string, Promise<void>> = new Map();
  private accepting = true;

  constructor(deps: JobRunnerDeps) {
    super();
    this.store = deps.store;
    this.pipeline = deps.pipeline;
    this.rag = deps.rag;
    this.logs = deps.logs;
    this.config = deps.config;
    this.logRetention = deps.logRetention ?? 0;
  }

  /**
   * Accept or reject a research run. Validation and the one-run-per-group
   * guard happen synchronously, so two concurrent starts cannot both pass.
   */
  start(sessionId: string, groupIndex: number): StartResult {
    if (!this.accepting) {
      this.logger.warn(`Research not started for ${sessionId}, shutting down`);
      return { accepted: false, reason: 'shutting_down', error: 'Service is shutting down' };
    }

    // Unknown sessions get no log buffer
    if (!this.store.getSession(sessionId)) {
      this.logger.warn(`Research not found: ${sessionId}`);
      return { accepted: false, reason: 'not_found', error: 'Research not found' };
    }

    const log = this.logs.forSession(sessionId);
    log.info(`Starting research for group ${groupIndex}`);

    const group = this.store.getGroup(sessionId, groupIndex);
    if (!group) {
      log.error(`Group not found: ${groupIndex}`);
      return { accepted: false, reason: 'not_found', error: 'Group not found' };
    }

    const existing = this.runsByGroup.get(group.id);
    if ((existing && existing.isActive) || group.researchInProgress) {
      log.warn(`Research already in progress for group ${groupIndex}`);
      return { accepted: false, reason: 'already_running', error: 'Research already in progress for this group' };
    }

    const tasks: RunTask[] = group.tasks
      .filter((t) => !t.completed)
      .map((t) => ({ id: t.id, index: t.index, description: t.description }));
    if (tasks.length === 0) {
      log.warn('There are no tasks left to complete');
      return { accepted: false, reason: 'no_pending_tasks', error: 'There are no tasks left to complete' };
    }

    // The previous run (and its log buffer) is discarded here
    if (existing) {
      this.runsById.delete(existing.id);
    }

    const run = new JobRun(sessionId, group.id, groupIndex, group.prompt, tasks, this.logRetention);
    this.registerRun(run);
    this.store.setResearchInProgress(group.id, true);

    this.logs.forSession(sessionId, run.log).info(`Preparing research for ${tasks.length} tasks (job ${run.id})`);
    this.pending.push(run);
    this.emit('jobQueued', run);
    this.processQueue();

    return { accepted: true, jobId: run.id };
  }

  /**
   * Latest run for a group, active or finished
   */
  getRun(groupId: string): JobRun | undefined {
    return this.runsByGroup.get(groupId);
  }

  getRunById(jobId: string): JobRun | undefined {
    return this.runsById.get(jobId);
  }

  /**
   * Drop the finished runs of a deleted session, job logs included
   */
  forgetSession(sessionId: string): void {
    for (const run of this.runsById.values()) {
      if (run.sessionId !== sessionId || run.isActive) continue;
      this.runsById.delete(run.id);
      if (this.runsByGroup.get(run.groupId) === run) {
        this.runsByGroup.delete(run.groupId);
      }
    }
  }

  getStats(): { queued: number; running: number } {
    return { queued: this.pending.length, running: this.running.size };
  }

  /**
   * Stop accepting work, cancel queued runs and wait for running ones
   */
  async shutdown(): Promise<void> {
    this.accepting = false;

    for (const run of this.pending.splice(0)) {
      this.logs.forSession(run.sessionId, run.log).warn('Research cancelled before it started');
      run.cancel();
      this.store.setResearchInProgress(run.groupId, false);
      this.emit('jobCancelled', run);
    }

    if (this.running.size > 0) {
      this.logger.info(`Waiting for ${this.running.size} running jobs`);
      await Promise.all(this.running.values());
    }
  }

  private registerRun(run: JobRun): void {
    this.runsByGroup.set(run.groupId, run);
    this.runsById.set(run.id, run);
  }

  /**
   * Fill free worker slots from the pending list
   */
  private processQueue(): void {
    while (this.running.size < this.config.maxConcurrent && this.pending.length > 0) {
      const run = this.pending.shift();
      if (!run) break;

      const promise = this.execute(run)
        .catch((error) => {
          this.logger.error(`Job ${run.id} crashed`, error);
        })
        .finally(() => {
          this.running.delete(run.id);
          this.processQueue();
        });
      this.running.set(run.id, promise);
    }
  }

  private async execute(run: JobRun): Promise<void> {
    const log = this.logs.forSession(run.sessionId, run.log);
    run.begin();
    this.emit('jobStarted', run);
    log.info(`Research started for group ${run.groupIndex}`);

    const documents: ResearchDocument[] = [];
    let ragId: string | null = null;

    try {
      for (let i = 0; i < run.tasks.length; i++) {
        const task = run.tasks[i];
        const next = run.tasks[i + 1];
        log.info(`Starting task ${i + 1}/${run.tasks.length} (index ${task.index}): ${task.description}`);

        const outcome = await this.executeTask(run, task, log, documents);

        // Outcome and the move to the next task are one transition
        run.advance(task.index, outcome, next ? next.index : null);
        this.emit('jobProgress', run, run.snapshot());

        if (next && this.config.taskDelayMs > 0) {
          await sleep(this.config.taskDelayMs);
        }
      }

      if (documents.length > 0) {
        ragId = this.buildIndex(run, documents, log);
      } else {
        log.warn('No results found across all tasks, no RAG index was created');
      }
    } finally {
      // Flag, rag id and completion become visible together
      this.store.setResearchInProgress(run.groupId, false);
      run.finish(ragId);
      log.info(`Research completed for group ${run.groupIndex}` +
        (run.failed.length > 0 ? ` (${run.failed.length} failed tasks)` : ''));
      this.emit('jobProgress', run, run.snapshot());
      this.emit('jobCompleted', run);
    }
  }

  private async executeTask(
    run: JobRun,
    task: RunTask,
    log: ResearchLog,
    documents: ResearchDocument[]
  ): Promise<TaskOutcome> {
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= this.config.retryAttempts; attempt++) {
      // Aborted on timeout; lines the abandoned attempt logs afterwards are dropped
      const controller = new AbortController();
      try {
        const results = await withTimeout(
          this.pipeline.research(task.description, {
            sessionId: run.sessionId,
            signal: controller.signal,
            log: (level, message) => {
              if (!controller.signal.aborted) log.write(level, message);
            },
          }),
          this.config.taskTimeoutMs,
          'Task timeout',
          () => controller.abort()
        );

        if (results.length > 0) {
          documents.push(...results);
          log.info(`Found ${results.length} results for task ${task.index}`);
        } else {
          log.warn(`No results found for task ${task.index}`);
        }

        this.store.markTaskCompleted(task.id);
        log.info(`Task ${task.index} completed`);
        return 'completed';
      } catch (error) {
        lastError = error;
        log.warn(`Task ${task.index} attempt ${attempt} failed: ${errorMessage(error)}`);
        if (attempt < this.config.retryAttempts) {
          await sleep(1000 * attempt);
        }
      }
    }

    log.error(`Research failed for task ${task.index}: ${errorMessage(lastError)}`);
    return 'failed';
  }

  private buildIndex(run: JobRun, documents: ResearchDocument[], log: ResearchLog): string | null {
    const ragId = RagStorage.indexIdFor(run.sessionId, run.groupId);
    log.info(`Building RAG index ${ragId} from ${documents.length} results`);
    try {
      this.rag.saveResults(ragId, {
        sessionId: run.sessionId,
        groupId: run.groupId,
        task: `Research for group: ${run.prompt || 'Task group'}`,
      }, documents);
      this.store.setGroupRagId(run.groupId, ragId);
      return ragId;
    } catch (error) {
      log.error(`Failed to build RAG index: ${errorMessage(error)}`);
      return null;
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
