/**
 * JobRun
 * State of one research execution for a task group.
 *
 * Every transition is a single synchronous method, so a progress read
 * between two awaits always sees a consistent (completed, current) pair.
 */

import { v4 as uuidv4 } from 'uuid';
import type { JobState, ProgressSnapshot, TaskOutcome } from '../types.js';
import { LogBuffer } from './log-buffer.js';

export interface RunTask {
  id: string;
  index: number;
  description: string;
}

export class JobRun {
  readonly id: string = uuidv4();
  readonly createdAt: number = Date.now();
  startedAt: number | null = null;
  finishedAt: number | null = null;

  private state: JobState = 'queued';
  private currentTaskIndex: number | null = null;
  private completedTasks: number[] = [];
  private failedTasks: number[] = [];
  private ragId: string | null = null;

  /** This run's own log, alongside the session log */
  readonly log: LogBuffer;

  constructor(
    readonly sessionId: string,
    readonly groupId: string,
    readonly groupIndex: number,
    readonly prompt: string,
    readonly tasks: readonly RunTask[],
    logRetention: number = 0
  ) {
    this.log = new LogBuffer(logRetention);
  }

  get status(): JobState {
    return this.state;
  }

  get isActive(): boolean {
    return this.state === 'queued' || this.state === 'running';
  }

  /**
   * Queued -> Running, pointing at the first task
   */
  begin(): void {
    if (this.state !== 'queued') {
      throw new Error(`Cannot begin a run in state ${this.state}`);
    }
    this.state = 'running';
    this.startedAt = Date.now();
    this.currentTaskIndex = this.tasks[0]?.index ?? null;
  }

  /**
   * Record the outcome of the current task and move to the next one in one step
   */
  advance(taskIndex: number, outcome: TaskOutcome, nextIndex: number | null): void {
    if (this.state !== 'running') {
      throw new Error(`Cannot advance a run in state ${this.state}`);
    }
    if (outcome === 'completed') {
      if (!this.completedTasks.includes(taskIndex)) {
        this.completedTasks.push(taskIndex);
      }
    } else if (!this.failedTasks.includes(taskIndex)) {
      this.failedTasks.push(taskIndex);
    }
    this.currentTaskIndex = nextIndex;
  }

  finish(ragId: string | null): void {
    this.state = 'done';
    this.ragId = ragId;
    this.currentTaskIndex = null;
    this.finishedAt = Date.now();
  }

  /**
   * Queued -> Cancelled. Snapshots then read as idle, the way an interrupted run does.
   */
  cancel(): void {
    if (this.state !== 'queued') {
      throw new Error(`Cannot cancel a run in state ${this.state}`);
    }
    this.state = 'cancelled';
    this.finishedAt = Date.now();
  }

  get failed(): readonly number[] {
    return this.failedTasks;
  }

  snapshot(): ProgressSnapshot {
    return {
      completed: this.state === 'done',
      in_progress: this.isActive,
      completed_tasks: [...this.completedTasks],
      current_task_index: this.currentTaskIndex,
      rag_id: this.ragId,
    };
  }
}

/**
 * Answer for a group that has never run (or whose run was discarded)
 */
export function idleSnapshot(): ProgressSnapshot {
  return {
    completed: false,
    in_progress: false,
    completed_tasks: [],
    current_task_index: null,
    rag_id: null,
  };
}
