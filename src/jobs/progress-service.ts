/**
 * Progress Query Service
 * Point-in-time view of a group's research run, safe to call at any time
 */

import type { ProgressSnapshot, TaskStore } from '../types.js';
import type { JobRunner } from '../queue/job-runner.js';
import { idleSnapshot } from './job-run.js';

export class ProgressQueryService {
  constructor(
    private readonly store: TaskStore,
    private readonly runner: JobRunner
  ) {}

  poll(sessionId: string, groupIndex: number): ProgressSnapshot {
    const group = this.store.getGroup(sessionId, groupIndex);
    if (!group) return idleSnapshot();

    const run = this.runner.getRun(group.id);
    if (!run || run.status === 'cancelled') {
      // Nothing ran in this process; an index from an earlier run still counts
      return { ...idleSnapshot(), rag_id: group.ragId };
    }
    return run.snapshot();
  }
}
