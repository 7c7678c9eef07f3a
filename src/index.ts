/**
 * ResearchFlow
 * Background research jobs over task groups, with progress and log polling
 *
 * Provides:
 * - Research sessions, task groups and tasks in SQLite
 * - Bounded worker pool running web research per task
 * - Progress snapshots and log tails for polling UIs
 * - RAG queries over the collected results
 */

// Core exports
export { ResearchService } from './service/server.js';
export type { ResearchServiceOptions } from './service/server.js';
export { JobRunner } from './queue/job-runner.js';
export { JobRun, idleSnapshot } from './jobs/job-run.js';
export { LogBuffer, formatLogEntry } from './jobs/log-buffer.js';
export { LogTailService, ResearchLog } from './jobs/log-tail.js';
export { ProgressQueryService } from './jobs/progress-service.js';

// Research
export { WebResearchPipeline } from './crew/research-pipeline.js';
export { WebSearchAgent } from './agents/web-search.js';
export { TaskGenerator } from './agents/task-generator.js';
export { Brainstormer } from './agents/brainstorming.js';
export { RagStorage } from './rag/storage.js';
export { ClaudeAgentProvider, getAIProvider } from './ai/provider.js';
export type { AIProvider } from './ai/provider.js';

// Client
export { ResearchFlowClient } from './client/api-client.js';
export { ProgressPoller, LogTailPoller, PollingLoop, diffProgress } from './client/poller.js';
export type { ProgressHandlers, ProgressDiff } from './client/poller.js';

// Database
export { ResearchDatabase, getDatabase, closeDatabase, MEMORY_DB } from './database/index.js';

// Utilities
export { Logger, setLogLevel, setLogFile } from './utils/logger.js';
export { ConfigManager, getConfig } from './utils/config.js';
export {
  ResearchFlowError,
  NotFoundError,
  ConflictError,
  ValidationError,
  TransientIOError,
  ServiceError,
} from './utils/errors.js';

// Types
export type {
  Task,
  TaskGroup,
  ResearchSession,
  ResearchSessionSummary,
  TaskStore,
  JobState,
  ProgressSnapshot,
  StartResult,
  ResearchDocument,
  ResearchPipeline,
  RagAnswer,
  Config,
  QueueConfig,
  ServiceStatus,
  ApiResponse,
} from './types.js';

export { DEFAULT_CONFIG } from './types.js';
