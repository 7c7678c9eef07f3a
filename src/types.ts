/**
 * Core types for ResearchFlow
 * Research sessions, task groups and background research jobs
 */

// ============================================================================
// Session / Task Types
// ============================================================================

export interface Task {
  id: string;              // Durable id, independent of position
  index: number;           // Position within the group (public wire identifier)
  description: string;
  completed: boolean;
  notes: string;
}

export interface TaskGroup {
  id: string;
  sessionId: string;
  index: number;           // Position within the session
  prompt: string;          // Originating (refined) prompt
  tasks: Task[];
  researchInProgress: boolean;
  ragId: string | null;    // Set once a retrieval index exists for the group
  createdAt: number;
}

export interface PromptRecord {
  original: string;
  refined: string;
  answers: Record<string, string>;
  createdAt: number;
}

export interface ResearchSession {
  id: string;
  title: string;
  createdAt: number;
  updatedAt: number;
  lastPrompt: { original: string; refined: string };
  prompts: PromptRecord[];
  groups: TaskGroup[];
}

export interface ResearchSessionSummary {
  id: string;
  title: string;
  createdAt: number;
  updatedAt: number;
  groupCount: number;
  taskCount: number;
}

/**
 * Repository for sessions, groups and tasks.
 * Every mutating operation is atomic with respect to readers.
 */
export interface TaskStore {
  createSession(title: string): ResearchSession;
  listSessions(): ResearchSessionSummary[];
  getSession(sessionId: string): ResearchSession | null;
  deleteSession(sessionId: string): boolean;
  recordPrompt(sessionId: string, original: string, refined: string, answers?: Record<string, string>): void;

  createGroup(sessionId: string, prompt: string, descriptions: string[]): TaskGroup;
  getGroup(sessionId: string, groupIndex: number): TaskGroup | null;
  addTask(sessionId: string, groupIndex: number, description: string): Task;
  removeTask(sessionId: string, groupIndex: number, taskIndex: number): void;

  markTaskCompleted(taskId: string): void;
  setResearchInProgress(groupId: string, inProgress: boolean): void;
  setGroupRagId(groupId: string, ragId: string): void;
  resetStaleResearchFlags(): number;
}

// ============================================================================
// Job Types
// ============================================================================

export type JobState =
  | 'queued'      // Waiting for a worker slot
  | 'running'     // Executing tasks
  | 'done'        // All tasks reached a terminal state
  | 'cancelled';  // Dropped from the queue before it started

export type TaskOutcome = 'completed' | 'failed';

/**
 * Wire shape returned by the progress endpoint
 */
export interface ProgressSnapshot {
  completed: boolean;
  in_progress: boolean;
  completed_tasks: number[];
  current_task_index: number | null;
  rag_id: string | null;
}

export type StartRejection =
  | 'not_found'        // Session or group does not exist
  | 'no_pending_tasks' // Every task is already completed
  | 'already_running'  // A run is active for this group
  | 'shutting_down';   // The runner no longer accepts work

export type StartResult =
  | { accepted: true; jobId: string }
  | { accepted: false; reason: StartRejection; error: string };

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  seq: number;             // Position in the buffer's lifetime, starts at 1
  timestamp: number;
  level: LogLevel;
  message: string;
}

// ============================================================================
// Research Pipeline Types
// ============================================================================

/**
 * A piece of content collected for a task, destined for the RAG index
 */
export interface ResearchDocument {
  title: string;
  url: string;
  content: string;
  relevance?: number;      // 0-1 relevance score from the search engine
}

export interface PipelineContext {
  sessionId: string;
  /** Aborted when the attempt times out; lines logged after that are dropped */
  signal: AbortSignal;
  log: (level: LogLevel, message: string) => void;
}

export interface ResearchPipeline {
  research(taskPrompt: string, context: PipelineContext): Promise<ResearchDocument[]>;
}

export interface RagSource {
  title?: string;
  url?: string;
  score: number;
}

export interface RagAnswer {
  response: string;
  sources: RagSource[];
}

// ============================================================================
// Configuration Types
// ============================================================================

export interface QueueConfig {
  maxConcurrent: number;   // Max simultaneous research jobs across all sessions
  taskTimeoutMs: number;   // Timeout for a single task attempt
  retryAttempts: number;   // Attempts per task before it is marked failed
  taskDelayMs: number;     // Pause between two tasks of a run
}

export interface LogConfig {
  retentionLines: number;  // Lines kept per buffer, 0 = keep everything
  defaultTailLines: number;
  maxTailLines: number;
}

export interface SearchConfig {
  engines: string[];       // Which search engines to use
  maxResults: number;
  scrapeTop: number;
  timeoutMs: number;
}

export interface RagConfig {
  topK: number;
}

export interface AIConfig {
  model?: string;
}

export interface Config {
  // Service
  port: number;
  dataDir: string;
  logLevel: LogLevel;

  queue: QueueConfig;
  logs: LogConfig;
  search: SearchConfig;
  rag: RagConfig;
  ai: AIConfig;
}

export const DEFAULT_CONFIG: Config = {
  port: 5000,
  dataDir: '~/.researchflow',
  logLevel: 'info',

  queue: {
    maxConcurrent: 2,
    taskTimeoutMs: 120000,  // 2 minutes
    retryAttempts: 2,
    taskDelayMs: 1000,
  },

  logs: {
    retentionLines: 5000,
    defaultTailLines: 100,
    maxTailLines: 1000,
  },

  search: {
    engines: ['serper', 'brave', 'tavily'],
    maxResults: 10,
    scrapeTop: 3,
    timeoutMs: 30000,
  },

  rag: {
    topK: 5,
  },

  ai: {},
};

// ============================================================================
// API Types
// ============================================================================

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

export interface ServiceStatus {
  running: boolean;
  uptime: number;
  version: string;
  jobs: { queued: number; running: number };
  sessions: number;
}
