/**
 * Database module for ResearchFlow
 * Uses SQLite with FTS5 for the retrieval index
 */

import Database from 'better-sqlite3';
import { mkdirSync, existsSync } from 'fs';
import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';
import type {
  PromptRecord,
  ResearchDocument,
  ResearchSession,
  ResearchSessionSummary,
  Task,
  TaskGroup,
  TaskStore,
} from '../types.js';
import { expandHome } from '../utils/config.js';
import { ConflictError, NotFoundError, ValidationError } from '../utils/errors.js';

interface SessionRow {
  id: string;
  title: string;
  created_at: number;
  updated_at: number;
  last_prompt_original: string;
  last_prompt_refined: string;
}

interface SessionSummaryRow {
  id: string;
  title: string;
  created_at: number;
  updated_at: number;
  group_count: number;
  task_count: number;
}

interface GroupRow {
  id: string;
  session_id: string;
  position: number;
  prompt: string;
  research_in_progress: number;
  rag_id: string | null;
  created_at: number;
}

interface TaskRow {
  id: string;
  group_id: string;
  position: number;
  description: string;
  completed: number;
  notes: string;
}

interface PromptRow {
  original: string;
  refined: string;
  answers: string;
  created_at: number;
}

interface RagIndexRow {
  id: string;
  session_id: string;
  group_id: string;
  task: string;
  document_count: number;
  created_at: number;
  updated_at: number;
}

interface RagMatchRow {
  title: string;
  url: string;
  content: string;
  match_rank: number;
}

export interface RagIndexInfo {
  id: string;
  sessionId: string;
  groupId: string;
  task: string;
  documentCount: number;
  createdAt: number;
  updatedAt: number;
}

export interface RagMatch {
  title: string;
  url: string;
  content: string;
  score: number;           // Higher is better
}

export const MEMORY_DB = ':memory:';

export class ResearchDatabase implements TaskStore {
  private db: Database.Database;

  /**
   * @param location data directory holding research.db, or ':memory:'
   */
  constructor(location: string = '~/.researchflow') {
    if (location === MEMORY_DB) {
      this.db = new Database(MEMORY_DB);
    } else {
      const dataDir = expandHome(location);
      if (!existsSync(dataDir)) {
        mkdirSync(dataDir, { recursive: true });
      }
      this.db = new Database(join(dataDir, 'research.db'));
      // Enable WAL mode for better concurrency
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('foreign_keys = ON');
    this.initialize();
  }

  private initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS research_sessions (
        id TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL,
        last_prompt_original TEXT NOT NULL DEFAULT '',
        last_prompt_refined TEXT NOT NULL DEFAULT ''
      );

      CREATE TABLE IF NOT EXISTS prompt_history (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id TEXT NOT NULL,
        original TEXT NOT NULL,
        refined TEXT NOT NULL,
        answers TEXT NOT NULL DEFAULT '{}',
        created_at INTEGER NOT NULL,
        FOREIGN KEY (session_id) REFERENCES research_sessions(id) ON DELETE CASCADE
      );

      CREATE TABLE IF NOT EXISTS task_groups (
        id TEXT PRIMARY KEY,
        session_id TEXT NOT NULL,
        position INTEGER NOT NULL,
        prompt TEXT NOT NULL,
        research_in_progress INTEGER NOT NULL DEFAULT 0,
        rag_id TEXT,
        created_at INTEGER NOT NULL,
        FOREIGN KEY (session_id) REFERENCES research_sessions(id) ON DELETE CASCADE
      );

      CREATE TABLE IF NOT EXISTS tasks (
        id TEXT PRIMARY KEY,
        group_id TEXT NOT NULL,
        position INTEGER NOT NULL,
        description TEXT NOT NULL,
        completed INTEGER NOT NULL DEFAULT 0,
        notes TEXT NOT NULL DEFAULT '',
        created_at INTEGER NOT NULL,
        FOREIGN KEY (group_id) REFERENCES task_groups(id) ON DELETE CASCADE
      );

      -- Retrieval indexes built from research results, one per task group
      CREATE TABLE IF NOT EXISTS rag_indices (
        id TEXT PRIMARY KEY,
        session_id TEXT NOT NULL,
        group_id TEXT NOT NULL,
        task TEXT NOT NULL,
        document_count INTEGER NOT NULL DEFAULT 0,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL,
        FOREIGN KEY (session_id) REFERENCES research_sessions(id) ON DELETE CASCADE
      );

      CREATE TABLE IF NOT EXISTS rag_documents (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        rag_id TEXT NOT NULL,
        title TEXT NOT NULL,
        url TEXT NOT NULL,
        content TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        FOREIGN KEY (rag_id) REFERENCES rag_indices(id) ON DELETE CASCADE
      );

      -- FTS5 index for RAG documents
      CREATE VIRTUAL TABLE IF NOT EXISTS rag_documents_fts USING fts5(
        title,
        content,
        content='rag_documents',
        content_rowid='id'
      );

      -- Triggers to keep FTS in sync
      CREATE TRIGGER IF NOT EXISTS rag_documents_ai AFTER INSERT ON rag_documents BEGIN
        INSERT INTO rag_documents_fts(rowid, title, content)
        VALUES (NEW.id, NEW.title, NEW.content);
      END;

      CREATE TRIGGER IF NOT EXISTS rag_documents_ad AFTER DELETE ON rag_documents BEGIN
        INSERT INTO rag_documents_fts(rag_documents_fts, rowid, title, content)
        VALUES('delete', OLD.id, OLD.title, OLD.content);
      END;

      CREATE INDEX IF NOT EXISTS idx_groups_session ON task_groups(session_id, position);
      CREATE INDEX IF NOT EXISTS idx_tasks_group ON tasks(group_id, position);
      CREATE INDEX IF NOT EXISTS idx_prompts_session ON prompt_history(session_id);
      CREATE INDEX IF NOT EXISTS idx_rag_documents_rag ON rag_documents(rag_id);
    `);
  }

  // ============================================================================
  // Sessions
  // ============================================================================

  createSession(title: string): ResearchSession {
    const now = Date.now();
    const id = uuidv4();
    this.db.prepare(`
      INSERT INTO research_sessions (id, title, created_at, updated_at)
      VALUES (?, ?, ?, ?)
    `).run(id, title, now, now);

    return {
      id,
      title,
      createdAt: now,
      updatedAt: now,
      lastPrompt: { original: '', refined: '' },
      prompts: [],
      groups: [],
    };
  }

  listSessions(): ResearchSessionSummary[] {
    const rows = this.db.prepare<[], SessionSummaryRow>(`
      SELECT
        s.id, s.title, s.created_at, s.updated_at,
        (SELECT COUNT(*) FROM task_groups g WHERE g.session_id = s.id) AS group_count,
        (SELECT COUNT(*) FROM tasks t JOIN task_groups g ON t.group_id = g.id WHERE g.session_id = s.id) AS task_count
      FROM research_sessions s
      ORDER BY s.updated_at DESC
    `).all();

    return rows.map((row) => ({
      id: row.id,
      title: row.title,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      groupCount: row.group_count,
      taskCount: row.task_count,
    }));
  }

  getSession(sessionId: string): ResearchSession | null {
    const row = this.getSessionRow(sessionId);
    if (!row) return null;

    const prompts = this.db.prepare<[string], PromptRow>(`
      SELECT original, refined, answers, created_at FROM prompt_history
      WHERE session_id = ? ORDER BY id ASC
    `).all(sessionId);

    const groups = this.db.prepare<[string], GroupRow>(`
      SELECT * FROM task_groups WHERE session_id = ? ORDER BY position ASC
    `).all(sessionId);

    return {
      id: row.id,
      title: row.title,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      lastPrompt: { original: row.last_prompt_original, refined: row.last_prompt_refined },
      prompts: prompts.map((p) => this.rowToPrompt(p)),
      groups: groups.map((g) => this.rowToGroup(g)),
    };
  }

  deleteSession(sessionId: string): boolean {
    const result = this.db.prepare(`
      DELETE FROM research_sessions WHERE id = ?
    `).run(sessionId);
    return result.changes > 0;
  }

  recordPrompt(
    sessionId: string,
    original: string,
    refined: string,
    answers: Record<string, string> = {}
  ): void {
    const record = this.db.transaction(() => {
      this.requireSession(sessionId);
      const now = Date.now();
      this.db.prepare(`
        INSERT INTO prompt_history (session_id, original, refined, answers, created_at)
        VALUES (?, ?, ?, ?, ?)
      `).run(sessionId, original, refined, JSON.stringify(answers), now);
      this.db.prepare(`
        UPDATE research_sessions
        SET last_prompt_original = ?, last_prompt_refined = ?, updated_at = ?
        WHERE id = ?
      `).run(original, refined, now, sessionId);
    });
    record();
  }

  // ============================================================================
  // Task Groups
  // ============================================================================

  createGroup(sessionId: string, prompt: string, descriptions: string[]): TaskGroup {
    const create = this.db.transaction((): string => {
      this.requireSession(sessionId);
      const now = Date.now();
      const next = this.db.prepare<[string], { next: number }>(`
        SELECT COALESCE(MAX(position) + 1, 0) AS next FROM task_groups WHERE session_id = ?
      `).get(sessionId);
      const groupId = uuidv4();

      this.db.prepare(`
        INSERT INTO task_groups (id, session_id, position, prompt, created_at)
        VALUES (?, ?, ?, ?, ?)
      `).run(groupId, sessionId, next?.next ?? 0, prompt, now);

      const insertTask = this.db.prepare(`
        INSERT INTO tasks (id, group_id, position, description, created_at)
        VALUES (?, ?, ?, ?, ?)
      `);
      descriptions.forEach((description, position) => {
        insertTask.run(uuidv4(), groupId, position, description, now);
      });

      this.touchSession(sessionId, now);
      return groupId;
    });

    const group = this.getGroupById(create());
    if (!group) {
      throw new NotFoundError('Task group vanished after creation');
    }
    return group;
  }

  getGroup(sessionId: string, groupIndex: number): TaskGroup | null {
    const row = this.getGroupRow(sessionId, groupIndex);
    return row ? this.rowToGroup(row) : null;
  }

  getGroupById(groupId: string): TaskGroup | null {
    const row = this.db.prepare<[string], GroupRow>(`
      SELECT * FROM task_groups WHERE id = ?
    `).get(groupId);
    return row ? this.rowToGroup(row) : null;
  }

  // ============================================================================
  // Tasks
  // ============================================================================

  addTask(sessionId: string, groupIndex: number, description: string): Task {
    const text = description.trim();
    if (!text) {
      throw new ValidationError('Task text is missing');
    }

    const add = this.db.transaction((): Task => {
      const group = this.requireGroup(sessionId, groupIndex);
      const now = Date.now();
      const next = this.db.prepare<[string], { next: number }>(`
        SELECT COALESCE(MAX(position) + 1, 0) AS next FROM tasks WHERE group_id = ?
      `).get(group.id);
      const task: Task = {
        id: uuidv4(),
        index: next?.next ?? 0,
        description: text,
        completed: false,
        notes: '',
      };

      this.db.prepare(`
        INSERT INTO tasks (id, group_id, position, description, created_at)
        VALUES (?, ?, ?, ?, ?)
      `).run(task.id, group.id, task.index, task.description, now);
      this.touchSession(sessionId, now);
      return task;
    });

    return add();
  }

  /**
   * Remove a task and shift every later task one position to the left.
   * Runs in one transaction so readers see either the old or the new order.
   */
  removeTask(sessionId: string, groupIndex: number, taskIndex: number): void {
    const remove = this.db.transaction(() => {
      const group = this.requireGroup(sessionId, groupIndex);
      if (group.research_in_progress) {
        throw new ConflictError('Research in progress for this group, tasks cannot be removed');
      }

      const result = this.db.prepare(`
        DELETE FROM tasks WHERE group_id = ? AND position = ?
      `).run(group.id, taskIndex);
      if (result.changes === 0) {
        throw new NotFoundError(`Task not found: ${taskIndex}`);
      }

      this.db.prepare(`
        UPDATE tasks SET position = position - 1 WHERE group_id = ? AND position > ?
      `).run(group.id, taskIndex);
      this.touchSession(sessionId, Date.now());
    });

    remove();
  }

  markTaskCompleted(taskId: string): void {
    this.db.prepare(`
      UPDATE tasks SET completed = 1 WHERE id = ?
    `).run(taskId);
  }

  setResearchInProgress(groupId: string, inProgress: boolean): void {
    this.db.prepare(`
      UPDATE task_groups SET research_in_progress = ? WHERE id = ?
    `).run(inProgress ? 1 : 0, groupId);
  }

  setGroupRagId(groupId: string, ragId: string): void {
    this.db.prepare(`
      UPDATE task_groups SET rag_id = ? WHERE id = ?
    `).run(ragId, groupId);
  }

  /**
   * Clear in-progress flags left behind by a previous process
   * @returns number of groups reset
   */
  resetStaleResearchFlags(): number {
    return this.db.prepare(`
      UPDATE task_groups SET research_in_progress = 0 WHERE research_in_progress = 1
    `).run().changes;
  }

  // ============================================================================
  // RAG Documents
  // ============================================================================

  getRagIndex(ragId: string): RagIndexInfo | null {
    const row = this.db.prepare<[string], RagIndexRow>(`
      SELECT * FROM rag_indices WHERE id = ?
    `).get(ragId);
    if (!row) return null;

    return {
      id: row.id,
      sessionId: row.session_id,
      groupId: row.group_id,
      task: row.task,
      documentCount: row.document_count,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  /**
   * Create the index if needed and append documents to it
   * @returns true when the index was created by this call
   */
  saveRagDocuments(
    ragId: string,
    owner: { sessionId: string; groupId: string; task: string },
    documents: ResearchDocument[]
  ): boolean {
    const save = this.db.transaction((): boolean => {
      const now = Date.now();
      const created = this.db.prepare(`
        INSERT OR IGNORE INTO rag_indices (id, session_id, group_id, task, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?)
      `).run(ragId, owner.sessionId, owner.groupId, owner.task, now, now).changes > 0;

      const insert = this.db.prepare(`
        INSERT INTO rag_documents (rag_id, title, url, content, created_at)
        VALUES (?, ?, ?, ?, ?)
      `);
      for (const doc of documents) {
        insert.run(ragId, doc.title, doc.url, doc.content, now);
      }

      this.db.prepare(`
        UPDATE rag_indices
        SET document_count = document_count + ?, updated_at = ?, task = ?
        WHERE id = ?
      `).run(documents.length, now, owner.task, ragId);

      return created;
    });

    return save();
  }

  /**
   * Full-text search within one index, best matches first
   */
  searchRagDocuments(ragId: string, query: string, limit: number): RagMatch[] {
    const terms = query
      .toLowerCase()
      .split(/[^\p{L}\p{N}]+/u)
      .filter((t) => t.length > 1);
    if (terms.length === 0) return [];

    // Quote every term so FTS5 operators in user input stay literal
    const match = terms.map((t) => `"${t.replace(/"/g, '""')}"`).join(' OR ');

    const rows = this.db.prepare<[string, string, number], RagMatchRow>(`
      SELECT d.title, d.url, d.content, bm25(rag_documents_fts) AS match_rank
      FROM rag_documents_fts
      JOIN rag_documents d ON d.id = rag_documents_fts.rowid
      WHERE rag_documents_fts MATCH ? AND d.rag_id = ?
      ORDER BY match_rank
      LIMIT ?
    `).all(match, ragId, limit);

    return rows.map((row) => ({
      title: row.title,
      url: row.url,
      content: row.content,
      score: -row.match_rank,
    }));
  }

  close(): void {
    this.db.close();
  }

  // ============================================================================
  // Helpers
  // ============================================================================

  private getSessionRow(sessionId: string): SessionRow | undefined {
    return this.db.prepare<[string], SessionRow>(`
      SELECT * FROM research_sessions WHERE id = ?
    `).get(sessionId);
  }

  private getGroupRow(sessionId: string, groupIndex: number): GroupRow | undefined {
    return this.db.prepare<[string, number], GroupRow>(`
      SELECT * FROM task_groups WHERE session_id = ? AND position = ?
    `).get(sessionId, groupIndex);
  }

  private requireSession(sessionId: string): SessionRow {
    const row = this.getSessionRow(sessionId);
    if (!row) {
      throw new NotFoundError(`Research not found: ${sessionId}`);
    }
    return row;
  }

  private requireGroup(sessionId: string, groupIndex: number): GroupRow {
    this.requireSession(sessionId);
    const row = this.getGroupRow(sessionId, groupIndex);
    if (!row) {
      throw new NotFoundError(`Group not found: ${groupIndex}`);
    }
    return row;
  }

  private touchSession(sessionId: string, now: number): void {
    this.db.prepare(`
      UPDATE research_sessions SET updated_at = ? WHERE id = ?
    `).run(now, sessionId);
  }

  private rowToGroup(row: GroupRow): TaskGroup {
    const tasks = this.db.prepare<[string], TaskRow>(`
      SELECT * FROM tasks WHERE group_id = ? ORDER BY position ASC
    `).all(row.id);

    return {
      id: row.id,
      sessionId: row.session_id,
      index: row.position,
      prompt: row.prompt,
      tasks: tasks.map((t) => ({
        id: t.id,
        index: t.position,
        description: t.description,
        completed: t.completed === 1,
        notes: t.notes,
      })),
      researchInProgress: row.research_in_progress === 1,
      ragId: row.rag_id,
      createdAt: row.created_at,
    };
  }

  private rowToPrompt(row: PromptRow): PromptRecord {
    const parsed: unknown = JSON.parse(row.answers);
    const answers: Record<string, string> = {};
    if (typeof parsed === 'object' && parsed !== null) {
      for (const [key, value] of Object.entries(parsed)) {
        if (typeof value === 'string') answers[key] = value;
      }
    }
    return {
      original: row.original,
      refined: row.refined,
      answers,
      createdAt: row.created_at,
    };
  }
}

// Singleton instance
let instance: ResearchDatabase | null = null;

export function getDatabase(location?: string): ResearchDatabase {
  if (!instance) {
    instance = new ResearchDatabase(location);
  }
  return instance;
}

export function closeDatabase(): void {
  if (instance) {
    instance.close();
    instance = null;
  }
}
