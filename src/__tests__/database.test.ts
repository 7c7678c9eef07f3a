import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ResearchDatabase, MEMORY_DB } from '../database/index.js';
import { ConflictError, NotFoundError, ValidationError } from '../utils/errors.js';

describe('ResearchDatabase', () => {
  let db: ResearchDatabase;

  beforeEach(() => {
    db = new ResearchDatabase(MEMORY_DB);
  });

  afterEach(() => {
    db.close();
  });

  describe('sessions', () => {
    it('creates, lists and deletes sessions', () => {
      const session = db.createSession('Battery chemistry');
      db.createGroup(session.id, 'Compare cathodes', ['LFP', 'NMC']);

      const summaries = db.listSessions();
      expect(summaries).toHaveLength(1);
      expect(summaries[0]).toMatchObject({ id: session.id, title: 'Battery chemistry', groupCount: 1, taskCount: 2 });

      expect(db.deleteSession(session.id)).toBe(true);
      expect(db.getSession(session.id)).toBeNull();
      expect(db.deleteSession(session.id)).toBe(false);
    });

    it('records prompts and keeps the last one on the session', () => {
      const session = db.createSession('Topic');
      db.recordPrompt(session.id, 'vague', 'precise', { answer_1: 'yes' });

      const loaded = db.getSession(session.id);
      expect(loaded?.lastPrompt).toEqual({ original: 'vague', refined: 'precise' });
      expect(loaded?.prompts).toHaveLength(1);
      expect(loaded?.prompts[0].answers).toEqual({ answer_1: 'yes' });
    });

    it('rejects a prompt for an unknown session', () => {
      expect(() => db.recordPrompt('missing', 'a', 'b')).toThrow(NotFoundError);
    });
  });

  describe('groups', () => {
    it('numbers groups by position within the session', () => {
      const session = db.createSession('Topic');
      const first = db.createGroup(session.id, 'First prompt', ['a']);
      const second = db.createGroup(session.id, 'Second prompt', ['b', 'c']);

      expect(first.index).toBe(0);
      expect(second.index).toBe(1);
      expect(second.tasks.map((t) => [t.index, t.description])).toEqual([[0, 'b'], [1, 'c']]);
      expect(db.getGroup(session.id, 1)?.id).toBe(second.id);
      expect(db.getGroup(session.id, 2)).toBeNull();
    });

    it('starts groups idle without a rag id', () => {
      const session = db.createSession('Topic');
      const group = db.createGroup(session.id, 'Prompt', ['a']);

      expect(group.researchInProgress).toBe(false);
      expect(group.ragId).toBeNull();
    });
  });

  describe('tasks', () => {
    let sessionId: string;

    beforeEach(() => {
      sessionId = db.createSession('Topic').id;
      db.createGroup(sessionId, 'Prompt', ['Task A', 'Task B']);
    });

    it('appends a custom task at the next index and shifts it left after a removal', () => {
      const added = db.addTask(sessionId, 0, 'X');
      expect(added.index).toBe(2);

      db.removeTask(sessionId, 0, 0);

      const tasks = db.getGroup(sessionId, 0)?.tasks ?? [];
      expect(tasks.map((t) => [t.index, t.description])).toEqual([[0, 'Task B'], [1, 'X']]);
      expect(tasks[1].id).toBe(added.id);
    });

    it('shifts every later task by exactly one and removes one task', () => {
      db.addTask(sessionId, 0, 'Task C');
      db.addTask(sessionId, 0, 'Task D');
      const before = db.getGroup(sessionId, 0)?.tasks ?? [];

      db.removeTask(sessionId, 0, 1);

      const after = db.getGroup(sessionId, 0)?.tasks ?? [];
      expect(after).toHaveLength(before.length - 1);
      expect(after.find((t) => t.id === before[1].id)).toBeUndefined();
      for (const task of before.slice(2)) {
        expect(after.find((t) => t.id === task.id)?.index).toBe(task.index - 1);
      }
      expect(after[0].id).toBe(before[0].id);
      expect(after[0].index).toBe(0);
    });

    it('trims task text and rejects blank text', () => {
      expect(db.addTask(sessionId, 0, '  Padded  ').description).toBe('Padded');
      expect(() => db.addTask(sessionId, 0, '   ')).toThrow(ValidationError);
    });

    it('reports unknown groups and stale task indices as not found', () => {
      expect(() => db.addTask(sessionId, 3, 'X')).toThrow(NotFoundError);
      expect(() => db.addTask('missing', 0, 'X')).toThrow(NotFoundError);
      expect(() => db.removeTask(sessionId, 0, 2)).toThrow('Task not found: 2');
      expect(() => db.removeTask(sessionId, 1, 0)).toThrow('Group not found: 1');
    });

    it('refuses to remove tasks while research is in progress but still accepts new ones', () => {
      const group = db.getGroup(sessionId, 0);
      if (!group) throw new Error('group missing');
      db.setResearchInProgress(group.id, true);

      expect(() => db.removeTask(sessionId, 0, 0)).toThrow(ConflictError);
      expect(db.addTask(sessionId, 0, 'Late addition').index).toBe(2);
      expect(db.getGroup(sessionId, 0)?.tasks).toHaveLength(3);
    });

    it('keeps a group once its last task is removed', () => {
      db.removeTask(sessionId, 0, 0);
      db.removeTask(sessionId, 0, 0);

      expect(db.getGroup(sessionId, 0)?.tasks).toEqual([]);
    });

    it('marks tasks completed by durable id', () => {
      const group = db.getGroup(sessionId, 0);
      if (!group) throw new Error('group missing');
      db.markTaskCompleted(group.tasks[1].id);

      expect(db.getGroup(sessionId, 0)?.tasks.map((t) => t.completed)).toEqual([false, true]);
    });

    it('resets in-progress flags left by a previous process', () => {
      const group = db.getGroup(sessionId, 0);
      if (!group) throw new Error('group missing');
      db.setResearchInProgress(group.id, true);

      expect(db.resetStaleResearchFlags()).toBe(1);
      expect(db.getGroup(sessionId, 0)?.researchInProgress).toBe(false);
      expect(db.resetStaleResearchFlags()).toBe(0);
    });
  });

  describe('rag documents', () => {
    it('creates an index once and extends it on later saves', () => {
      const session = db.createSession('Topic');
      const group = db.createGroup(session.id, 'Prompt', ['a']);
      const owner = { sessionId: session.id, groupId: group.id, task: 'Research for group: Prompt' };

      expect(db.saveRagDocuments('rag_1', owner, [
        { title: 'Solar', url: 'https://example.com/solar', content: 'Solar panels convert sunlight' },
      ])).toBe(true);
      expect(db.saveRagDocuments('rag_1', owner, [
        { title: 'Wind', url: 'https://example.com/wind', content: 'Wind turbines convert moving air' },
      ])).toBe(false);

      expect(db.getRagIndex('rag_1')?.documentCount).toBe(2);
      expect(db.getRagIndex('rag_2')).toBeNull();
    });

    it('finds matching documents within one index only', () => {
      const session = db.createSession('Topic');
      const group = db.createGroup(session.id, 'Prompt', ['a']);
      const owner = { sessionId: session.id, groupId: group.id, task: 'task' };
      db.saveRagDocuments('rag_1', owner, [
        { title: 'Solar', url: 'https://example.com/solar', content: 'Solar panels convert sunlight' },
        { title: 'Wind', url: 'https://example.com/wind', content: 'Wind turbines convert moving air' },
      ]);
      db.saveRagDocuments('rag_2', owner, [
        { title: 'Solar elsewhere', url: 'https://example.com/other', content: 'Sunlight on solar farms' },
      ]);

      const matches = db.searchRagDocuments('rag_1', 'How does sunlight work?', 5);
      expect(matches.map((m) => m.title)).toEqual(['Solar']);
      expect(matches[0].score).toBeGreaterThan(0);
    });

    it('treats query operators as plain words', () => {
      const session = db.createSession('Topic');
      const group = db.createGroup(session.id, 'Prompt', ['a']);
      db.saveRagDocuments('rag_1', { sessionId: session.id, groupId: group.id, task: 'task' }, [
        { title: 'Doc', url: '', content: 'plain text' },
      ]);

      expect(db.searchRagDocuments('rag_1', 'NEAR( "unbalanced AND', 5)).toEqual([]);
      expect(db.searchRagDocuments('rag_1', '?!', 5)).toEqual([]);
    });

    it('drops indices with their session', () => {
      const session = db.createSession('Topic');
      const group = db.createGroup(session.id, 'Prompt', ['a']);
      db.saveRagDocuments('rag_1', { sessionId: session.id, groupId: group.id, task: 'task' }, [
        { title: 'Doc', url: '', content: 'plain text' },
      ]);

      db.deleteSession(session.id);

      expect(db.getRagIndex('rag_1')).toBeNull();
    });
  });
});
