import { describe, it, expect, beforeAll, vi } from 'vitest';
import { TaskGenerator, parseListItems } from '../agents/task-generator.js';
import { Brainstormer } from '../agents/brainstorming.js';
import { ValidationError } from '../utils/errors.js';
import { setLogLevel } from '../utils/logger.js';

beforeAll(() => {
  setLogLevel('error');
});

describe('parseListItems', () => {
  it('strips bullets and numbering and drops blank lines', () => {
    const text = '1. First point\n2) Second point\n\n- Third point\n* Fourth\n• Fifth\nPlain line';

    expect(parseListItems(text)).toEqual([
      'First point',
      'Second point',
      'Third point',
      'Fourth',
      'Fifth',
      'Plain line',
    ]);
  });
});

describe('TaskGenerator', () => {
  it('returns the listed points in order', async () => {
    const analyze = vi.fn(async (_prompt: string) => '- History of lithium batteries\n- Current cathode materials');
    const generator = new TaskGenerator({ analyze });

    const tasks = await generator.generate('Survey battery research');

    expect(tasks).toEqual(['History of lithium batteries', 'Current cathode materials']);
    expect(analyze.mock.calls[0][0]).toContain('Write the list of research points for: Survey battery research');
  });

  it('skips points that repeat existing tasks or each other', async () => {
    const analyze = vi.fn(async (_prompt: string) =>
      'Current cathode materials!\nSolid-state electrolytes\nSOLID-STATE ELECTROLYTES.\nRecycling methods'
    );
    const generator = new TaskGenerator({ analyze });

    const tasks = await generator.generate('Survey battery research', ['current cathode materials']);

    expect(tasks).toEqual(['Solid-state electrolytes', 'Recycling methods']);
    expect(analyze.mock.calls[0][0]).toContain('Existing tasks (do not duplicate):\ncurrent cathode materials');
  });

  it('rejects an empty prompt without calling the provider', async () => {
    const analyze = vi.fn(async () => '');
    const generator = new TaskGenerator({ analyze });

    await expect(generator.generate('   ')).rejects.toThrow(ValidationError);
    expect(analyze).not.toHaveBeenCalled();
  });
});

describe('Brainstormer', () => {
  it('asks at most three clarifying questions', async () => {
    const brainstormer = new Brainstormer({
      analyze: async () => '1. What is the goal?\n2. What budget applies?\n3. Which region?\n4. Anything else?',
    });

    expect(await brainstormer.generateQuestions('Improve sales')).toEqual([
      'What is the goal?',
      'What budget applies?',
      'Which region?',
    ]);
  });

  it('asks nothing for a blank prompt', async () => {
    const analyze = vi.fn(async () => 'unused');
    const brainstormer = new Brainstormer({ analyze });

    expect(await brainstormer.generateQuestions('  ')).toEqual([]);
    expect(analyze).not.toHaveBeenCalled();
  });

  it('refines the prompt with the answers ordered by key', async () => {
    const analyze = vi.fn(async (_prompt: string) => '  Grow online sales in France by 10% this year.  ');
    const brainstormer = new Brainstormer({ analyze });

    const refined = await brainstormer.refinePrompt('Improve sales', {
      answer_2: 'France',
      answer_1: 'Online sales',
    });

    expect(refined).toBe('Grow online sales in France by 10% this year.');
    expect(analyze.mock.calls[0][0]).toContain('Answers provided:\n1. Online sales\n2. France');
  });

  it('keeps the original prompt when the provider answers nothing', async () => {
    const brainstormer = new Brainstormer({ analyze: async () => '' });

    expect(await brainstormer.refinePrompt('Improve sales', { answer_1: 'Online' })).toBe('Improve sales');
  });

  it('requires a prompt and at least one answer', async () => {
    const brainstormer = new Brainstormer({ analyze: async () => 'unused' });

    await expect(brainstormer.refinePrompt('', { answer_1: 'x' })).rejects.toThrow('Original prompt is missing');
    await expect(brainstormer.refinePrompt('Improve sales', {})).rejects.toThrow('Answers are missing');
  });
});
