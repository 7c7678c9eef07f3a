/**
 * Brainstorming
 * Clarifying questions for a vague prompt, and the refined prompt built from the answers
 */

import type { AIProvider } from '../ai/provider.js';
import { ValidationError } from '../utils/errors.js';
import { parseListItems } from './task-generator.js';

export const QUESTION_COUNT = 3;

export class Brainstormer {
  constructor(private readonly ai: AIProvider) {}

  async generateQuestions(prompt: string): Promise<string[]> {
    if (!prompt.trim()) return [];

    const response = await this.ai.analyze([
      'Act as an expert strategist helping a user turn a vague request into a clear, actionable task.',
      `Write exactly ${QUESTION_COUNT} questions, one per line, to find out:`,
      '1. the real goal of the user',
      '2. the relevant constraints and context',
      '3. what is missing to make the request actionable',
      'Avoid theoretical or open-ended questions. Be direct and concrete.',
      '',
      `Initial request: "${prompt}"`,
    ].join('\n'));

    return parseListItems(response).slice(0, QUESTION_COUNT);
  }

  /**
   * @param answers keyed `answer_<n>`; ordered by key
   */
  async refinePrompt(originalPrompt: string, answers: Record<string, string>): Promise<string> {
    if (!originalPrompt.trim()) {
      throw new ValidationError('Original prompt is missing');
    }
    const keys = Object.keys(answers).sort();
    if (keys.length === 0) {
      throw new ValidationError('Answers are missing');
    }

    const pairs = keys.map((key, i) => `${i + 1}. ${answers[key]}`).join('\n');
    const response = await this.ai.analyze([
      'Act as an expert who turns vague requests into clear, workable instructions.',
      'Rewrite the request below so it is precise, focused on the goal, and ready for action.',
      'Skip redundancy and keep a professional, pragmatic tone. Reply with the rewritten request only.',
      '',
      `Initial request: "${originalPrompt}"`,
      '',
      'Answers provided:',
      pairs,
    ].join('\n'));

    const refined = response.trim();
    return refined || originalPrompt;
  }
}
