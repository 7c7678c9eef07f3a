/**
 * Task Generator
 * Turns a refined prompt into an ordered list of research points
 */

import type { AIProvider } from '../ai/provider.js';
import { Logger } from '../utils/logger.js';
import { ValidationError } from '../utils/errors.js';

/**
 * Split a model response into list items, dropping bullets and numbering
 */
export function parseListItems(text: string): string[] {
  return text
    .split('\n')
    .map((line) => line.trim().replace(/^(?:[-*•]|\d+[.)])\s*/, '').trim())
    .filter((line) => line.length > 0);
}

function normalize(text: string): string {
  return text.toLowerCase().replace(/[^\p{L}\p{N}\s]/gu, '').replace(/\s+/g, ' ').trim();
}

export class TaskGenerator {
  private logger = new Logger('TaskGenerator');

  constructor(private readonly ai: AIProvider) {}

  /**
   * @param existingTasks descriptions already in the session, never repeated
   */
  async generate(refinedPrompt: string, existingTasks: string[] = []): Promise<string[]> {
    if (!refinedPrompt.trim()) {
      throw new ValidationError('Prompt is empty');
    }

    const parts = [
      'Act as an expert researcher. Given a request, write an ordered list of points to investigate.',
      'The points must:',
      '- be original and not repeat existing or similar tasks',
      '- follow a logical order, from general to specific',
      '- be phrased as research points, independent and self-contained',
      '- not be numbered, one point per line',
      'Do not include time estimates or priorities.',
      '',
      `Write the list of research points for: ${refinedPrompt}`,
    ];
    if (existingTasks.length > 0) {
      parts.push('', 'Existing tasks (do not duplicate):', ...existingTasks);
    }

    const response = await this.ai.analyze(parts.join('\n'));
    const seen = new Set(existingTasks.map(normalize));
    const tasks: string[] = [];
    for (const item of parseListItems(response)) {
      const key = normalize(item);
      if (!key || seen.has(key)) continue;
      seen.add(key);
      tasks.push(item);
    }

    this.logger.info(`Generated ${tasks.length} tasks`, { skippedDuplicates: parseListItems(response).length - tasks.length });
    return tasks;
  }
}
