/**
 * RAG Storage
 * Retrieval index per task group, ranked with SQLite FTS5, answered by the AI provider
 */

import type { ResearchDocument, RagAnswer } from '../types.js';
import type { ResearchDatabase, RagMatch } from '../database/index.js';
import type { AIProvider } from '../ai/provider.js';
import { Logger } from '../utils/logger.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';

export const NO_MATCH_RESPONSE = 'No relevant information found in the research results.';

const MAX_CONTEXT_CHARS = 2000;

export class RagStorage {
  private logger = new Logger('RagStorage');

  constructor(
    private readonly db: ResearchDatabase,
    private readonly ai: AIProvider,
    private readonly topK: number = 5
  ) {}

  /**
   * Stable index id for a group; a second run extends the same index
   */
  static indexIdFor(sessionId: string, groupId: string): string {
    return `rag_${sessionId}_${groupId}`;
  }

  /**
   * Save documents into the group's index, creating it on first use
   */
  saveResults(
    ragId: string,
    owner: { sessionId: string; groupId: string; task: string },
    documents: ResearchDocument[]
  ): string {
    const usable = documents.filter((d) => d.content.trim().length > 0);
    const created = this.db.saveRagDocuments(ragId, owner, usable);
    this.logger.info(`${created ? 'Created' : 'Updated'} RAG index ${ragId}`, { documents: usable.length });
    return ragId;
  }

  async query(ragId: string, question: string): Promise<RagAnswer> {
    if (!question.trim()) {
      throw new ValidationError('Query is empty');
    }
    if (!this.db.getRagIndex(ragId)) {
      throw new NotFoundError(`RAG index not found: ${ragId}`);
    }

    const matches = this.db.searchRagDocuments(ragId, question, this.topK);
    if (matches.length === 0) {
      return { response: NO_MATCH_RESPONSE, sources: [] };
    }

    const response = await this.synthesize(question, matches);
    return {
      response,
      sources: matches.map((m) => ({
        ...(m.title ? { title: m.title } : {}),
        ...(m.url ? { url: m.url } : {}),
        score: Number(m.score.toFixed(4)),
      })),
    };
  }

  private async synthesize(question: string, matches: RagMatch[]): Promise<string> {
    const context = matches
      .map((m, i) => `[${i + 1}] ${m.title}\n${m.content.slice(0, MAX_CONTEXT_CHARS)}`)
      .join('\n\n---\n\n');

    const prompt = `Answer the question using only the information below.
Only include facts present in the provided data. If the information is not
sufficient to answer, say so plainly.

INFORMATION:
${context}

QUESTION: ${question}

ANSWER:`;

    try {
      const answer = (await this.ai.analyze(prompt)).trim();
      if (answer) return answer;
      this.logger.warn('Empty synthesis response, using extractive answer');
    } catch (error) {
      this.logger.error('Answer synthesis failed, using extractive answer', error);
    }
    return this.createFallbackAnswer(matches);
  }

  /**
   * Best-match excerpts when the AI provider is unavailable
   */
  private createFallbackAnswer(matches: RagMatch[]): string {
    return matches
      .slice(0, 3)
      .map((m) => `${m.title}: ${m.content.slice(0, 300).trim()}`)
      .join('\n\n');
  }
}
