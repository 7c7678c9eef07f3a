/**
 * Web Research Pipeline
 * Search, scrape, and turn the hits of one task into RAG documents
 */

import type { PipelineContext, ResearchDocument, ResearchPipeline, SearchConfig } from '../types.js';
import { WebSearchAgent } from '../agents/web-search.js';

export class WebResearchPipeline implements ResearchPipeline {
  constructor(
    private readonly config: SearchConfig,
    private readonly agent: WebSearchAgent = new WebSearchAgent({ engines: config.engines })
  ) {}

  async research(taskPrompt: string, context: PipelineContext): Promise<ResearchDocument[]> {
    const { signal } = context;
    const found = await this.agent.search(taskPrompt, this.config.maxResults, this.config.timeoutMs, signal);
    signal.throwIfAborted();
    context.log('info', `Search returned ${found.length} results`);
    if (found.length === 0) return [];

    const top = found.slice(0, this.config.scrapeTop);
    const pages = await this.agent.scrape(top, Math.floor(this.config.timeoutMs / Math.max(1, top.length)), signal);
    signal.throwIfAborted();
    context.log('info', `Scraped ${pages.length}/${top.length} pages`);

    // Scraped pages replace the snippet; the rest keep it
    const contentByUrl = new Map(pages.map((page) => [page.url, page.content]));
    return found.map((doc) => ({ ...doc, content: contentByUrl.get(doc.url) ?? doc.content }));
  }
}
