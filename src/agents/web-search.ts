/**
 * Web Search Agent
 *
 * Queries the configured search engines and scrapes the top hits.
 * Engines: Serper, Brave, Tavily (each needs its API key in the environment)
 */

import type { ResearchDocument } from '../types.js';
import { Logger } from '../utils/logger.js';

// ============================================================================
// Types
// ============================================================================

export interface ScrapedPage {
  url: string;
  content: string;
  truncated: boolean;
}

export interface SearchEngine {
  name: string;
  requiresApiKey?: string;
  search: (query: string, maxResults: number, signal?: AbortSignal) => Promise<ResearchDocument[]>;
}

export interface WebSearchOptions {
  engines?: string[];
  env?: NodeJS.ProcessEnv;
  fetchImpl?: typeof fetch;
}

type JsonObject = Record<string, unknown>;

/**
 * How to ask one search API and how to read its answer
 */
interface SearchApi {
  name: string;
  apiKeyEnv: string;
  request(query: string, maxResults: number, apiKey: string): { url: string; init: RequestInit };
  read(body: JsonObject): Array<ResearchDocument | null>;
}

// Jina Reader - free web scraping service
const JINA_READER_URL = 'https://r.jina.ai/';
const MAX_SCRAPED_CHARS = 8000;
const API_TIMEOUT_MS = 10000;
const DEFAULT_RELEVANCE = 0.8;

const SEARCH_APIS: readonly SearchApi[] = [
  {
    name: 'serper',
    apiKeyEnv: 'SERPER_API_KEY',
    request: (query, maxResults, apiKey) => ({
      url: 'https://google.serper.dev/search',
      init: {
        method: 'POST',
        headers: { 'X-API-KEY': apiKey, 'Content-Type': 'application/json' },
        body: JSON.stringify({ q: query, num: maxResults }),
      },
    }),
    // Organic position 1 is the best hit
    read: (body) => records(body.organic).map((item) =>
      toDocument(item.title, item.link, item.snippet,
        typeof item.position === 'number' ? 1 - item.position * 0.05 : DEFAULT_RELEVANCE)
    ),
  },
  {
    name: 'brave',
    apiKeyEnv: 'BRAVE_API_KEY',
    request: (query, maxResults, apiKey) => {
      const url = new URL('https://api.search.brave.com/res/v1/web/search');
      url.searchParams.set('q', query);
      url.searchParams.set('count', String(maxResults));
      return {
        url: url.toString(),
        init: { headers: { 'X-Subscription-Token': apiKey, Accept: 'application/json' } },
      };
    },
    read: (body) => {
      const web = body.web;
      return records(isRecord(web) ? web.results : undefined).map((item, i) =>
        toDocument(item.title, item.url, item.description, 1 - i * 0.05)
      );
    },
  },
  {
    name: 'tavily',
    apiKeyEnv: 'TAVILY_API_KEY',
    request: (query, maxResults, apiKey) => ({
      url: 'https://api.tavily.com/search',
      init: {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ api_key: apiKey, query, max_results: maxResults, search_depth: 'basic' }),
      },
    }),
    read: (body) => records(body.results).map((item) =>
      toDocument(item.title, item.url, item.content,
        typeof item.score === 'number' && item.score > 0 ? item.score : DEFAULT_RELEVANCE)
    ),
  },
];

// ============================================================================
// Web Search Agent
// ============================================================================

export class WebSearchAgent {
  private logger = new Logger('WebSearch');
  private engines: Map<string, SearchEngine> = new Map();
  private enabled: Set<string>;
  private env: NodeJS.ProcessEnv;
  private fetchImpl: typeof fetch;

  constructor(options: WebSearchOptions = {}) {
    this.env = options.env ?? process.env;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.enabled = new Set(options.engines ?? SEARCH_APIS.map((api) => api.name));

    for (const api of SEARCH_APIS) {
      this.registerEngine({
        name: api.name,
        requiresApiKey: api.apiKeyEnv,
        search: (query, maxResults, signal) => this.callApi(api, query, maxResults, signal),
      });
    }
  }

  registerEngine(engine: SearchEngine): void {
    this.engines.set(engine.name, engine);
  }

  /**
   * Engines that are enabled and have their API key configured
   */
  getAvailableEngines(): SearchEngine[] {
    return Array.from(this.engines.values()).filter((engine) => {
      if (!this.enabled.has(engine.name)) return false;
      if (!engine.requiresApiKey) return true;
      return !!this.env[engine.requiresApiKey];
    });
  }

  /**
   * Search every available engine in parallel and deduplicate by URL
   */
  async search(query: string, maxResults: number, timeoutMs: number, signal?: AbortSignal): Promise<ResearchDocument[]> {
    const engines = this.getAvailableEngines();
    if (engines.length === 0) {
      this.logger.warn('No search engines available, set SERPER_API_KEY, BRAVE_API_KEY or TAVILY_API_KEY');
      return [];
    }

    const perEngine = Math.ceil(maxResults / engines.length);
    const found = await Promise.all(
      engines.map(async (engine) => {
        try {
          return await withTimeout(engine.search(query, perEngine, signal), timeoutMs, `${engine.name} search timeout`);
        } catch (error) {
          this.logger.warn(`Engine ${engine.name} failed`, error);
          return [];
        }
      })
    );

    const deduped = deduplicateResults(found.flat());
    deduped.sort((a, b) => (b.relevance ?? 0) - (a.relevance ?? 0));
    return deduped.slice(0, maxResults);
  }

  /**
   * Fetch readable page content for the given hits
   */
  async scrape(documents: ResearchDocument[], perPageTimeoutMs: number, signal?: AbortSignal): Promise<ScrapedPage[]> {
    const scraped = await Promise.all(
      documents.map(async ({ url }): Promise<ScrapedPage | null> => {
        try {
          const response = await fetchWithTimeout(
            this.fetchImpl,
            `${JINA_READER_URL}${url}`,
            { headers: { Accept: 'text/plain' } },
            perPageTimeoutMs,
            signal
          );
          if (!response.ok) {
            this.logger.debug(`Scrape of ${url} returned ${response.status}`);
            return null;
          }
          const text = await response.text();
          return {
            url,
            content: text.slice(0, MAX_SCRAPED_CHARS),
            truncated: text.length > MAX_SCRAPED_CHARS,
          };
        } catch (error) {
          this.logger.debug(`Failed to scrape ${url}`, error);
          return null;
        }
      })
    );

    return scraped.filter((page): page is ScrapedPage => page !== null);
  }

  private async callApi(
    api: SearchApi,
    query: string,
    maxResults: number,
    signal?: AbortSignal
  ): Promise<ResearchDocument[]> {
    const { url, init } = api.request(query, maxResults, this.env[api.apiKeyEnv] ?? '');
    const response = await fetchWithTimeout(this.fetchImpl, url, init, API_TIMEOUT_MS, signal);
    if (!response.ok) {
      throw new Error(`${api.name} API error: ${response.status}`);
    }

    const body = await readJson(response);
    if (!isRecord(body)) return [];
    return api.read(body)
      .filter((doc): doc is ResearchDocument => doc !== null)
      .slice(0, maxResults);
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function records(value: unknown): JsonObject[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

/**
 * A hit without a URL is useless for scraping and for the index
 */
function toDocument(title: unknown, url: unknown, snippet: unknown, relevance: number): ResearchDocument | null {
  if (typeof url !== 'string' || !url) return null;
  return {
    title: typeof title === 'string' ? title : url,
    url,
    content: typeof snippet === 'string' ? snippet : '',
    relevance,
  };
}

export function normalizeUrl(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.host}${parsed.pathname}`.replace(/\/$/, '').toLowerCase();
  } catch {
    return url.toLowerCase();
  }
}

export function deduplicateResults(documents: ResearchDocument[]): ResearchDocument[] {
  const seen = new Set<string>();
  return documents.filter((doc) => {
    const normalized = normalizeUrl(doc.url);
    if (seen.has(normalized)) return false;
    seen.add(normalized);
    return true;
  });
}

/**
 * Race a promise against a timer that is always cleared afterwards.
 * `onTimeout` runs when the timer wins, before the rejection is seen.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  message: string,
  onTimeout?: () => void
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      onTimeout?.();
      reject(new Error(message));
    }, ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Fetch that gives up after `timeoutMs` or when `signal` aborts
 */
export async function fetchWithTimeout(
  fetchImpl: typeof fetch,
  url: string,
  options: RequestInit = {},
  timeoutMs: number = API_TIMEOUT_MS,
  signal?: AbortSignal
): Promise<Response> {
  const controller = new AbortController();
  const abort = () => controller.abort();
  const timeout = setTimeout(abort, timeoutMs);
  if (signal?.aborted) {
    abort();
  } else {
    signal?.addEventListener('abort', abort, { once: true });
  }

  try {
    return await fetchImpl(url, {
      ...options,
      signal: controller.signal,
    });
  } finally {
    clearTimeout(timeout);
    signal?.removeEventListener('abort', abort);
  }
}

async function readJson(response: Response): Promise<unknown> {
  try {
    return await response.json();
  } catch {
    return null;
  }
}
