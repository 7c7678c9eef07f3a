/**
 * ResearchFlow API Client
 * Typed access to the research job endpoints for UIs and scripts
 */

import type { ProgressSnapshot, RagSource } from '../types.js';
import {
  ConflictError,
  NotFoundError,
  ResearchFlowError,
  ServiceError,
  TransientIOError,
  ValidationError,
  errorMessage,
} from '../utils/errors.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface ClientOptions {
  fetchImpl?: FetchLike;
  timeoutMs?: number;
}

export interface StartResearchResponse {
  success: boolean;
  jobId?: string;
  error?: string;
}

export interface AddTaskResponse {
  success: boolean;
  index?: number;
  task?: { id: string; description: string };
  error?: string;
}

export interface RemoveTaskResponse {
  success: boolean;
  error?: string;
}

export interface RagQueryResponse {
  success: boolean;
  response?: string;
  sources: RagSource[];
  error?: string;
}

export interface LogQuery {
  lines?: number;
  jobId?: string;
}

/**
 * What the progress poller needs from a client
 */
export interface ProgressSource {
  checkProgress(researchId: string, groupIndex: number): Promise<ProgressSnapshot>;
}

/**
 * What the log poller needs from a client
 */
export interface LogSource {
  getLogs(researchId: string, query?: LogQuery): Promise<string[]>;
}

type JsonObject = Record<string, unknown>;

interface RawResponse {
  status: number;
  body: JsonObject;
}

function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'number');
}

function parseSnapshot(body: JsonObject): ProgressSnapshot | null {
  const { completed, in_progress, completed_tasks, current_task_index, rag_id } = body;
  if (typeof completed !== 'boolean' || typeof in_progress !== 'boolean') return null;
  if (!isNumberArray(completed_tasks)) return null;
  const current = typeof current_task_index === 'number' ? current_task_index : null;
  if (current === null && current_task_index !== null) return null;
  return {
    completed,
    in_progress,
    completed_tasks,
    current_task_index: current,
    rag_id: typeof rag_id === 'string' ? rag_id : null,
  };
}

function parseSources(value: unknown): RagSource[] {
  if (!Array.isArray(value)) return [];
  const sources: RagSource[] = [];
  for (const item of value) {
    if (!isRecord(item) || typeof item.score !== 'number') continue;
    const source: RagSource = { score: item.score };
    const title = optionalString(item.title);
    const url = optionalString(item.url);
    if (title !== undefined) source.title = title;
    if (url !== undefined) source.url = url;
    sources.push(source);
  }
  return sources;
}

/**
 * Typed error for a structured failure on an endpoint that has no envelope
 */
export function errorForStatus(status: number, message: string): ResearchFlowError {
  switch (status) {
    case 404:
      return new NotFoundError(message);
    case 409:
      return new ConflictError(message);
    case 400:
      return new ValidationError(message);
    default:
      return new ServiceError(message);
  }
}

export class ResearchFlowClient {
  private baseUrl: string;
  private fetchImpl: FetchLike;
  private timeoutMs: number;

  constructor(baseUrl: string, options: ClientOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 10000;
  }

  async startResearch(researchId: string, groupIndex: number): Promise<StartResearchResponse> {
    const { body } = await this.request('POST', `/research/${enc(researchId)}/start-research/${groupIndex}`);
    return {
      success: body.success === true,
      jobId: optionalString(body.jobId),
      error: optionalString(body.error),
    };
  }

  async checkProgress(researchId: string, groupIndex: number): Promise<ProgressSnapshot> {
    const { status, body } = await this.request(
      'GET',
      `/research/${enc(researchId)}/check-research-progress/${groupIndex}`
    );
    const snapshot = parseSnapshot(body);
    if (snapshot) return snapshot;

    const error = optionalString(body.error);
    if (error !== undefined) throw errorForStatus(status, error);
    throw new TransientIOError(`Unexpected progress response (HTTP ${status})`);
  }

  async getLogs(researchId: string, query: LogQuery = {}): Promise<string[]> {
    const params = new URLSearchParams();
    if (query.lines !== undefined) params.set('lines', String(query.lines));
    if (query.jobId !== undefined) params.set('job', query.jobId);
    const qs = params.toString();
    const suffix = qs ? `?${qs}` : '';

    const { status, body } = await this.request('GET', `/research/${enc(researchId)}/get-logs${suffix}`);
    const logs = body.logs;
    if (Array.isArray(logs)) {
      return logs.filter((line): line is string => typeof line === 'string');
    }
    const error = optionalString(body.error);
    if (error !== undefined) throw errorForStatus(status, error);
    throw new TransientIOError(`Unexpected logs response (HTTP ${status})`);
  }

  async addCustomTask(researchId: string, groupIndex: number, taskText: string): Promise<AddTaskResponse> {
    const { body } = await this.request('POST', `/task/research/${enc(researchId)}/add-custom-task`, {
      groupIndex,
      taskText,
    });
    const rawTask = body.task;
    const task = isRecord(rawTask) && typeof rawTask.id === 'string' && typeof rawTask.description === 'string'
      ? { id: rawTask.id, description: rawTask.description }
      : undefined;
    return {
      success: body.success === true,
      index: typeof body.index === 'number' ? body.index : undefined,
      task,
      error: optionalString(body.error),
    };
  }

  async removeTask(researchId: string, groupIndex: number, taskIndex: number): Promise<RemoveTaskResponse> {
    const { body } = await this.request(
      'POST',
      `/task/research/${enc(researchId)}/remove-task/${groupIndex}/${taskIndex}`
    );
    return { success: body.success === true, error: optionalString(body.error) };
  }

  async executeRagQuery(researchId: string, query: string, groupIndex?: number): Promise<RagQueryResponse> {
    const params = new URLSearchParams({ query });
    if (groupIndex !== undefined) params.set('groupIndex', String(groupIndex));

    const { body } = await this.request('POST', `/research/${enc(researchId)}/execute-rag-query?${params.toString()}`);
    return {
      success: body.success === true,
      response: optionalString(body.response),
      sources: parseSources(body.sources),
      error: optionalString(body.error),
    };
  }

  /**
   * Any status with a JSON object body is a structured answer; everything else is transient
   */
  private async request(method: string, path: string, payload?: unknown): Promise<RawResponse> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers: payload === undefined ? undefined : { 'Content-Type': 'application/json' },
        body: payload === undefined ? undefined : JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new TransientIOError(`Request to ${path} failed: ${errorMessage(error)}`, error);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new TransientIOError(`Unreadable response from ${path} (HTTP ${response.status})`, error);
    }
    if (!isRecord(body)) {
      throw new TransientIOError(`Unreadable response from ${path} (HTTP ${response.status})`);
    }
    return { status: response.status, body };
  }
}

function enc(segment: string): string {
  return encodeURIComponent(segment);
}
