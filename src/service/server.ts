/**
 * HTTP Service for ResearchFlow
 * Research sessions, task CRUD, research jobs, progress polling and log tailing
 */

import express, { Request, Response, NextFunction } from 'express';
import { WebSocketServer, WebSocket } from 'ws';
import { createServer, Server } from 'http';
import type { AddressInfo } from 'net';
import { join } from 'path';

import type {
  ApiResponse,
  ProgressSnapshot,
  ResearchPipeline,
  ServiceStatus,
  StartRejection,
  TaskStore,
} from '../types.js';
import { ResearchDatabase, getDatabase, closeDatabase } from '../database/index.js';
import { ConfigManager, getConfig } from '../utils/config.js';
import { Logger, setLogLevel, setLogFile } from '../utils/logger.js';
import {
  ConflictError,
  NotFoundError,
  ValidationError,
  errorMessage,
  httpStatusFor,
} from '../utils/errors.js';
import { JobRunner } from '../queue/job-runner.js';
import type { JobRun } from '../jobs/job-run.js';
import { LogTailService } from '../jobs/log-tail.js';
import { ProgressQueryService } from '../jobs/progress-service.js';
import { RagStorage } from '../rag/storage.js';
import { WebResearchPipeline } from '../crew/research-pipeline.js';
import { type AIProvider, getAIProvider } from '../ai/provider.js';
import { TaskGenerator } from '../agents/task-generator.js';
import { Brainstormer } from '../agents/brainstorming.js';

const VERSION = '1.0.0';
const DEFAULT_TITLE = 'New research';

const START_REJECTION_STATUS: Record<StartRejection, number> = {
  not_found: 404,
  already_running: 409,
  no_pending_tasks: 409,
  shutting_down: 503,
};

export interface ResearchServiceOptions {
  config?: ConfigManager;
  db?: ResearchDatabase;
  pipeline?: ResearchPipeline;
  ai?: AIProvider;
  /** Service log file; null disables it. Defaults to <dataDir>/logs/service.log */
  logFile?: string | null;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function bodyOf(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  return isRecord(body) ? body : {};
}

function parseIndex(raw: unknown, name: string): number {
  if (typeof raw === 'number' && Number.isInteger(raw) && raw >= 0) return raw;
  if (typeof raw === 'string' && /^\d+$/.test(raw)) return Number.parseInt(raw, 10);
  throw new ValidationError(`${name} must be a non-negative integer`);
}

function firstString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
}

export class ResearchService {
  private app: express.Application;
  private server: Server;
  private wss: WebSocketServer;
  private config: ConfigManager;
  private logger: Logger;
  private startTime: number = Date.now();
  private clients: Set<WebSocket> = new Set();

  private db: ResearchDatabase;
  private ownsDb: boolean;
  private store: TaskStore;
  private logs: LogTailService;
  private runner: JobRunner;
  private progress: ProgressQueryService;
  private rag: RagStorage;
  private taskGenerator: TaskGenerator;
  private brainstormer: Brainstormer;

  constructor(options: ResearchServiceOptions = {}) {
    this.config = options.config ?? getConfig();
    this.logger = new Logger('Service');

    // Initialize logging
    setLogLevel(this.config.getValue('logLevel'));
    setLogFile(options.logFile === undefined
      ? join(this.config.getDataDir(), 'logs', 'service.log')
      : options.logFile);

    // Initialize components
    this.ownsDb = !options.db;
    this.db = options.db ?? getDatabase(this.config.getDataDir());
    this.store = this.db;
    const ai = options.ai ?? getAIProvider(this.config.getValue('ai'));
    const logConfig = this.config.getValue('logs');

    this.logs = new LogTailService(logConfig);
    this.rag = new RagStorage(this.db, ai, this.config.getValue('rag').topK);
    this.runner = new JobRunner({
      store: this.store,
      pipeline: options.pipeline ?? new WebResearchPipeline(this.config.getValue('search')),
      rag: this.rag,
      logs: this.logs,
      config: this.config.getValue('queue'),
      logRetention: logConfig.retentionLines,
    });
    this.progress = new ProgressQueryService(this.store, this.runner);
    this.taskGenerator = new TaskGenerator(ai);
    this.brainstormer = new Brainstormer(ai);

    const stale = this.store.resetStaleResearchFlags();
    if (stale > 0) {
      this.logger.warn(`Reset ${stale} task groups left in progress by a previous run`);
    }

    // Setup Express
    this.app = express();
    this.app.use(express.json());
    this.app.use(this.corsMiddleware.bind(this));

    // Create HTTP server
    this.server = createServer(this.app);

    // Setup WebSocket
    this.wss = new WebSocketServer({ server: this.server });
    this.setupWebSocket();

    // Setup routes
    this.setupRoutes();
    this.app.use(this.errorMiddleware.bind(this));

    // Setup job event forwarding
    this.setupJobEvents();
  }

  /**
   * CORS middleware
   */
  private corsMiddleware(_req: Request, res: Response, next: NextFunction): void {
    res.header('Access-Control-Allow-Origin', '*');
    res.header('Access-Control-Allow-Methods', 'GET, POST, PATCH, DELETE, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type, Authorization');
    next();
  }

  /**
   * Body-parse failures and anything a route let escape
   */
  private errorMiddleware(err: unknown, _req: Request, res: Response, next: NextFunction): void {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (isRecord(err) && err.type === 'entity.parse.failed') {
      res.status(400).json(this.errorResponse('Malformed JSON body'));
      return;
    }
    this.sendError(res, err);
  }

  /**
   * Setup WebSocket connections
   */
  private setupWebSocket(): void {
    this.wss.on('connection', (ws: WebSocket) => {
      this.clients.add(ws);
      this.logger.debug('WebSocket client connected', { totalClients: this.clients.size });

      ws.on('close', () => {
        this.clients.delete(ws);
        this.logger.debug('WebSocket client disconnected', { totalClients: this.clients.size });
      });

      // Send initial status
      ws.send(JSON.stringify({ type: 'status', data: this.getStatus() }));
    });
  }

  /**
   * Broadcast message to all WebSocket clients
   */
  private broadcast(type: string, data: unknown): void {
    if (this.clients.size === 0) return;
    const message = JSON.stringify({ type, data });
    for (const client of this.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(message);
      }
    }
  }

  /**
   * Forward job progress and research log lines to WebSocket clients
   */
  private setupJobEvents(): void {
    this.runner.on('jobProgress', (run: JobRun, snapshot: ProgressSnapshot) => {
      this.broadcast('progress', {
        researchId: run.sessionId,
        groupIndex: run.groupIndex,
        jobId: run.id,
        progress: snapshot,
      });
    });

    this.runner.on('jobCompleted', (run: JobRun) => {
      this.logger.info(`Job ${run.id} completed`, {
        researchId: run.sessionId,
        groupIndex: run.groupIndex,
        failedTasks: run.failed.length,
      });
    });

    this.runner.on('jobCancelled', (run: JobRun) => {
      this.logger.info(`Job ${run.id} cancelled before it started`);
      this.broadcast('progress', {
        researchId: run.sessionId,
        groupIndex: run.groupIndex,
        jobId: run.id,
        progress: run.snapshot(),
      });
    });

    this.logs.on('line', (researchId: string, line: string) => {
      this.broadcast('log', { researchId, line });
    });
  }

  /**
   * Wrap an async route so rejections become structured error responses
   */
  private asyncRoute(handler: AsyncHandler): (req: Request, res: Response) => void {
    return (req, res) => {
      handler(req, res).catch((error: unknown) => this.sendError(res, error));
    };
  }

  /**
   * Wrap a sync route the same way
   */
  private route(handler: (req: Request, res: Response) => void): (req: Request, res: Response) => void {
    return (req, res) => {
      try {
        handler(req, res);
      } catch (error) {
        this.sendError(res, error);
      }
    };
  }

  private sendError(res: Response, error: unknown): void {
    const status = httpStatusFor(error);
    if (status >= 500) {
      this.logger.error('Request failed', error);
    }
    res.status(status).json(this.errorResponse(errorMessage(error)));
  }

  private requireSession(researchId: string): void {
    if (!this.store.getSession(researchId)) {
      throw new NotFoundError(`Research not found: ${researchId}`);
    }
  }

  /**
   * Setup API routes
   */
  private setupRoutes(): void {
    this.setupStatusRoutes();
    this.setupSessionRoutes();
    this.setupTaskRoutes();
    this.setupResearchRoutes();
  }

  private setupStatusRoutes(): void {
    this.app.get('/api/status', (_req, res) => {
      res.json(this.successResponse(this.getStatus()));
    });

    this.app.get('/api/health', (_req, res) => {
      res.json({ status: 'ok', timestamp: Date.now() });
    });

    this.app.get('/api/config', (_req, res) => {
      res.json(this.successResponse(this.config.get()));
    });

    // Queue limits apply to the next scheduling decision; other sections on restart
    this.app.patch('/api/config', this.route((req, res) => {
      this.config.update(req.body);
      res.json(this.successResponse(this.config.get()));
    }));
  }

  // ===== Session Routes =====

  private setupSessionRoutes(): void {
    this.app.get('/research', (_req, res) => {
      res.json(this.successResponse(this.store.listSessions()));
    });

    this.app.post('/create-research', this.route((req, res) => {
      const raw = bodyOf(req).title;
      const title = typeof raw === 'string' && raw.trim() ? raw.trim() : DEFAULT_TITLE;
      const session = this.store.createSession(title);
      this.logger.info(`Research created: ${session.id}`, { title });
      res.status(201).json(this.successResponse(session));
    }));

    this.app.get('/research/:researchId', this.route((req, res) => {
      const session = this.store.getSession(req.params.researchId);
      if (!session) {
        throw new NotFoundError(`Research not found: ${req.params.researchId}`);
      }
      res.json(this.successResponse(session));
    }));

    this.app.delete('/research/:researchId', this.route((req, res) => {
      const { researchId } = req.params;
      const session = this.store.getSession(researchId);
      if (!session) {
        throw new NotFoundError(`Research not found: ${researchId}`);
      }
      if (session.groups.some((g) => g.researchInProgress)) {
        throw new ConflictError('Research in progress, stop it before deleting');
      }
      this.store.deleteSession(researchId);
      this.logs.dropSession(researchId);
      this.runner.forgetSession(researchId);
      this.logger.info(`Research deleted: ${researchId}`);
      res.json({ success: true });
    }));

    this.app.post('/research/:researchId/questions', this.asyncRoute(async (req, res) => {
      this.requireSession(req.params.researchId);
      const prompt = bodyOf(req).prompt;
      if (typeof prompt !== 'string' || !prompt.trim()) {
        throw new ValidationError('Prompt is required');
      }
      const questions = await this.brainstormer.generateQuestions(prompt);
      res.json({ success: true, questions });
    }));

    this.app.post('/research/:researchId/submit-answers', this.asyncRoute(async (req, res) => {
      const { researchId } = req.params;
      this.requireSession(researchId);
      const body = bodyOf(req);
      const originalPrompt = typeof body.originalPrompt === 'string' ? body.originalPrompt : '';
      const answers: Record<string, string> = {};
      if (isRecord(body.answers)) {
        for (const [key, value] of Object.entries(body.answers)) {
          if (typeof value === 'string') answers[key] = value;
        }
      }

      const refinedPrompt = await this.brainstormer.refinePrompt(originalPrompt, answers);
      this.store.recordPrompt(researchId, originalPrompt, refinedPrompt, answers);
      res.json({ success: true, refinedPrompt });
    }));
  }

  // ===== Task Routes =====

  private setupTaskRoutes(): void {
    this.app.post('/task/research/:researchId/generate-tasks', this.asyncRoute(async (req, res) => {
      const { researchId } = req.params;
      const session = this.store.getSession(researchId);
      if (!session) {
        throw new NotFoundError(`Research not found: ${researchId}`);
      }
      const prompt = bodyOf(req).prompt;
      if (typeof prompt !== 'string' || !prompt.trim()) {
        throw new ValidationError('Prompt is required');
      }

      const existing = session.groups.flatMap((g) => g.tasks.map((t) => t.description));
      const descriptions = await this.taskGenerator.generate(prompt, existing);
      if (descriptions.length === 0) {
        throw new ValidationError('No new tasks were generated for this prompt');
      }

      const group = this.store.createGroup(researchId, prompt, descriptions);
      this.store.recordPrompt(researchId, prompt, prompt);
      res.json({ success: true, groupIndex: group.index, tasks: group.tasks });
    }));

    this.app.post('/task/research/:researchId/add-task-group', this.route((req, res) => {
      const body = bodyOf(req);
      const prompt = typeof body.prompt === 'string' ? body.prompt.trim() : '';
      if (!prompt) {
        throw new ValidationError('Prompt is required');
      }
      const tasks = Array.isArray(body.tasks) ? body.tasks : [];
      const descriptions = tasks
        .filter((t): t is string => typeof t === 'string')
        .map((t) => t.trim())
        .filter((t) => t.length > 0);

      const group = this.store.createGroup(req.params.researchId, prompt, descriptions);
      res.json({ success: true, groupIndex: group.index });
    }));

    this.app.post('/task/research/:researchId/add-custom-task', this.route((req, res) => {
      const body = bodyOf(req);
      if (body.groupIndex === undefined || body.groupIndex === null || typeof body.taskText !== 'string') {
        throw new ValidationError('Missing parameters');
      }
      const groupIndex = parseIndex(body.groupIndex, 'groupIndex');
      const task = this.store.addTask(req.params.researchId, groupIndex, body.taskText);
      res.json({
        success: true,
        index: task.index,
        task: { id: task.id, description: task.description },
      });
    }));

    this.app.post('/task/research/:researchId/remove-task/:groupIndex/:taskIndex', this.route((req, res) => {
      const groupIndex = parseIndex(req.params.groupIndex, 'groupIndex');
      const taskIndex = parseIndex(req.params.taskIndex, 'taskIndex');
      this.store.removeTask(req.params.researchId, groupIndex, taskIndex);
      res.json({ success: true });
    }));
  }

  // ===== Research Routes =====

  private setupResearchRoutes(): void {
    this.app.post('/research/:researchId/start-research/:groupIndex', this.route((req, res) => {
      const groupIndex = parseIndex(req.params.groupIndex, 'groupIndex');
      const result = this.runner.start(req.params.researchId, groupIndex);
      if (result.accepted) {
        res.json({ success: true, jobId: result.jobId });
        return;
      }
      res.status(START_REJECTION_STATUS[result.reason]).json(this.errorResponse(result.error));
    }));

    this.app.get('/research/:researchId/check-research-progress/:groupIndex', this.route((req, res) => {
      const groupIndex = parseIndex(req.params.groupIndex, 'groupIndex');
      res.json(this.progress.poll(req.params.researchId, groupIndex));
    }));

    this.app.get('/research/:researchId/get-logs', this.route((req, res) => {
      const rawLines = firstString(req.query.lines);
      const lines = rawLines && /^\d+$/.test(rawLines) ? Number.parseInt(rawLines, 10) : undefined;
      const jobId = firstString(req.query.job);

      if (jobId) {
        const run = this.runner.getRunById(jobId);
        if (!run || run.sessionId !== req.params.researchId) {
          throw new NotFoundError(`Job not found: ${jobId}`);
        }
        res.json({ logs: this.logs.tailBuffer(run.log, lines) });
        return;
      }
      res.json({ logs: this.logs.tailSession(req.params.researchId, lines) });
    }));

    this.app.post('/research/:researchId/execute-rag-query', this.asyncRoute(async (req, res) => {
      const { researchId } = req.params;
      const body = bodyOf(req);
      const query = firstString(req.query.query) ?? firstString(body.query) ?? '';
      const rawGroup = firstString(req.query.groupIndex) ?? body.groupIndex ?? 0;
      const groupIndex = parseIndex(rawGroup, 'groupIndex');

      this.requireSession(researchId);
      const group = this.store.getGroup(researchId, groupIndex);
      if (!group) {
        throw new NotFoundError(`Group not found: ${groupIndex}`);
      }
      if (!group.ragId) {
        throw new NotFoundError('No RAG index found for this group');
      }
      if (!query.trim()) {
        throw new ValidationError('Query is empty');
      }

      const log = this.logs.forSession(researchId);
      log.info(`RAG query for group ${groupIndex}: '${query}'`);
      const answer = await this.rag.query(group.ragId, query);
      log.info(`Query completed, ${answer.sources.length} sources`);
      res.json({ success: true, response: answer.response, sources: answer.sources });
    }));
  }

  /**
   * Get service status
   */
  private getStatus(): ServiceStatus {
    return {
      running: true,
      uptime: Date.now() - this.startTime,
      version: VERSION,
      jobs: this.runner.getStats(),
      sessions: this.store.listSessions().length,
    };
  }

  /**
   * Port the HTTP server is bound to (useful when configured with port 0)
   */
  getPort(): number {
    const address = this.server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Service is not listening on a TCP port');
    }
    const info: AddressInfo = address;
    return info.port;
  }

  /**
   * Start the service
   */
  async start(): Promise<void> {
    const port = this.config.getValue('port');

    await new Promise<void>((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(port, () => {
        this.server.off('error', reject);
        this.logger.info(`ResearchFlow service started on port ${this.getPort()}`);
        resolve();
      });
    });
  }

  /**
   * Stop the service
   */
  async stop(): Promise<void> {
    this.logger.info('Stopping research service...');

    // Let running jobs finish; queued ones are dropped
    await this.runner.shutdown();

    // Close WebSocket connections
    for (const client of this.clients) {
      client.close();
    }
    this.clients.clear();
    this.wss.close();

    // Close HTTP server
    if (this.server.listening) {
      await new Promise<void>((resolve, reject) => {
        this.server.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
    }

    if (this.ownsDb) {
      closeDatabase();
    }

    this.logger.info('Research service stopped');
  }

  /**
   * Success response helper
   */
  private successResponse<T>(data: T): ApiResponse<T> {
    return { success: true, data };
  }

  /**
   * Error response helper
   */
  private errorResponse(error: string): ApiResponse {
    return { success: false, error };
  }
}
