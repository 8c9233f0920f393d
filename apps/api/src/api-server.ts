// API Server - express HTTP surface for video generation tasks

import express, { Express, NextFunction, Request, Response } from 'express';
import { Server, createServer } from 'http';
import { z } from 'zod';
import {
  ProviderNotFoundError,
  SYSTEM_USER_ID,
  ValidationError,
  errorMessage,
  isParamObject,
  logger,
} from '@vidgen/core';
import type { ProviderRegistry } from '@vidgen/worker';
import { AuthVerifier, createAuthMiddleware, principalOf } from './auth.js';
import { DEFAULT_ORDERING, DEFAULT_PAGE_SIZE, JobListing, JobOrchestrator } from './job-orchestrator.js';
import { contentTypeFor, isPlainFileName, locateMediaFile } from './media-files.js';
import { errorBody, httpStatusFor, successBody } from './responses.js';

export interface ApiServerConfig {
  port: number;
  serviceName: string;
  corsOrigins: string[];
  dataDir: string;
  enableAuth: boolean;
}

export interface ApiServerDependencies {
  orchestrator: JobOrchestrator;
  registry: ProviderRegistry;
  authVerifier: AuthVerifier;
}

const CreateTaskSchema = z.object({
  model: z.string().min(1).optional(),
  provider: z.string().min(1).optional(),
  parameters: z.record(z.unknown()).default({}),
  is_async: z.boolean().default(true),
});

function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function queryInteger(req: Request, name: string, fallback: number): number {
  const value = queryString(req, name);
  if (value === undefined) return fallback;
  if (!/^-?\d+$/.test(value)) {
    throw new ValidationError(`${name} must be an integer`);
  }
  return Number(value);
}

export class ApiServer {
  private readonly app: Express;
  private readonly httpServer: Server;

  constructor(
    private readonly config: ApiServerConfig,
    private readonly deps: ApiServerDependencies
  ) {
    this.app = express();
    this.httpServer = createServer(this.app);

    this.setupMiddleware();
    this.setupHTTPRoutes();
  }

  /** Bound port; differs from the configured one when that was 0. */
  get port(): number {
    const address = this.httpServer.address();
    return address !== null && typeof address === 'object' ? address.port : this.config.port;
  }

  private setupMiddleware(): void {
    this.app.use((req, res, next) => {
      const allowedOrigins = this.config.corsOrigins;
      const origin = req.headers.origin;

      if (allowedOrigins.includes('*')) {
        res.setHeader('Access-Control-Allow-Origin', '*');
      } else if (origin && allowedOrigins.includes(origin)) {
        res.setHeader('Access-Control-Allow-Origin', origin);
        res.setHeader('Vary', 'Origin');
      } else if (origin) {
        logger.debug(`CORS: origin ${origin} not allowed`);
      }

      res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS, HEAD');
      res.setHeader(
        'Access-Control-Allow-Headers',
        'Content-Type, Authorization, X-Api-Key, X-Requested-With, Accept, Origin'
      );
      res.setHeader('Access-Control-Max-Age', '86400');

      if (req.method === 'OPTIONS') {
        res.sendStatus(200);
        return;
      }
      next();
    });

    this.app.use(express.json({ limit: '10mb' }));
  }

  private setupHTTPRoutes(): void {
    this.app.get('/api/health', (_req: Request, res: Response) => {
      res.json({
        status: 'ok',
        service: this.config.serviceName,
        timestamp: new Date().toISOString(),
        providers: this.deps.registry.names(),
      });
    });

    this.app.use(
      '/api',
      createAuthMiddleware({ enabled: this.config.enableAuth, verifier: this.deps.authVerifier })
    );

    // Tasks
    this.app.post('/api/tasks', async (req: Request, res: Response) => {
      try {
        const body = CreateTaskSchema.safeParse(req.body ?? {});
        if (!body.success) {
          throw new ValidationError(
            body.error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ')
          );
        }
        const { parameters } = body.data;
        if (!isParamObject(parameters)) {
          throw new ValidationError('parameters must be an object of JSON values');
        }

        const principal = principalOf(res);
        const taskId = await this.deps.orchestrator.submit({
          tenant_id: principal.tenant_id,
          user_id: principal.id || SYSTEM_USER_ID,
          provider: body.data.provider,
          model: body.data.model,
          parameters,
          is_async: body.data.is_async,
        });

        res.json(successBody('Task created', { task_id: taskId }));
      } catch (error) {
        this.sendError(res, error, 'Failed to create task');
      }
    });

    this.app.get('/api/tasks', async (req: Request, res: Response) => {
      try {
        const principal = principalOf(res);
        const page = queryInteger(req, 'page', 1);
        const pageSize = queryInteger(req, 'page_size', DEFAULT_PAGE_SIZE);
        const status = queryString(req, 'status');
        const model = queryString(req, 'model');
        const ordering = queryString(req, 'ordering') ?? DEFAULT_ORDERING;

        const listing = await this.deps.orchestrator.list(
          {
            tenant_id: principal.tenant_id,
            user_id: principal.is_system_key ? undefined : principal.id,
            model,
          },
          { page, pageSize, ordering, status }
        );

        res.json(
          successBody('Tasks retrieved', {
            total: listing.total,
            page_size: listing.page_size,
            current_page: listing.page,
            total_pages: listing.total_pages,
            ...this.pageLinks(req, listing, { status, model, ordering }),
            tasks: listing.items.map(job => ({
              task_id: job.id,
              status: job.status,
              model: job.model,
              created_at: job.created_at,
              updated_at: job.updated_at,
              ...(principal.is_system_key
                ? {
                    tenant_id: job.tenant_id,
                    user_id: job.user_id,
                    provider: job.provider,
                    parameters: job.parameters,
                    is_async: job.is_async,
                  }
                : {}),
            })),
          })
        );
      } catch (error) {
        this.sendError(res, error, 'Failed to list tasks');
      }
    });

    this.app.get('/api/tasks/:taskId/status', async (req: Request, res: Response) => {
      try {
        const status = await this.deps.orchestrator.getStatus(req.params.taskId);
        res.json(successBody('Task status retrieved', status));
      } catch (error) {
        this.sendError(res, error, 'Failed to get task status');
      }
    });

    this.app.get('/api/tasks/:taskId/result', async (req: Request, res: Response) => {
      try {
        const result = await this.deps.orchestrator.getResult(req.params.taskId);
        res.json(successBody('Task result retrieved', result));
      } catch (error) {
        this.sendError(res, error, 'Failed to get task result');
      }
    });

    this.app.post('/api/tasks/:taskId/cancel', async (req: Request, res: Response) => {
      const { taskId } = req.params;
      try {
        if (!(await this.deps.orchestrator.cancel(taskId))) {
          res
            .status(400)
            .json(
              errorBody(
                `Failed to cancel task with ID ${taskId}: task does not exist or is already cancelled/completed`
              )
            );
          return;
        }
        res.json(successBody('Task cancelled', { task_id: taskId }));
      } catch (error) {
        this.sendError(res, error, 'Failed to cancel task');
      }
    });

    // Models
    this.app.get('/api/models', (_req: Request, res: Response) => {
      const byProvider: Record<string, string[]> = {};
      for (const [name, connector] of this.deps.registry.listAll()) {
        byProvider[name] = connector.supportedModels();
      }
      res.json(successBody('Supported models retrieved', byProvider));
    });

    this.app.get('/api/models/all', (_req: Request, res: Response) => {
      const models = [...this.deps.registry.listAll()].flatMap(([provider, connector]) =>
        connector.supportedModels().map(model => ({ provider, model }))
      );
      res.json(successBody('All models retrieved', { models }));
    });

    this.app.get('/api/models/by-provider/:providerName', (req: Request, res: Response) => {
      const { providerName } = req.params;
      try {
        const connector = this.deps.registry.get(providerName);
        res.json(
          successBody(`Models for provider ${providerName} retrieved`, {
            [providerName]: connector.supportedModels(),
          })
        );
      } catch (error) {
        if (error instanceof ProviderNotFoundError) {
          res.status(404).json(errorBody(error.message));
          return;
        }
        this.sendError(res, error, 'Failed to get models');
      }
    });

    // Downloads
    this.app.get('/api/download/:fileName', async (req: Request, res: Response) => {
      const { fileName } = req.params;
      try {
        if (!isPlainFileName(fileName)) {
          res.status(400).json(errorBody(`Invalid file name: ${fileName}`));
          return;
        }

        const filePath = await locateMediaFile(this.config.dataDir, fileName);
        if (!filePath) {
          logger.warn(`Download requested for missing file ${fileName}`);
          res.status(404).json(errorBody(`File not found: ${fileName}`));
          return;
        }

        logger.info(`Serving download ${filePath}`);
        res.setHeader('Content-Type', contentTypeFor(fileName));
        res.setHeader('Content-Disposition', `attachment; filename="${encodeURIComponent(fileName)}"`);
        res.sendFile(filePath, error => {
          if (error && !res.headersSent) {
            this.sendError(res, error, 'Failed to process download request');
          }
        });
      } catch (error) {
        this.sendError(res, error, 'Failed to process download request');
      }
    });

    this.app.use('/api', (req: Request, res: Response) => {
      res.status(404).json(errorBody(`Route not found: ${req.method} ${req.originalUrl}`));
    });

    // Malformed JSON bodies and other middleware failures
    this.app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
      if (error instanceof SyntaxError) {
        res.status(400).json(errorBody(`Invalid JSON body: ${error.message}`));
        return;
      }
      // body-parser errors carry their own client status
      if (error instanceof Error && 'status' in error && typeof error.status === 'number' && error.status < 500) {
        res.status(error.status).json(errorBody(error.message));
        return;
      }
      this.sendError(res, error, 'Request failed');
    });
  }

  private pageLinks(
    req: Request,
    listing: JobListing,
    query: { status?: string; model?: string; ordering: string }
  ): { next: string | null; previous: string | null } {
    const baseUrl = `${req.protocol}://${req.get('host') ?? 'localhost'}${req.baseUrl}${req.path}`;
    const params: string[] = [];
    if (query.status) params.push(`status=${encodeURIComponent(query.status)}`);
    if (query.model) params.push(`model=${encodeURIComponent(query.model)}`);
    params.push(`page_size=${listing.page_size}`);
    params.push(`ordering=${encodeURIComponent(query.ordering)}`);

    const link = (page: number) => `${baseUrl}?${[...params, `page=${page}`].join('&')}`;
    return {
      next: listing.page < listing.total_pages ? link(listing.page + 1) : null,
      previous: listing.page > 1 ? link(listing.page - 1) : null,
    };
  }

  private sendError(res: Response, error: unknown, context: string): void {
    const status = httpStatusFor(error);
    if (status >= 500) {
      logger.error(`${context}: ${errorMessage(error)}`);
    } else {
      logger.warn(`${context}: ${errorMessage(error)}`);
    }
    res.status(status).json(errorBody(`${context}: ${errorMessage(error)}`));
  }

  async start(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      this.httpServer.once('error', reject);
      this.httpServer.listen(this.config.port, () => {
        this.httpServer.off('error', reject);
        resolve();
      });
    });

    logger.info(`API server started on port ${this.port}`);
    logger.info('HTTP endpoints:');
    logger.info('  POST /api/tasks - Create task');
    logger.info('  GET /api/tasks - List tasks');
    logger.info('  GET /api/tasks/:id/status | /result, POST /api/tasks/:id/cancel');
    logger.info('  GET /api/models, /api/models/all, /api/models/by-provider/:name');
    logger.info('  GET /api/download/:filename');
    logger.info('  GET /api/health - Health check');
  }

  async stop(): Promise<void> {
    logger.info('Stopping API server...');
    if (!this.httpServer.listening) return;
    await new Promise<void>((resolve, reject) => {
      this.httpServer.close(error => (error ? reject(error) : resolve()));
    });
    logger.info('API server stopped');
  }
}
