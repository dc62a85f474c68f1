import express, { Request, Response, NextFunction } from 'express';
import type { Server } from 'http';
import { z } from 'zod';
import { logger } from './utils/logger.js';
import { UnknownTrackError } from './pipeline/errors.js';
import { parsePublishActionToken } from './pipeline/token.js';
import type { ItemSelector } from './pipeline/types.js';
import type { ProgressReporter } from './reporting/group-report.js';
import type { PublishOrchestrator, PublishResult } from './publish/orchestrator.js';

const PublishBodySchema = z.object({
  token: z.string().min(1),
});

const ResolveBodySchema = z.object({
  token: z.string().min(1),
  outcome: z.enum(['published', 'failed']),
  reason: z.string().min(1).optional(),
});

class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
  }
}

function parseTrackId(value: unknown): number {
  const raw = Array.isArray(value) ? value[0] : value;
  const text = String(raw);
  if (!/^\d+$/.test(text)) {
    throw new HttpError(400, `Invalid track id: ${text}`);
  }
  return Number(text);
}

function selectorFrom(req: Request): ItemSelector {
  const model = typeof req.query.model === 'string' && req.query.model.length > 0 ? req.query.model : undefined;
  return { trackId: parseTrackId(req.params.trackId), model };
}

export function statusForResult(result: PublishResult): number {
  switch (result.outcome) {
    case 'published':
      return 200;
    case 'failed':
      return 502;
    case 'uncertain':
      return 504;
    case 'rejected':
      if (result.rejection === 'not-found' || result.rejection === 'no-uncertain-attempt') return 404;
      if (result.rejection === 'lease-unavailable') return 423;
      return 409;
  }
}

export interface ReportServerOptions {
  reporter: ProgressReporter;
  orchestrator: PublishOrchestrator;
}

/**
 * HTTP surface for the reporting layer: group roll-ups, monthly counts,
 * and the human-triggered publish and uncertain-attempt resolution.
 */
export class ReportServer {
  private app: express.Application;
  private server: Server | null = null;
  private readonly reporter: ProgressReporter;
  private readonly orchestrator: PublishOrchestrator;

  constructor(
    private port: number = 3000,
    options: ReportServerOptions
  ) {
    this.app = express();
    this.app.use(express.json());
    this.reporter = options.reporter;
    this.orchestrator = options.orchestrator;
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  private setupMiddleware(): void {
    // Request logging
    this.app.use((req: Request, _res: Response, next: NextFunction) => {
      logger.debug(`${req.method} ${req.path}`);
      next();
    });
  }

  private setupRoutes(): void {
    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({ status: 'healthy', timestamp: new Date().toISOString() });
    });

    this.app.get('/tracks/:trackId/groups', async (req: Request, res: Response) => {
      const groups = await this.reporter.groups(selectorFrom(req));
      res.json({ groups });
    });

    this.app.get('/tracks/:trackId/progress/monthly', async (req: Request, res: Response) => {
      const months = await this.reporter.monthly(selectorFrom(req));
      res.json({ months });
    });

    this.app.post('/publish', async (req: Request, res: Response) => {
      const body = PublishBodySchema.safeParse(req.body);
      if (!body.success) {
        throw new HttpError(400, 'Body must contain a publish-action token');
      }
      const ref = parsePublishActionToken(body.data.token);
      if (!ref) {
        throw new HttpError(400, `Not a publish-action token: ${body.data.token}`);
      }

      logger.info('Publish requested', { token: body.data.token });
      const result = await this.orchestrator.publish(ref);
      res.status(statusForResult(result)).json(result);
    });

    this.app.post('/publish/resolve', async (req: Request, res: Response) => {
      const body = ResolveBodySchema.safeParse(req.body);
      if (!body.success) {
        throw new HttpError(400, 'Body must contain a token and an outcome of "published" or "failed"');
      }
      const ref = parsePublishActionToken(body.data.token);
      if (!ref) {
        throw new HttpError(400, `Not a publish-action token: ${body.data.token}`);
      }

      const result = await this.orchestrator.resolveUncertain(ref, body.data.outcome, body.data.reason);
      res.status(statusForResult(result)).json(result);
    });
  }

  private setupErrorHandling(): void {
    this.app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
      if (err instanceof HttpError) {
        res.status(err.status).json({ error: err.message });
        return;
      }
      if (err instanceof UnknownTrackError) {
        res.status(404).json({ error: err.message });
        return;
      }
      logger.error('Server error', err);
      res.status(500).json({ error: 'Internal server error' });
    });
  }

  /**
   * Start the server.
   */
  start(): Promise<void> {
    return new Promise((resolve) => {
      const server = this.app.listen(this.port, () => {
        // Port 0 asks the OS for a free port
        const address = server.address();
        if (address && typeof address === 'object') {
          this.port = address.port;
        }
        logger.info(`Report server listening on port ${this.port}`);
        resolve();
      });
      this.server = server;
    });
  }

  /**
   * Stop the server.
   */
  stop(): Promise<void> {
    return new Promise((resolve) => {
      if (this.server) {
        this.server.close((err) => {
          if (err && (err as NodeJS.ErrnoException).code !== 'ERR_SERVER_NOT_RUNNING') {
            logger.warn('Error stopping report server', err);
          }
          this.server = null;
          logger.info('Report server stopped');
          resolve();
        });
      } else {
        resolve();
      }
    });
  }

  getPort(): number {
    return this.port;
  }

  /**
   * Get the express app instance (for testing).
   */
  getApp(): express.Application {
    return this.app;
  }
}
