import http from 'http';
import express, { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { logger, logError } from './utils/logger';
import { EnvironmentChecker } from './utils/EnvironmentChecker';
import { FileManager } from './utils/FileManager';
import {
  CredentialsSchema,
  DownloadRequestSchema,
  InputValidator,
  OutputPathSchema,
} from './utils/InputValidator';
import { formatBytes } from './progress/format';
import { CredentialedSession } from './session/CredentialedSession';
import { AppError, PathNotWritableError } from './session/errors';
import { TaskQueue } from './queue/TaskQueue';
import { TunnelLauncher } from './tunnel/TunnelLauncher';

export interface ServerDependencies {
  session: CredentialedSession;
  queue: TaskQueue;
  environment: EnvironmentChecker;
  fileManager: FileManager;
  tunnel: TunnelLauncher;
  defaultOutputPath: string;
}

const UdpTunnelSchema = z.object({
  type: z.enum(['basic', 'custom_port', 'custom_to', 'reserved']).default('basic'),
  port: z.string().trim().optional(),
  to: z.string().trim().optional(),
  reservedEndpoint: z.string().trim().optional(),
});

type AsyncRoute = (req: Request, res: Response) => Promise<void>;

function asyncHandler(route: AsyncRoute) {
  return (req: Request, res: Response, next: NextFunction): void => {
    route(req, res).catch(next);
  };
}

function validationMessage(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
}

/**
 * Express server exposing system checks, direct runs and the task queue
 */
export class Server {
  private readonly app: express.Application;
  private httpServer: http.Server | null = null;

  constructor(
    private readonly deps: ServerDependencies,
    private readonly port: number,
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandler();
  }

  get application(): express.Application {
    return this.app;
  }

  /**
   * Setup Express middleware
   */
  private setupMiddleware(): void {
    this.app.use(express.json());
  }

  /**
   * Setup Express routes
   */
  private setupRoutes(): void {
    const { session, queue, environment, fileManager, tunnel } = this.deps;

    this.app.get('/health', (_req: Request, res: Response) => {
      res.status(200).json({
        status: 'ok',
        uptime: Math.floor(process.uptime()),
        queued: queue.size(),
        timestamp: new Date().toISOString(),
      });
    });

    this.app.get(
      '/system/check',
      asyncHandler(async (_req, res) => {
        const report = await environment.check();
        res.json({ report, text: EnvironmentChecker.formatReport(report) });
      }),
    );

    this.app.get(
      '/system/disk',
      asyncHandler(async (_req, res) => {
        const freeBytes = await environment.freeSpace();
        res.json({
          freeBytes,
          text:
            freeBytes === undefined
              ? 'Available Disk Space: unknown'
              : `Available Disk Space: ${formatBytes(freeBytes)}`,
        });
      }),
    );

    this.app.post(
      '/output/verify',
      asyncHandler(async (req, res) => {
        const body = OutputPathSchema.safeParse(req.body);
        if (!body.success) {
          res.status(400).json({ error: validationMessage(body.error) });
          return;
        }
        res.json({ message: await environment.verifyOutputPath(body.data.outputPath) });
      }),
    );

    this.app.post(
      '/login/verify',
      asyncHandler(async (req, res) => {
        const credentials = CredentialsSchema.safeParse(req.body);
        if (!credentials.success) {
          res.status(400).json({ error: validationMessage(credentials.error) });
          return;
        }
        const result = await session.login(credentials.data);
        res.json(
          result.ok
            ? { ok: true, attempts: result.attempts, message: 'Login verified successfully.' }
            : { ok: false, attempts: result.attempts, error: result.error.userMessage },
        );
      }),
    );

    this.app.post(
      '/downloads',
      asyncHandler(async (req, res) => {
        const request = DownloadRequestSchema.safeParse(req.body);
        if (!request.success) {
          res.status(400).json({ error: validationMessage(request.error) });
          return;
        }
        const result = await session.run(request.data);
        res.json({ status: result.log.join('\n'), error: result.error ?? '' });
      }),
    );

    this.app.post(
      '/queue',
      asyncHandler(async (req, res) => {
        const request = DownloadRequestSchema.safeParse(req.body);
        if (!request.success) {
          res.status(400).json({ error: validationMessage(request.error) });
          return;
        }
        const task = await queue.enqueue(request.data);
        res.status(202).json({
          id: task.id,
          message: `Task added to queue. Queue size: ${queue.size()}`,
        });
      }),
    );

    this.app.get('/queue', (_req: Request, res: Response) => {
      res.json({
        status: queue.getStatus(),
        current: queue.current() ?? null,
        pending: queue.pending(),
      });
    });

    this.app.delete(
      '/queue/current',
      asyncHandler(async (_req, res) => {
        res.json({ cancelled: await queue.cancelCurrent() });
      }),
    );

    this.app.get(
      '/files',
      asyncHandler(async (req, res) => {
        const requested =
          typeof req.query.outputPath === 'string' && req.query.outputPath.length > 0
            ? req.query.outputPath
            : this.deps.defaultOutputPath;
        if (!InputValidator.isOutputPathSafe(requested)) {
          res.status(400).json({ error: 'outputPath must be an absolute path' });
          return;
        }
        const files = await fileManager.listArchiveParts(requested);
        res.json({
          files,
          text: files.length > 0 ? files.join('\n') : 'No downloaded files found.',
        });
      }),
    );

    this.app.post(
      '/tunnel/udp',
      asyncHandler(async (req, res) => {
        const options = UdpTunnelSchema.safeParse(req.body);
        if (!options.success) {
          res.status(400).json({ error: validationMessage(options.error) });
          return;
        }
        const started = await tunnel.startUdp({
          type: options.data.type,
          port: options.data.port || undefined,
          to: options.data.to || undefined,
          reservedEndpoint: options.data.reservedEndpoint || undefined,
        });
        if (!started) {
          res
            .status(502)
            .json({ error: `UDP tunnel could not be started with type: ${options.data.type}` });
          return;
        }
        res.json({ message: `UDP tunnel started with type: ${options.data.type}` });
      }),
    );
  }

  private setupErrorHandler(): void {
    this.app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
      if (error instanceof PathNotWritableError) {
        res.status(400).json({ error: error.userMessage });
        return;
      }
      if (error instanceof AppError) {
        res.status(500).json({ error: error.userMessage });
        return;
      }
      const err = error instanceof Error ? error : new Error(String(error));
      logError(err, { operation: 'http' });
      res.status(500).json({ error: 'Internal server error' });
    });
  }

  /**
   * Start listening
   */
  async start(): Promise<void> {
    return new Promise((resolve) => {
      this.httpServer = this.app.listen(this.port, () => {
        logger.info(`🚀 Server running on port ${this.port}`);
        resolve();
      });
    });
  }

  /**
   * Stop the server
   */
  async stop(): Promise<void> {
    logger.info('🛑 Server shutting down...');
    const server = this.httpServer;
    this.httpServer = null;
    if (!server) {
      return;
    }
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
