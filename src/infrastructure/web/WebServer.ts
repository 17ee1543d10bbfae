import express, { Express, NextFunction, Request, Response } from 'express';
import { Server as HttpServer } from 'http';
import { WebSocketServer } from 'ws';
import cors from 'cors';
import { z } from 'zod';
import { toWireSnapshot } from '../../core/entities/SearchJob.js';
import { EngineShutdownError, errorMessage } from '../../core/errors.js';
import type { SearchEngine } from '../../application/services/SearchEngine.js';
import type { SocketManager } from '../transport/SocketManager.js';
import { Logger, silentLogger } from '../../utils/logger.js';

export const WS_PATH = '/api/ws';

export const FetchRequestSchema = z.object({
  url: z.string().trim().url('url must be a valid URL'),
  searchId: z.string().trim().min(1, 'searchId is required'),
  clientId: z.string().trim().min(1, 'clientId is required'),
});

const RecentQuerySchema = z.object({
  limit: z.coerce.number().int().min(0).max(1000).default(20),
});

export interface WebServerOptions {
  port: number;
  corsOrigins: string[];
}

export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;
  private wss: WebSocketServer | null = null;

  constructor(
    private engine: SearchEngine,
    private sockets: SocketManager,
    private options: WebServerOptions,
    private logger: Logger = silentLogger
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  /**
   * The express app, for mounting in tests or another server
   */
  get handler(): Express {
    return this.app;
  }

  private setupMiddleware(): void {
    const origins = this.options.corsOrigins;
    this.app.use(cors({ origin: origins.includes('*') ? '*' : origins }));
    this.app.use(express.json());
  }

  private setupRoutes(): void {
    // API: Submit a profile for harvesting
    this.app.post('/api/url-item/fetch', (req: Request, res: Response) => {
      const body = FetchRequestSchema.safeParse(req.body);
      if (!body.success) {
        res.status(400).json({ success: false, error: body.error.issues.map((issue) => issue.message).join('; ') });
        return;
      }

      try {
        const { url, searchId, clientId } = body.data;
        const jobId = this.engine.submit(url, clientId, searchId);
        res.json({ success: true, data: { job_id: jobId } });
      } catch (error) {
        this.sendError(res, error);
      }
    });

    // API: Recently finished jobs
    this.app.get('/api/url-item/recent', (req: Request, res: Response) => {
      const query = RecentQuerySchema.safeParse(req.query);
      if (!query.success) {
        res.status(400).json({ success: false, error: 'limit must be an integer between 0 and 1000' });
        return;
      }
      const jobs = this.engine.recentCompleted(query.data.limit).map(toWireSnapshot);
      res.json({ success: true, data: jobs });
    });

    // API: Job status
    this.app.get('/api/url-item/:clientId/:searchId', (req: Request, res: Response) => {
      const snapshot = this.engine.getStatus(req.params.clientId, req.params.searchId);
      if (!snapshot) {
        res.status(404).json({ success: false, error: 'Job not found' });
        return;
      }
      res.json({ success: true, data: toWireSnapshot(snapshot) });
    });

    // API: Cancel a queued job
    this.app.delete('/api/url-item/:clientId/:searchId', (req: Request, res: Response) => {
      const { clientId, searchId } = req.params;
      if (this.engine.cancel(clientId, searchId)) {
        res.json({ success: true, message: 'Job cancelled' });
        return;
      }

      const snapshot = this.engine.getStatus(clientId, searchId);
      if (!snapshot) {
        res.status(404).json({ success: false, error: 'Job not found' });
        return;
      }
      res.status(409).json({ success: false, error: `Job already ${snapshot.status}; only queued jobs can be cancelled` });
    });

    // API: Pool statistics
    this.app.get('/api/stats', (req: Request, res: Response) => {
      res.json({
        success: true,
        data: { ...this.engine.poolStats(), connectedClients: this.sockets.connectedClients().length },
      });
    });

    this.app.get('/api/health', (req: Request, res: Response) => {
      const accepting = this.engine.isAccepting();
      res.status(accepting ? 200 : 503).json({
        success: accepting,
        data: { status: accepting ? 'ok' : 'shutting_down', timestamp: new Date().toISOString() },
      });
    });

    // Malformed JSON bodies and anything else express raises
    this.app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
      if (res.headersSent) {
        next(error);
        return;
      }
      if (error instanceof SyntaxError) {
        res.status(400).json({ success: false, error: 'Malformed JSON body' });
        return;
      }
      this.sendError(res, error);
    });
  }

  private sendError(res: Response, error: unknown): void {
    if (error instanceof EngineShutdownError) {
      res.status(503).json({ success: false, error: error.message });
      return;
    }
    this.logger.error(`Request failed: ${errorMessage(error)}`);
    res.status(500).json({ success: false, error: errorMessage(error) });
  }

  public start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.options.port, () => {
        this.logger.info(`API available at http://localhost:${this.options.port}/api`);
        this.wss = new WebSocketServer({ server, path: WS_PATH });
        this.sockets.attach(this.wss);
        this.logger.info(`Push channel at ws://localhost:${this.options.port}${WS_PATH}`);
        resolve();
      });

      server.on('error', (error) => {
        this.logger.error(`Server error: ${error.message}`);
        reject(error);
      });
      this.httpServer = server;
    });
  }

  public stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.sockets.closeAll();

      if (this.wss) {
        this.wss.close(() => {
          this.logger.info('WebSocket server closed');
        });
        this.wss = null;
      }

      if (!this.httpServer) {
        resolve();
        return;
      }

      this.httpServer.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        this.logger.info('HTTP server closed');
        resolve();
      });
      this.httpServer = null;
    });
  }
}
