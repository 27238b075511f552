import express, { Request, Response } from 'express';
import { Server } from 'http';
import { CommandController } from './CommandController';
import { StructuredLogger, logger as rootLogger } from '../core/StructuredLogger';
import { toError } from '../core/errors';

export interface HttpServerConfig {
  port: number;
  host: string;
  enableLogging: boolean;
}

export class HttpServer {
  private readonly app: express.Application;
  private server: Server | null = null;
  private readonly config: HttpServerConfig;
  private readonly logger: StructuredLogger;

  constructor(
    private readonly commands: CommandController,
    config: Partial<HttpServerConfig> = {},
    logger: StructuredLogger = rootLogger
  ) {
    this.config = {
      port: 3000,
      host: '0.0.0.0',
      enableLogging: true,
      ...config
    };
    this.logger = logger.child('http');

    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware(): void {
    if (this.config.enableLogging) {
      this.app.use((req, res, next) => {
        const start = Date.now();
        res.on('finish', () => {
          this.logger.debug(`${req.method} ${req.path} - ${res.statusCode} - ${Date.now() - start}ms`);
        });
        next();
      });
    }
  }

  private setupRoutes(): void {
    this.app.get('/health', (_req: Request, res: Response) => {
      res.json(this.commands.health());
    });

    this.app.get('/history', (_req: Request, res: Response) => {
      this.sendText(res, () => this.commands.historyCommand());
    });

    this.app.get('/check', (_req: Request, res: Response) => {
      this.sendText(res, () => this.commands.checkCommand());
    });

    this.app.post('/forcecheck', (_req: Request, res: Response) => {
      this.sendText(res, () => this.commands.forceCheckCommand());
    });
  }

  private sendText(res: Response, handler: () => Promise<string>): void {
    handler()
      .then(text => {
        res.type('text/plain; charset=utf-8').send(text);
      })
      .catch((error: unknown) => {
        this.logger.error('❌ Command failed', toError(error));
        res.status(500).type('text/plain; charset=utf-8').send('Command failed');
      });
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.config.port, this.config.host, () => {
        this.logger.info(`🌐 HTTP commands on http://${this.config.host}:${this.config.port}`);
        resolve();
      });
      server.on('error', reject);
      this.server = server;
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;

    await new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
    this.server = null;
  }
}
