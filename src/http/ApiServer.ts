import type { Server } from 'http';
import express from 'express';
import cors from 'cors';
import type { Config } from '../configurations';
import type { Logger } from '../logging/Logger';
import { createApiRoutes, type StatusSource } from './routes';

/** Read-only operator view of registrations, calls and the transport. */
export class ApiServer {
  private app = express();
  private server?: Server;

  constructor(
    private readonly config: Config,
    private readonly logger: Logger,
    private readonly engine: StatusSource
  ) {
    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware(): void {
    if (this.config.HTTP_CORS_ORIGINS.length > 0) {
      this.app.use(
        cors({
          origin: this.config.HTTP_CORS_ORIGINS,
        })
      );
    }
    this.app.use(express.json());
  }

  private setupRoutes(): void {
    this.app.use('/api', createApiRoutes(this.engine));
  }

  public start(): void {
    this.server = this.app.listen(this.config.HTTP_PORT, () => {
      this.logger.info(`Status API running on port ${this.config.HTTP_PORT}`);
    });
  }

  public stop(): Promise<void> {
    const server = this.server;
    this.server = undefined;
    if (!server) return Promise.resolve();
    return new Promise((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
  }
}
