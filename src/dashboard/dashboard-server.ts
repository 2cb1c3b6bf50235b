// Dashboard Server
// Express app exposing the pipeline control surface and sentiment queries under /api

import express from 'express';
import { createServer, Server } from 'http';
import configManager from '../shared/config';
import logger from '../shared/logger';
import { describeError } from '../shared/errors';
import { ApiDependencies, createApiRouter } from './api-routes';

export function createDashboardApp(deps: ApiDependencies): express.Application {
  const app = express();
  app.use(express.json());

  app.get('/health', (_req, res) => {
    const status = deps.engine.status();
    res.json({
      status: 'ok',
      pipeline: status.status,
      running: status.running,
      timestamp: new Date().toISOString(),
    });
  });

  app.use('/api', createApiRouter(deps));

  app.use((_req, res) => {
    res.status(404).json({ success: false, error: 'Not found' });
  });

  // Malformed JSON bodies and anything a route failed to catch
  app.use((error: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const status = error instanceof SyntaxError ? 400 : 500;
    if (status === 500) {
      logger.error(`[DashboardServer] Unhandled request error: ${describeError(error)}`);
    }
    res.status(status).json({ success: false, error: describeError(error) });
  });

  return app;
}

export class DashboardServer {
  private app: express.Application;
  private server: Server;
  private port: number;

  constructor(deps: ApiDependencies, port: number = configManager.get().server.port) {
    this.app = createDashboardApp(deps);
    this.server = createServer(this.app);
    this.port = port;
  }

  /**
   * Resolves with the bound port (useful with port 0)
   */
  async start(): Promise<number> {
    return new Promise<number>((resolve, reject) => {
      this.server.once('error', (error) => {
        logger.error(`[DashboardServer] Server error: ${describeError(error)}`);
        reject(error);
      });

      this.server.listen(this.port, () => {
        const address = this.server.address();
        const port = address !== null && typeof address === 'object' ? address.port : this.port;
        logger.info(`[DashboardServer] Listening on port ${port}`);
        resolve(port);
      });
    });
  }

  async stop(): Promise<void> {
    if (!this.server.listening) return;
    return new Promise<void>((resolve, reject) => {
      this.server.closeAllConnections();
      this.server.close(error => {
        if (error) {
          reject(error);
          return;
        }
        logger.info('[DashboardServer] Stopped');
        resolve();
      });
    });
  }
}
