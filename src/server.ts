import type { Server } from 'node:http';
import express from 'express';
import { createLogger } from './utils/logger.js';
import type { UpdateDispatcher } from './core/updates/UpdateDispatcher.js';
import { createWebhookRouter } from './adapters/webhook/webhookRouter.js';

const logger = createLogger({ component: 'server' });

export function createApp(dispatcher: UpdateDispatcher): express.Express {
  const app = express();

  // Request logging middleware
  app.use((req, _res, next) => {
    logger.debug({ method: req.method, path: req.path }, 'Incoming request');
    next();
  });

  // Routes
  app.use('/webhook', createWebhookRouter(dispatcher));

  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Error handling
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    logger.error({ err }, 'Unhandled error in Express');
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

/** Serves the webhook at `POST /webhook/telegram`. */
export function startServer(dispatcher: UpdateDispatcher, port: number, host: string = '0.0.0.0'): Promise<Server> {
  const app = createApp(dispatcher);

  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      logger.info({ host, port }, 'HTTP server started');
      resolve(server);
    });
    server.on('error', reject);
  });
}
