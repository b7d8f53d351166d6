import type { NextFunction, Request, Response, Router } from 'express';
import express from 'express';
import type { UpdateDispatcher } from '../../core/updates/UpdateDispatcher.js';
import { createLogger, generateCorrelationId } from '../../utils/logger.js';
import { DecodeError } from '../../utils/errors.js';

export function createWebhookRouter(dispatcher: UpdateDispatcher): Router {
  const logger = createLogger({ component: 'webhookRouter' });
  const router = express.Router();

  router.post('/telegram', express.json(), async (req, res) => {
    const requestLogger = logger.child({ correlationId: generateCorrelationId() });

    try {
      requestLogger.debug('Received webhook request');
      await dispatcher.handle(req.body);

      // Telegram retries anything but a 2xx
      res.status(200).json({ ok: true });
    } catch (error) {
      if (error instanceof DecodeError) {
        requestLogger.warn({ err: error }, 'Webhook body is not an update');
        res.status(400).json({ ok: false, error: 'Invalid update' });
        return;
      }
      requestLogger.error({ err: error }, 'Error processing webhook');
      res.status(500).json({ ok: false, error: 'Internal server error' });
    }
  });

  // express.json() reports unparsable bodies as a SyntaxError carrying the raw body
  router.use((err: Error, _req: Request, res: Response, next: NextFunction) => {
    if (err instanceof SyntaxError && 'body' in err) {
      logger.warn({ err }, 'Webhook body is not JSON');
      res.status(400).json({ ok: false, error: 'Invalid JSON payload' });
      return;
    }
    next(err);
  });

  router.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  return router;
}
