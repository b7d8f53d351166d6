import { Hono } from 'hono';
import type { UpdateDispatcher } from '../../core/updates/UpdateDispatcher.js';
import { createLogger, generateCorrelationId } from '../../utils/logger.js';
import { DecodeError } from '../../utils/errors.js';

/**
 * Webhook endpoint for runtimes that speak web-standard `Request`/`Response`.
 * Serve it with `app.fetch`.
 */
export function createEdgeWebhookApp(dispatcher: UpdateDispatcher): Hono {
  const logger = createLogger({ component: 'edgeWebhook' });
  const app = new Hono();

  app.get('/health', (c) => c.json({ status: 'ok' }));

  app.post('/', async (c) => {
    const requestLogger = logger.child({ correlationId: generateCorrelationId() });

    let body: unknown;
    try {
      body = await c.req.json();
    } catch (error) {
      requestLogger.warn({ err: error }, 'Webhook body is not JSON');
      return c.json({ ok: false, error: 'Invalid JSON payload' }, 400);
    }

    try {
      await dispatcher.handle(body);
    } catch (error) {
      if (error instanceof DecodeError) {
        requestLogger.warn({ err: error }, 'Webhook body is not an update');
        return c.json({ ok: false, error: 'Invalid update' }, 400);
      }
      requestLogger.error({ err: error }, 'Error processing webhook');
      return c.json({ ok: false, error: 'Internal server error' }, 500);
    }

    return c.json({ ok: true });
  });

  return app;
}
