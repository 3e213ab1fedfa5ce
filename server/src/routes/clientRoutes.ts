import { Router } from 'express';
import type { FanOutHub } from '../lib/fanOutHub.js';
import { logger } from '../lib/logger.js';

export function createClientRouter(hub: FanOutHub): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({ clients: hub.list() });
  });

  router.get('/:id', (req, res) => {
    const client = hub.list().find((entry) => entry.id === req.params.id);
    if (!client) {
      res.status(404).json({ error: 'NOT_FOUND' });
      return;
    }
    res.json(client);
  });

  router.delete('/:id', (req, res) => {
    const clientId = req.params.id;
    if (!hub.disconnect(clientId)) {
      res.status(404).json({ error: 'NOT_FOUND' });
      return;
    }
    logger.info({ clientId }, 'client_kicked');
    res.json({ status: 'disconnected' });
  });

  return router;
}
