import { Router } from 'express';
import os from 'node:os';
import type { ProxyRunner } from '../types.js';

export function createHealthRouter(runner: ProxyRunner): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const memory = process.memoryUsage();
    res.json({
      status: 'ok',
      uptime: process.uptime(),
      mode: runner.mode,
      ...runner.status(),
      load: os.loadavg?.() ?? [],
      memory: {
        rss: memory.rss,
        heapUsed: memory.heapUsed,
      },
    });
  });

  return router;
}
