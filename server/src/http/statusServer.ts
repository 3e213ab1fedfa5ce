import http from 'node:http';
import express, { type Express } from 'express';
import cors from 'cors';
import type { FanOutHub } from '../lib/fanOutHub.js';
import { logger } from '../lib/logger.js';
import { createClientRouter } from '../routes/clientRoutes.js';
import { createHealthRouter } from '../routes/health.js';
import type { ProxyRunner } from '../types.js';

export interface StatusAppOptions {
  runner: ProxyRunner;
  /** Present only in chamber-image mode. */
  hub?: FanOutHub;
  corsOrigins: string[] | '*';
}

export function createStatusApp(options: StatusAppOptions): Express {
  const app = express();

  app.use(
    cors({
      origin: options.corsOrigins,
    }),
  );

  app.get('/', (_req, res) => {
    res.json({
      name: 'Chamber Camera Proxy',
      version: '0.1.0',
      mode: options.runner.mode,
    });
  });

  app.use('/health', createHealthRouter(options.runner));
  if (options.hub) {
    app.use('/api/clients', createClientRouter(options.hub));
  }

  return app;
}

export async function startStatusServer(
  app: Express,
  port: number,
  host: string,
): Promise<http.Server> {
  const server = http.createServer(app);
  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.removeListener('error', reject);
      resolve();
    });
  });
  logger.info({ port, host }, 'status_server_started');
  return server;
}
